import { extractAnswers, extractRecipientEmail, extractUserName } from './answers';
import { buildFormPayload, EMAIL_REF, NAME_REF, SAMPLE_PAYLOAD } from '../../testing/fixtures';

describe('extractAnswers', () => {
  beforeEach(() => {
    jest.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('reads choice labels, text and numbers by field ref', () => {
    const payload = buildFormPayload([
      { ref: 'q-choice', choice: 'Low risk' },
      { ref: 'q-text', text: 'Sleeps well' },
      { ref: 'q-number', number: 7 },
      { ref: 'q-decimal', number: 7.5 },
    ]);
    expect(extractAnswers(payload)).toEqual({
      'q-choice': 'Low risk',
      'q-text': 'Sleeps well',
      'q-number': '7',
      'q-decimal': '7.5',
    });
  });

  it('maps unrecognised answer types to an empty string', () => {
    const payload = buildFormPayload([{ ref: EMAIL_REF, email: 'someone@example.com' }]);
    expect(extractAnswers(payload)).toEqual({ [EMAIL_REF]: '' });
  });

  it('defaults missing values inside a known answer type', () => {
    const payload = {
      form_response: {
        answers: [
          { type: 'choice', field: { ref: 'a' } },
          { type: 'number', field: { ref: 'b' } },
          { type: 'text', field: { ref: 'c' }, text: null },
          { type: 'text', text: 'no field' },
        ],
      },
    };
    expect(extractAnswers(payload)).toEqual({ a: '', b: '0', c: '', '': 'no field' });
  });

  it('returns an empty map for malformed payloads', () => {
    expect(extractAnswers({})).toEqual({});
    expect(extractAnswers(null)).toEqual({});
    expect(extractAnswers('not an object')).toEqual({});
    expect(extractAnswers({ form_response: { answers: 'nope' } })).toEqual({});
    expect(extractAnswers({ form_response: { answers: [42] } })).toEqual({});
  });

  it('logs malformed payloads', () => {
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => {});
    extractAnswers({});
    expect(warn).toHaveBeenCalledWith('answers.extract.malformed', { reason: 'form_response.answers missing or invalid' });
  });

  it('lets a later answer for the same ref win', () => {
    const payload = buildFormPayload([
      { ref: 'q', choice: 'first' },
      { ref: 'q', choice: 'second' },
    ]);
    expect(extractAnswers(payload)).toEqual({ q: 'second' });
  });
});

describe('extractUserName', () => {
  it('returns the text answer for the name field', () => {
    expect(extractUserName(SAMPLE_PAYLOAD, NAME_REF)).toBe('Ada Tester');
  });

  it('defaults to a placeholder name', () => {
    expect(extractUserName({}, NAME_REF)).toBe('User');
    expect(extractUserName(buildFormPayload([{ ref: 'other', text: 'x' }]), NAME_REF)).toBe('User');
    expect(extractUserName(buildFormPayload([{ ref: NAME_REF, choice: 'x' }]), NAME_REF)).toBe('User');
  });
});

describe('extractRecipientEmail', () => {
  it('finds the email answer with the configured ref', () => {
    expect(extractRecipientEmail(SAMPLE_PAYLOAD, EMAIL_REF)).toBe('ada@example.com');
  });

  it('ignores email answers under other refs', () => {
    const payload = buildFormPayload([{ ref: 'secondary-email', email: 'other@example.com' }]);
    expect(extractRecipientEmail(payload, EMAIL_REF)).toBeUndefined();
    expect(extractRecipientEmail({}, EMAIL_REF)).toBeUndefined();
  });
});
