import path from 'path';
import { loadConfig } from './config';

describe('loadConfig', () => {
  it('applies defaults when the environment is empty', () => {
    const config = loadConfig({});
    expect(config.port).toBe(4000);
    expect(config.smtp).toBeNull();
    expect(config.fromEmail).toBe('no-reply@example.com');
    expect(config.corsOrigins).toEqual(['http://localhost:3000']);
    expect(config.fieldRefs).toEqual({ name: 'name_field_ref', email: '39f116ed-5403-407a-b506-c9625e9e6b2a' });
    expect(path.basename(config.answerMapPath)).toBe('answer-map.json');
  });

  it('derives artifact directories from DATA_DIR', () => {
    const config = loadConfig({ DATA_DIR: '/srv/health' });
    expect(config.storage).toEqual({
      payloadDir: path.join('/srv/health', 'JsonData'),
      chartDir: path.join('/srv/health', 'PdfData', 'charts'),
      reportDir: path.join('/srv/health', 'PdfData', 'reports'),
    });
  });

  it('enables smtp only when a host is set', () => {
    const config = loadConfig({ SMTP_HOST: 'smtp.test.local', SMTP_PORT: '465', SMTP_USER: 'mailer', SMTP_PASS: 'test-secret' });
    expect(config.smtp).toEqual({ host: 'smtp.test.local', port: 465, user: 'mailer', pass: 'test-secret' });
    expect(loadConfig({ SMTP_HOST: '   ' }).smtp).toBeNull();
  });

  it('splits cors origins', () => {
    expect(loadConfig({ CORS_ORIGINS: 'http://a.test, http://b.test,' }).corsOrigins).toEqual(['http://a.test', 'http://b.test']);
  });

  it('rejects invalid values', () => {
    expect(() => loadConfig({ PORT: 'not-a-port' })).toThrow(/Invalid environment configuration: PORT/);
    expect(() => loadConfig({ FROM_EMAIL: 'nope' })).toThrow(/FROM_EMAIL/);
  });
});
