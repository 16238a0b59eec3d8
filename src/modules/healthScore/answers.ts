import { AnswerMap } from './healthScore.types';
import { FormAnswer, formPayloadSchema } from './schema';
import { safeLogger } from '../../security/safeLogger';

export const DEFAULT_USER_NAME = 'User';

/** The answer list at `form_response.answers`, or null when the payload does not have that shape. */
export function readFormAnswers(payload: unknown): FormAnswer[] | null {
  const parsed = formPayloadSchema.safeParse(payload);
  if (!parsed.success) return null;
  return parsed.data.form_response.answers;
}

export function answerValue(answer: FormAnswer): string {
  switch (answer.type) {
    case 'choice':
      return answer.choice?.label ?? '';
    case 'text':
      return answer.text ?? '';
    case 'number':
      return String(answer.number ?? 0);
    default:
      return '';
  }
}

/** Flattens a form response into question ref → answer value. Malformed payloads give an empty map. */
export function extractAnswers(payload: unknown): AnswerMap {
  const answers = readFormAnswers(payload);
  if (!answers) {
    safeLogger.warn('answers.extract.malformed', { reason: 'form_response.answers missing or invalid' });
    return {};
  }

  const answerMap: AnswerMap = {};
  for (const answer of answers) {
    answerMap[answer.field?.ref ?? ''] = answerValue(answer);
  }
  return answerMap;
}

export function extractUserName(payload: unknown, nameFieldRef: string): string {
  const answers = readFormAnswers(payload) ?? [];
  const match = answers.find((answer) => answer.field?.ref === nameFieldRef);
  if (!match) return DEFAULT_USER_NAME;
  return match.text ?? DEFAULT_USER_NAME;
}

export function extractRecipientEmail(payload: unknown, emailFieldRef: string): string | undefined {
  const answers = readFormAnswers(payload) ?? [];
  const match = answers.find((answer) => answer.type === 'email' && answer.field?.ref === emailFieldRef);
  return match?.email || undefined;
}
