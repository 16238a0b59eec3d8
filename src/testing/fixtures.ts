import fs from 'fs/promises';
import os from 'os';
import path from 'path';

export const NAME_REF = 'name_field_ref';
export const EMAIL_REF = '39f116ed-5403-407a-b506-c9625e9e6b2a';

type AnswerInput =
  | { ref: string; choice: string }
  | { ref: string; text: string }
  | { ref: string; number: number }
  | { ref: string; email: string };

function toFormAnswer(input: AnswerInput) {
  const field = { id: `id-${input.ref}`, ref: input.ref };
  if ('choice' in input) return { type: 'choice', field, choice: { label: input.choice } };
  if ('text' in input) return { type: 'text', field, text: input.text };
  if ('number' in input) return { type: 'number', field, number: input.number };
  return { type: 'email', field, email: input.email };
}

export function buildFormPayload(answers: AnswerInput[]) {
  return {
    event_id: 'evt-test',
    event_type: 'form_response',
    form_response: {
      form_id: 'form-test',
      submitted_at: '2024-05-01T10:00:00Z',
      answers: answers.map(toFormAnswer),
    },
  };
}

/** Answers every question in the shipped answer map; scores 80/70/90/70/80/80, overall 78.3. */
export const SAMPLE_PAYLOAD = buildFormPayload([
  { ref: NAME_REF, text: 'Ada Tester' },
  { ref: EMAIL_REF, email: 'ada@example.com' },
  { ref: 'aa24a4d2-b1f2-408b-9d4a-4be80ec7508d', choice: 'Low risk' },
  { ref: '9c968d6d-e21b-448a-b8fb-30056f76ffff', choice: 'Moderate' },
  { ref: '27181fef-736e-4bee-ad31-7d8e983d61b3', choice: '120-129' },
  { ref: 'ceb0b561-1793-43f1-9c76-11cc3964e48a', choice: '80-89' },
  { ref: 'ccc73a31-d4f8-4856-8ebb-27647ff39a97', choice: '7-9 hours' },
  { ref: '50b96cb1-243e-454b-aa01-0e8990fc507d', choice: 'Good' },
  { ref: 'c714f3fd-a4ff-449b-9946-7badbdc59e03', number: 8 },
  { ref: '15045302-e327-4069-bc9d-d0c0ab3cfaaa', choice: 'Slightly' },
  { ref: 'f9a247fc-e8d3-4bd8-b7e1-ae54f6766993', choice: 'Most meals' },
  { ref: '2c99731f-7ee5-4181-82b5-48a4d876df59', choice: 'Agree' },
]);

export async function makeTempDir(prefix = 'health-score-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

/** Smallest valid PNG (1x1 RGBA). */
export const TINY_PNG = Buffer.from(
  'iVBORw0KGgoAAAANSUhEUgAAAAEAAAABCAYAAAAfFcSJAAAADUlEQVR42mNkYPhfDwAChwGA60e6kgAAAABJRU5ErkJggg==',
  'base64'
);
