import fs from 'fs/promises';
import { z } from 'zod';
import { errorMessage, safeLogger } from '../../security/safeLogger';

/** Question ref → (answer text → sub-score), both levels in stored order. */
export type LookupTable = ReadonlyMap<string, ReadonlyMap<string, number>>;

const subScoreSchema = z.number().min(0).max(5);

// Integer-like object keys always enumerate first in JS, so questions whose
// answers need a fixed scan order can list them as [answer, score] pairs.
const answerScoresSchema = z.union([z.record(subScoreSchema), z.array(z.tuple([z.string(), subScoreSchema]))]);

const lookupTableSchema = z.record(answerScoresSchema);

export type LookupTableValidation =
  | { ok: true; table: LookupTable }
  | { ok: false; error: { code: 'LOOKUP_VALIDATION_FAILED'; details: z.ZodIssue[] } };

export function parseLookupTable(input: unknown): LookupTableValidation {
  const parsed = lookupTableSchema.safeParse(input);
  if (!parsed.success) {
    return { ok: false, error: { code: 'LOOKUP_VALIDATION_FAILED', details: parsed.error.issues } };
  }

  const table = new Map<string, ReadonlyMap<string, number>>();
  for (const [questionRef, answers] of Object.entries(parsed.data)) {
    const entries = Array.isArray(answers) ? answers : Object.entries(answers);
    table.set(questionRef, new Map(entries));
  }
  return { ok: true, table };
}

export const EMPTY_LOOKUP_TABLE: LookupTable = new Map();

/**
 * Reads the answer map once at startup. A missing or invalid file yields an
 * empty table: every pillar then scores 0, and the failure is logged at error level.
 */
export async function loadLookupTable(filePath: string): Promise<LookupTable> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf8');
  } catch (err) {
    safeLogger.error('lookup.load.failed', { path: filePath, reason: errorMessage(err) });
    return EMPTY_LOOKUP_TABLE;
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    safeLogger.error('lookup.load.failed', { path: filePath, reason: `Invalid JSON: ${errorMessage(err)}` });
    return EMPTY_LOOKUP_TABLE;
  }

  const validation = parseLookupTable(json);
  if (!validation.ok) {
    safeLogger.error('lookup.load.failed', {
      path: filePath,
      reason: 'Schema validation failed',
      issues: validation.error.details.slice(0, 5).map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
    return EMPTY_LOOKUP_TABLE;
  }

  safeLogger.info('lookup.loaded', { path: filePath, questions: validation.table.size });
  return validation.table;
}
