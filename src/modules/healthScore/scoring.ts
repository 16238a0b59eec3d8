import { AnswerMap, PillarKey, PillarScoreSet, PillarValues, roundToTenth } from './healthScore.types';
import { LookupTable } from './lookupTable';
import { PILLAR_DEFINITIONS, PillarDefinition } from './pillars';
import { safeLogger } from '../../security/safeLogger';

export type AnswerResolution =
  | { questionRef: string; answer: string; match: 'exact' | 'fuzzy'; matchedKey: string; subScore: number }
  | { questionRef: string; answer: string; match: 'unmatched' };

export type PillarBreakdown = {
  key: PillarKey;
  raw: number;
  normalized: number;
  resolutions: AnswerResolution[];
};

export type ScoringResult = {
  scores: PillarScoreSet;
  breakdown: PillarBreakdown[];
};

/** Maps a 0-5 sub-score average onto 0-100 with one decimal. */
export function normalizeScore(raw: number): number {
  return roundToTenth(raw * 20);
}

/**
 * Exact key first; otherwise the first key (in stored order) that contains the
 * answer or is contained by it, case-insensitively. First match wins even when
 * a later key would fit better.
 */
export function resolveSubScore(
  answer: string,
  answerScores: ReadonlyMap<string, number>
): { match: 'exact' | 'fuzzy'; key: string; subScore: number } | null {
  const exact = answerScores.get(answer);
  if (exact !== undefined) {
    return { match: 'exact', key: answer, subScore: exact };
  }

  const needle = answer.toLowerCase();
  for (const [key, subScore] of answerScores) {
    const candidate = key.toLowerCase();
    if (candidate.includes(needle) || needle.includes(candidate)) {
      return { match: 'fuzzy', key, subScore };
    }
  }
  return null;
}

export class HealthScorer {
  constructor(
    private readonly lookups: LookupTable,
    private readonly pillars: readonly PillarDefinition[] = PILLAR_DEFINITIONS
  ) {}

  score(answers: AnswerMap): PillarScoreSet {
    return this.scoreWithBreakdown(answers).scores;
  }

  scoreWithBreakdown(answers: AnswerMap): ScoringResult {
    const values: PillarValues = {
      musclesAndVisceralFat: 0,
      cardioVascular: 0,
      sleep: 0,
      cognitive: 0,
      metabolic: 0,
      emotional: 0,
    };

    const breakdown = this.pillars.map((pillar) => {
      const item = this.scorePillar(answers, pillar);
      values[pillar.key] = item.normalized;
      return item;
    });

    return { scores: PillarScoreSet.fromPillars(values), breakdown };
  }

  private scorePillar(answers: AnswerMap, pillar: PillarDefinition): PillarBreakdown {
    const resolutions: AnswerResolution[] = [];
    const subScores: number[] = [];

    for (const questionRef of pillar.questionRefs) {
      if (!Object.prototype.hasOwnProperty.call(answers, questionRef)) continue;
      const answerScores = this.lookups.get(questionRef);
      if (!answerScores) continue;

      const answer = answers[questionRef];
      const resolved = resolveSubScore(answer, answerScores);
      if (!resolved) {
        safeLogger.warn('scoring.answer.unmatched', { questionRef, answer, pillar: pillar.key });
        resolutions.push({ questionRef, answer, match: 'unmatched' });
        continue;
      }

      subScores.push(resolved.subScore);
      resolutions.push({ questionRef, answer, match: resolved.match, matchedKey: resolved.key, subScore: resolved.subScore });
    }

    const raw = subScores.length ? subScores.reduce((sum, value) => sum + value, 0) / subScores.length : 0;
    return { key: pillar.key, raw, normalized: normalizeScore(raw), resolutions };
  }
}
