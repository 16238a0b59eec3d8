export const PILLAR_KEYS = ['musclesAndVisceralFat', 'cardioVascular', 'sleep', 'cognitive', 'metabolic', 'emotional'] as const;

export type PillarKey = (typeof PILLAR_KEYS)[number];

export type PillarValues = Record<PillarKey, number>;

export type PillarScoreRecord = PillarValues & { overall: number };

/** Question ref → answer value (choice label, free text or stringified number). */
export type AnswerMap = Record<string, string>;

export function roundToTenth(value: number): number {
  return Math.round(value * 10) / 10;
}

/**
 * Six normalized pillar scores (0-100, one decimal) and their unweighted mean.
 * Instances are frozen; `toJSON` is the only serialized form.
 */
export class PillarScoreSet {
  readonly musclesAndVisceralFat: number;
  readonly cardioVascular: number;
  readonly sleep: number;
  readonly cognitive: number;
  readonly metabolic: number;
  readonly emotional: number;
  readonly overall: number;

  private constructor(values: PillarValues) {
    this.musclesAndVisceralFat = values.musclesAndVisceralFat;
    this.cardioVascular = values.cardioVascular;
    this.sleep = values.sleep;
    this.cognitive = values.cognitive;
    this.metabolic = values.metabolic;
    this.emotional = values.emotional;
    const sum = PILLAR_KEYS.reduce((total, key) => total + values[key], 0);
    this.overall = roundToTenth(sum / PILLAR_KEYS.length);
    Object.freeze(this);
  }

  static fromPillars(values: PillarValues): PillarScoreSet {
    for (const key of PILLAR_KEYS) {
      const value = values[key];
      if (!Number.isFinite(value) || value < 0 || value > 100) {
        throw new RangeError(`Pillar score '${key}' must be within 0-100, got ${value}`);
      }
    }
    return new PillarScoreSet(values);
  }

  static empty(): PillarScoreSet {
    return new PillarScoreSet({
      musclesAndVisceralFat: 0,
      cardioVascular: 0,
      sleep: 0,
      cognitive: 0,
      metabolic: 0,
      emotional: 0,
    });
  }

  pillar(key: PillarKey): number {
    return this[key];
  }

  toJSON(): PillarScoreRecord {
    return {
      musclesAndVisceralFat: this.musclesAndVisceralFat,
      cardioVascular: this.cardioVascular,
      sleep: this.sleep,
      cognitive: this.cognitive,
      metabolic: this.metabolic,
      emotional: this.emotional,
      overall: this.overall,
    };
  }
}
