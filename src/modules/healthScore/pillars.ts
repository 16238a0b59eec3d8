import { PillarKey } from './healthScore.types';

export type PillarDefinition = {
  key: PillarKey;
  label: string;
  /** Question refs in evaluation order. */
  questionRefs: readonly string[];
};

export const PILLAR_DEFINITIONS: readonly PillarDefinition[] = [
  {
    key: 'musclesAndVisceralFat',
    label: 'Muscles and Visceral Fat',
    questionRefs: [
      'aa24a4d2-b1f2-408b-9d4a-4be80ec7508d', // waist circumference
      '9c968d6d-e21b-448a-b8fb-30056f76ffff', // waist-hip ratio
    ],
  },
  {
    key: 'cardioVascular',
    label: 'Cardiovascular Health',
    questionRefs: [
      '27181fef-736e-4bee-ad31-7d8e983d61b3', // systolic
      'ceb0b561-1793-43f1-9c76-11cc3964e48a', // diastolic
    ],
  },
  {
    key: 'sleep',
    label: 'Sleep',
    questionRefs: [
      'ccc73a31-d4f8-4856-8ebb-27647ff39a97', // duration
      '50b96cb1-243e-454b-aa01-0e8990fc507d', // quality
    ],
  },
  {
    key: 'cognitive',
    label: 'Cognitive Health',
    questionRefs: [
      'c714f3fd-a4ff-449b-9946-7badbdc59e03', // memory function score
      '15045302-e327-4069-bc9d-d0c0ab3cfaaa', // noticed memory changes
    ],
  },
  {
    key: 'metabolic',
    label: 'Metabolic Health',
    questionRefs: ['f9a247fc-e8d3-4bd8-b7e1-ae54f6766993'], // protein intake
  },
  {
    key: 'emotional',
    label: 'Emotional Well-being',
    questionRefs: ['2c99731f-7ee5-4181-82b5-48a4d876df59'], // sense of purpose
  },
];

/** Short axis labels for the radar chart. */
export const CHART_LABELS: Record<PillarKey, string> = {
  musclesAndVisceralFat: 'Muscles & Visceral Fat',
  cardioVascular: 'Cardiovascular',
  sleep: 'Sleep',
  cognitive: 'Cognitive',
  metabolic: 'Metabolic',
  emotional: 'Emotional',
};
