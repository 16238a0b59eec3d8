import { PillarScoreSet } from '../healthScore/healthScore.types';

export interface ChartRenderer {
  /** Writes a radar chart image and resolves to its path. */
  render(scores: PillarScoreSet): Promise<string>;
}

export type DocumentInput = {
  scores: PillarScoreSet;
  chartPath: string;
  userName: string;
};

export interface DocumentRenderer {
  /** Writes the report document and resolves to its path. */
  render(input: DocumentInput): Promise<string>;
}

export type ReportArtifacts = {
  chartPath: string;
  pdfPath: string;
  userName: string;
  pillarScores: PillarScoreSet;
};

export type ProcessingResult =
  | { success: true; message: string; data: ReportArtifacts }
  | { success: false; message: string; details?: string };
