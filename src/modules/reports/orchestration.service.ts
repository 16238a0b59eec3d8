import { PillarScoreSet } from '../healthScore/healthScore.types';
import { errorMessage, safeLogger } from '../../security/safeLogger';
import { ChartRenderer, DocumentRenderer, ProcessingResult } from './reports.types';

export const ORCHESTRATION_FAILED = 'Failed to process health scores';

/**
 * Chart first, then the PDF that embeds it. A throw from either step becomes a
 * failure result; artifacts already written stay on disk.
 */
export class HealthScoreOrchestrator {
  constructor(
    private charts: ChartRenderer,
    private documents: DocumentRenderer
  ) {}

  async process(scores: PillarScoreSet, userName: string): Promise<ProcessingResult> {
    try {
      const chartPath = await this.charts.render(scores);
      const pdfPath = await this.documents.render({ scores, chartPath, userName });
      return {
        success: true,
        message: 'Health score report generated',
        data: { chartPath, pdfPath, userName, pillarScores: scores },
      };
    } catch (err) {
      const details = errorMessage(err);
      safeLogger.error('report.generate.failed', { reason: details });
      return { success: false, message: ORCHESTRATION_FAILED, details };
    }
  }
}
