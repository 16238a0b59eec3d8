import { extractAnswers, extractUserName } from '../healthScore/answers';
import { HealthScorer } from '../healthScore/scoring';
import { errorMessage, safeLogger } from '../../security/safeLogger';
import { HealthScoreOrchestrator } from './orchestration.service';
import { ProcessingResult } from './reports.types';

/** Payload (object or JSON text) → display name and scores → report artifacts. */
export class ProcessingService {
  constructor(
    private scorer: HealthScorer,
    private orchestrator: HealthScoreOrchestrator,
    private nameFieldRef: string
  ) {}

  async processPayload(payload: unknown, sourceName?: string): Promise<ProcessingResult> {
    try {
      const userName = extractUserName(payload, this.nameFieldRef);
      const scores = this.scorer.score(extractAnswers(payload));
      const result = await this.orchestrator.process(scores, userName);
      if (!result.success) return result;

      safeLogger.info('report.generated', { source: sourceName, overall: scores.overall });
      return { ...result, message: 'JSON processed successfully' };
    } catch (err) {
      safeLogger.error('report.process.failed', { source: sourceName, reason: errorMessage(err) });
      return { success: false, message: `Error processing JSON: ${errorMessage(err)}` };
    }
  }

  /** Text that does not parse is scored as an empty payload. */
  async processJson(text: string, sourceName?: string): Promise<ProcessingResult> {
    let payload: unknown = {};
    try {
      payload = JSON.parse(text);
    } catch (err) {
      safeLogger.warn('report.payload.unparseable', { source: sourceName, reason: errorMessage(err) });
    }
    return this.processPayload(payload, sourceName);
  }
}
