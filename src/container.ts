import { AppConfig } from './config';
import { createMailTransport } from './mailer';
import { EmailService, MailTransport } from './modules/email/email.service';
import { LookupTable } from './modules/healthScore/lookupTable';
import { HealthScorer } from './modules/healthScore/scoring';
import { RadarChartRenderer } from './modules/reports/chart.service';
import { HealthScoreOrchestrator } from './modules/reports/orchestration.service';
import { PdfReportRenderer } from './modules/reports/pdf.service';
import { ProcessingService } from './modules/reports/processing.service';
import { ChartRenderer, DocumentRenderer } from './modules/reports/reports.types';
import { PayloadStore } from './storage/payloadStore';
import { safeLogger } from './security/safeLogger';

export type Services = {
  config: AppConfig;
  payloads: PayloadStore;
  processing: ProcessingService;
  email: EmailService;
};

export type ServiceOverrides = {
  charts?: ChartRenderer;
  documents?: DocumentRenderer;
  /** `null` disables email regardless of SMTP settings. */
  mailTransport?: MailTransport | null;
};

/** Builds every collaborator once; routers receive the result. */
export function createServices(config: AppConfig, lookups: LookupTable, overrides: ServiceOverrides = {}): Services {
  const charts = overrides.charts ?? new RadarChartRenderer(config.storage.chartDir);
  const documents = overrides.documents ?? new PdfReportRenderer(config.storage.reportDir);
  const orchestrator = new HealthScoreOrchestrator(charts, documents);
  const processing = new ProcessingService(new HealthScorer(lookups), orchestrator, config.fieldRefs.name);

  let mailTransport: MailTransport | null;
  if (overrides.mailTransport !== undefined) {
    mailTransport = overrides.mailTransport;
  } else {
    mailTransport = config.smtp ? createMailTransport(config.smtp) : null;
  }
  if (!mailTransport) {
    safeLogger.warn('mail.disabled', { reason: 'SMTP_HOST not set' });
  }

  return {
    config,
    payloads: new PayloadStore(config.storage.payloadDir),
    processing,
    email: new EmailService(mailTransport, config.fromEmail),
  };
}
