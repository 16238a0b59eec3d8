import path from 'path';
import { SendMailOptions } from 'nodemailer';
import { errorMessage, safeLogger } from '../../security/safeLogger';
import { fileExists } from '../../storage/files';
import { CHART_CID, renderReportHtml } from './email.template';
import { EmailResult, ReportEmail } from './email.types';

/** The part of a nodemailer transporter the service needs. */
export interface MailTransport {
  sendMail(options: SendMailOptions): Promise<{ messageId?: string; response?: string }>;
}

/** Leading three-digit SMTP reply code, e.g. 250 from "250 2.0.0 OK". */
export function smtpStatus(response: string | undefined): number | undefined {
  const match = response ? /^(\d{3})\b/.exec(response) : null;
  return match ? Number(match[1]) : undefined;
}

/** nodemailer attaches SMTP diagnostics as extra properties on the error. */
export function describeSendError(err: unknown): Omit<Extract<EmailResult, { success: false }>, 'success' | 'error'> {
  const described: Omit<Extract<EmailResult, { success: false }>, 'success' | 'error'> = { details: errorMessage(err) };
  if (typeof err !== 'object' || err === null) return described;

  if ('responseCode' in err && typeof err.responseCode === 'number') described.statusCode = err.responseCode;
  if ('response' in err && typeof err.response === 'string') described.responseBody = err.response;
  if ('code' in err && typeof err.code === 'string') {
    described.errorType = err.code;
  } else if ('name' in err && typeof err.name === 'string') {
    described.errorType = err.name;
  }
  return described;
}

export class EmailService {
  constructor(
    private transport: MailTransport | null,
    private fromEmail: string
  ) {}

  get enabled(): boolean {
    return this.transport !== null;
  }

  /**
   * Sends the report PDF as an attachment. Without explicit HTML, scores are
   * rendered into an HTML body with the chart inline. Never throws.
   */
  async sendReport(email: ReportEmail): Promise<EmailResult> {
    if (!this.transport) {
      return {
        success: false,
        error: 'Email transport not configured',
        details: 'Set SMTP_HOST (and credentials) to enable email delivery',
      };
    }

    if (!(await fileExists(email.pdfPath))) {
      return {
        success: false,
        error: 'PDF file not found',
        details: `File not found: ${path.basename(email.pdfPath)}`,
      };
    }

    const chartAvailable = email.chartPath ? await fileExists(email.chartPath) : false;
    let html = email.html;
    if (!html && email.scores) {
      html = renderReportHtml({ userName: email.userName ?? 'User', scores: email.scores, withChart: chartAvailable });
    }

    const attachments: NonNullable<SendMailOptions['attachments']> = [
      { filename: path.basename(email.pdfPath), path: email.pdfPath, contentType: 'application/pdf' },
    ];
    if (html && chartAvailable && email.chartPath) {
      attachments.push({ filename: 'chart.png', path: email.chartPath, cid: CHART_CID, contentType: 'image/png' });
    }

    try {
      const info = await this.transport.sendMail({
        from: this.fromEmail,
        to: email.toEmail,
        subject: email.subject,
        text: email.body,
        html,
        attachments,
      });
      safeLogger.info('mail.sent', { messageId: info.messageId, toEmail: email.toEmail });
      return {
        success: true,
        message: 'Email sent successfully',
        messageId: info.messageId ?? '',
        statusCode: smtpStatus(info.response),
        toEmail: email.toEmail,
        subject: email.subject,
      };
    } catch (err) {
      const described = describeSendError(err);
      safeLogger.error('mail.send.failed', { toEmail: email.toEmail, errorType: described.errorType, reason: described.details });
      return { success: false, error: 'Failed to send email', ...described };
    }
  }
}
