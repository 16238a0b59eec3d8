import { Request, Response } from 'express';
import { Services } from '../../container';
import { HttpError } from '../../middleware/httpError';
import { extractRecipientEmail } from '../healthScore/answers';
import { reportBody, reportSubject } from '../email/email.template';
import { recipientQuerySchema } from '../email/email.validators';
import { downloadFile } from '../reports/reports.controller';
import { ProcessingResult } from '../reports/reports.types';

const today = () => new Date().toISOString().slice(0, 10);

export function createWebhookController({ payloads, processing, email, config }: Services) {
  async function saveAndProcess(payload: unknown): Promise<{ fileName: string; processingResult: ProcessingResult }> {
    const fileName = await payloads.save(payload);
    const processingResult = await processing.processPayload(payload, fileName);
    return { fileName, processingResult };
  }

  async function receive(req: Request, res: Response) {
    const { fileName, processingResult } = await saveAndProcess(req.body);
    return res.json({
      success: true,
      message: 'Webhook received, saved, and processed successfully',
      fileName,
      processingResult,
    });
  }

  async function receiveToPdf(req: Request, res: Response) {
    const { fileName, processingResult } = await saveAndProcess(req.body);
    if (!processingResult.success) {
      return res.status(500).json({ success: false, error: 'Failed to generate PDF from webhook data', fileName, processingResult });
    }
    const { pdfPath } = processingResult.data;
    res.setHeader('X-Webhook-File', fileName);
    await downloadFile(res, pdfPath);
  }

  async function receiveToEmail(req: Request, res: Response) {
    const query = recipientQuerySchema.safeParse(req.query);
    if (!query.success) throw new HttpError(400, 'Invalid email address', query.error.issues[0]?.message);

    const { fileName, processingResult } = await saveAndProcess(req.body);
    if (!processingResult.success) {
      return res.status(500).json({ success: false, error: 'Failed to generate PDF from webhook data', fileName, processingResult });
    }

    const toEmail = query.data.email ?? extractRecipientEmail(req.body, config.fieldRefs.email);
    if (!toEmail) {
      throw new HttpError(
        400,
        'No email address provided or found in payload',
        `Pass ?email= or include an email answer with ref ${config.fieldRefs.email}`
      );
    }

    const { pdfPath, userName } = processingResult.data;
    const emailResult = await email.sendReport({
      toEmail,
      subject: reportSubject(today()),
      body: reportBody(userName),
      pdfPath,
    });

    return res.json({
      success: emailResult.success,
      message: emailResult.success ? 'Webhook processed and email sent successfully' : 'Failed to send email',
      fileName,
      processingResult,
      emailResult,
    });
  }

  return { receive, receiveToPdf, receiveToEmail };
}
