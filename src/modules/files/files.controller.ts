import path from 'path';
import { Request, Response } from 'express';
import { Services } from '../../container';
import { HttpError } from '../../middleware/httpError';
import { extractRecipientEmail } from '../healthScore/answers';
import { reportBody, reportSubject } from '../email/email.template';
import { recipientQuerySchema } from '../email/email.validators';
import { ReportArtifacts } from '../reports/reports.types';
import { processFileSchema } from './files.validators';

export function reportUrls(data: ReportArtifacts): { pdfUrl: string; chartUrl: string } {
  return {
    pdfUrl: `/api/download-pdf?path=${encodeURIComponent(path.basename(data.pdfPath))}`,
    chartUrl: `/api/view-chart?path=${encodeURIComponent(path.basename(data.chartPath))}`,
  };
}

export function createFilesController({ payloads, processing, email, config }: Services) {
  async function list(_req: Request, res: Response) {
    const files = await payloads.list();
    return res.json({ success: true, files });
  }

  async function get(req: Request, res: Response) {
    const stored = await payloads.read(req.params.filename);
    if (!stored.found) throw new HttpError(404, 'File not found');
    return res.json({ success: true, fileName: stored.fileName, content: stored.content });
  }

  async function processFile(req: Request, res: Response) {
    const body = processFileSchema.safeParse(req.body);
    if (!body.success) throw new HttpError(400, 'Invalid request body', 'Expected a JSON object');

    const fileName = path.basename(req.params.filename);
    const text = await payloads.readText(fileName);
    if (text === undefined) throw new HttpError(404, 'File not found');

    const result = await processing.processJson(text, fileName);
    if (!result.success) return res.status(500).json(result);

    const { pdfUrl, chartUrl } = reportUrls(result.data);
    if (body.data.outputFormat === 'html') {
      return res.json({ success: true, message: result.message, chartUrl, data: result.data });
    }
    return res.json({ success: true, message: result.message, pdfUrl, chartUrl, pdfPath: result.data.pdfPath, data: result.data });
  }

  async function emailFile(req: Request, res: Response) {
    if (!email.enabled) {
      throw new HttpError(500, 'Email service not available', 'Set SMTP_HOST to enable email delivery');
    }
    const query = recipientQuerySchema.safeParse(req.query);
    if (!query.success) throw new HttpError(400, 'Invalid email address', query.error.issues[0]?.message);

    const stored = await payloads.read(req.params.filename);
    if (!stored.found) throw new HttpError(404, 'File not found or could not be read');

    // the submission's own address wins over the query override
    const toEmail = extractRecipientEmail(stored.content, config.fieldRefs.email) ?? query.data.email;
    if (!toEmail) {
      throw new HttpError(400, 'No email address found', 'Could not extract email from file and no email provided as query parameter');
    }

    const text = await payloads.readText(stored.fileName);
    if (text === undefined) throw new HttpError(404, 'File not found or could not be read');
    const result = await processing.processJson(text, stored.fileName);
    if (!result.success) {
      return res.status(500).json({ success: false, error: 'Failed to process file', details: result.details ?? result.message });
    }

    const { pdfPath, chartPath, userName, pillarScores } = result.data;
    const emailResult = await email.sendReport({
      toEmail,
      subject: reportSubject(stored.fileName),
      body: reportBody(userName),
      pdfPath,
      chartPath,
      scores: pillarScores,
      userName,
    });

    return res.json({
      success: emailResult.success,
      message: emailResult.success ? 'Email sent successfully' : 'Failed to send email',
      fileName: stored.fileName,
      emailResult,
      toEmail,
    });
  }

  return { list, get, processFile, emailFile };
}
