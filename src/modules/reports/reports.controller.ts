import fs from 'fs/promises';
import path from 'path';
import { Request, Response } from 'express';
import { Services } from '../../container';
import { safeFileName } from '../../storage/payloadStore';

/** Resolves `?path=` to a file inside `dir` by base name; null when absent. */
export async function resolveArtifact(dir: string, requested: unknown, extension: string): Promise<string | null> {
  if (typeof requested !== 'string') return null;
  const name = safeFileName(requested);
  if (!name || path.extname(name).toLowerCase() !== extension) return null;
  const filePath = path.join(dir, name);
  try {
    const stat = await fs.stat(filePath);
    return stat.isFile() ? filePath : null;
  } catch {
    return null;
  }
}

/** `res.download` as a promise, so stream errors reach the error middleware. */
export function downloadFile(res: Response, filePath: string): Promise<void> {
  return new Promise((resolve, reject) => {
    res.download(filePath, path.basename(filePath), (err) => (err ? reject(err) : resolve()));
  });
}

export function createReportsController({ config }: Services) {
  async function downloadPdf(req: Request, res: Response) {
    const filePath = await resolveArtifact(config.storage.reportDir, req.query.path, '.pdf');
    if (!filePath) {
      return res.status(404).json({ success: false, message: 'PDF file not found or path is invalid' });
    }
    await downloadFile(res, filePath);
  }

  async function viewChart(req: Request, res: Response) {
    const filePath = await resolveArtifact(config.storage.chartDir, req.query.path, '.png');
    if (!filePath) {
      return res.status(404).json({ success: false, message: 'Chart file not found or path is invalid' });
    }
    await new Promise<void>((resolve, reject) => {
      res.type('png').sendFile(filePath, (err) => (err ? reject(err) : resolve()));
    });
  }

  return { downloadPdf, viewChart };
}
