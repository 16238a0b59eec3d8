import fs from 'fs/promises';
import { createWriteStream } from 'fs';
import path from 'path';
import { finished } from 'stream/promises';
import PDFDocument from 'pdfkit';
import { PILLAR_KEYS } from '../healthScore/healthScore.types';
import { PILLAR_DEFINITIONS } from '../healthScore/pillars';
import { artifactName } from '../../storage/artifactNames';
import { fileExists } from '../../storage/files';
import { safeLogger } from '../../security/safeLogger';
import { DocumentInput, DocumentRenderer } from './reports.types';

const INCH = 72;
const CHART_SIZE = 6 * INCH;
const LABEL_COLUMN = 4 * INCH;
const SCORE_COLUMN = 1 * INCH;
const ROW_HEIGHT = 24;
const HEADER_FILL = '#90ee90';

const pad = (value: number) => String(value).padStart(2, '0');

/** Local `YYYY-MM-DD HH:MM:SS`. */
export function formatReportDate(date: Date): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  return `${day} ${time}`;
}

/** Label/score rows for the report table, overall last. */
export function scoreRows(input: DocumentInput): Array<[string, string]> {
  const labels = new Map(PILLAR_DEFINITIONS.map((pillar) => [pillar.key, pillar.label]));
  const rows: Array<[string, string]> = PILLAR_KEYS.map((key) => [labels.get(key) ?? key, String(input.scores.pillar(key))]);
  rows.push(['Overall Score', String(input.scores.overall)]);
  return rows;
}

export class PdfReportRenderer implements DocumentRenderer {
  constructor(
    private reportDir: string,
    private clock: () => Date = () => new Date()
  ) {}

  async render(input: DocumentInput): Promise<string> {
    await fs.mkdir(this.reportDir, { recursive: true });
    const filePath = path.join(this.reportDir, artifactName('report', 'pdf'));
    const includeChart = await fileExists(input.chartPath);
    if (!includeChart) {
      safeLogger.warn('report.chart.missing', { chartPath: input.chartPath });
    }

    const doc = new PDFDocument({ size: 'LETTER', margin: INCH, info: { Title: 'Your Health Score Report' } });
    const out = createWriteStream(filePath);
    doc.pipe(out);

    try {
      this.draw(doc, input, includeChart);
    } catch (err) {
      out.destroy();
      throw err;
    }

    doc.end();
    await finished(out);
    return filePath;
  }

  private draw(doc: PDFKit.PDFDocument, input: DocumentInput, includeChart: boolean): void {
    const contentWidth = doc.page.width - 2 * INCH;

    doc.font('Helvetica-Bold').fontSize(24).text('Your Health Score Report', { align: 'center' });
    doc.moveDown(1);
    doc.font('Helvetica-Bold').fontSize(16).text(`User: ${input.userName}`, { align: 'center' });
    doc.moveDown(0.5);
    doc.text(`Date: ${formatReportDate(this.clock())}`, { align: 'center' });
    doc.moveDown(1.5);

    if (includeChart) {
      const top = doc.y;
      doc.image(input.chartPath, INCH + (contentWidth - CHART_SIZE) / 2, top, { width: CHART_SIZE, height: CHART_SIZE });
      doc.y = top + CHART_SIZE + INCH / 2;
    }

    const rows = scoreRows(input);
    const tableHeight = (rows.length + 1) * ROW_HEIGHT + 40;
    if (doc.y + tableHeight > doc.page.height - INCH) {
      doc.addPage();
    }

    doc.x = INCH;
    doc.font('Helvetica-Bold').fontSize(16).text('Detailed Health Scores', INCH, doc.y, { align: 'left' });
    doc.moveDown(0.75);

    const tableX = INCH + (contentWidth - LABEL_COLUMN - SCORE_COLUMN) / 2;
    let rowY = doc.y;
    const drawRow = (label: string, score: string, header: boolean) => {
      if (header) {
        doc.rect(tableX, rowY, LABEL_COLUMN + SCORE_COLUMN, ROW_HEIGHT).fill(HEADER_FILL);
      }
      doc.lineWidth(1).strokeColor('#000000');
      doc.rect(tableX, rowY, LABEL_COLUMN, ROW_HEIGHT).stroke();
      doc.rect(tableX + LABEL_COLUMN, rowY, SCORE_COLUMN, ROW_HEIGHT).stroke();
      doc.fillColor('#000000').font(header ? 'Helvetica-Bold' : 'Helvetica').fontSize(header ? 12 : 11);
      doc.text(label, tableX + 6, rowY + 7, { width: LABEL_COLUMN - 12, align: header ? 'center' : 'left' });
      doc.text(score, tableX + LABEL_COLUMN, rowY + 7, { width: SCORE_COLUMN, align: 'center' });
      rowY += ROW_HEIGHT;
    };

    drawRow('Health Pillar', 'Score', true);
    rows.forEach(([label, score]) => drawRow(label, score, false));
  }
}
