import { PillarScoreSet } from '../healthScore/healthScore.types';

export type ReportEmail = {
  toEmail: string;
  subject: string;
  body: string;
  pdfPath: string;
  html?: string;
  chartPath?: string;
  scores?: PillarScoreSet;
  userName?: string;
};

export type EmailResult =
  | {
      success: true;
      message: string;
      messageId: string;
      statusCode?: number;
      toEmail: string;
      subject: string;
    }
  | {
      success: false;
      error: string;
      details: string;
      errorType?: string;
      statusCode?: number;
      responseBody?: string;
    };
