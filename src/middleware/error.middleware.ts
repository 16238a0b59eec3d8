import { NextFunction, Request, Response } from 'express';
import { HttpError } from './httpError';
import { errorMessage, safeLogger } from '../security/safeLogger';

function isBodyParseError(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'type' in err && err.type === 'entity.parse.failed';
}

function errorHandler(err: unknown, req: Request, res: Response, next: NextFunction) {
  if (res.headersSent) return next(err);

  if (err instanceof HttpError) {
    safeLogger.warn('http.request.failed', { method: req.method, path: req.path, status: err.status, reason: err.message });
    return res.status(err.status).json({ success: false, error: err.message, details: err.details });
  }

  if (isBodyParseError(err)) {
    safeLogger.warn('http.request.malformed', { method: req.method, path: req.path });
    return res.status(400).json({ success: false, error: 'Malformed JSON body', details: errorMessage(err) });
  }

  safeLogger.error('http.request.error', { method: req.method, path: req.path, reason: errorMessage(err) });
  return res.status(500).json({ success: false, error: 'Internal Server Error', details: errorMessage(err) });
}

export default errorHandler;
