import type { NextFunction, Request, Response } from 'express';
import { loggers } from '../config/logger';

const log = loggers.server;

const SKIP_PATHS = new Set(['/health', '/favicon.ico']);

/**
 * One structured log line per request, written when the response finishes.
 */
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  if (SKIP_PATHS.has(req.path)) {
    next();
    return;
  }

  const start = process.hrtime.bigint();
  res.on('finish', () => {
    const durationMs = Number(process.hrtime.bigint() - start) / 1e6;
    const entry = {
      method: req.method,
      path: req.path,
      status: res.statusCode,
      durationMs: Math.round(durationMs * 100) / 100,
    };
    if (res.statusCode >= 500) log.error(entry, 'request failed');
    else if (res.statusCode >= 400) log.warn(entry, 'request rejected');
    else log.info(entry, 'request completed');
  });
  next();
}
