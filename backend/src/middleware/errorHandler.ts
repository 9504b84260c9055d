import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { ZodError } from 'zod';
import { loggers } from '../config/logger';
import { AppError } from '../lib/errors';

const log = loggers.server;

/** Forward rejected promises from async handlers to the error middleware. */
export function asyncHandler(
  handler: (req: Request, res: Response) => Promise<void>,
): RequestHandler {
  return (req, res, next) => {
    handler(req, res).catch(next);
  };
}

export function notFound(_req: Request, res: Response): void {
  res.status(404).json({ error: 'Endpoint not found' });
}

function describeZodError(err: ZodError): string {
  return err.issues
    .map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

export function errorHandler(
  err: unknown,
  req: Request,
  res: Response,
  // Express recognises error middleware by its four parameters.
  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  _next: NextFunction,
): void {
  if (err instanceof ZodError) {
    res.status(400).json({ success: false, error: describeZodError(err) });
    return;
  }

  if (err instanceof AppError) {
    if (err.statusCode >= 500) {
      log.error({ path: req.path, code: err.code, err: err.message }, 'request error');
    }
    res.status(err.statusCode).json({
      success: false,
      error: err.message,
      code: err.code,
    });
    return;
  }

  if (err instanceof SyntaxError && 'body' in err) {
    res.status(400).json({ success: false, error: 'Malformed JSON body' });
    return;
  }

  log.error({ path: req.path, err }, 'unhandled error');
  res.status(500).json({ error: 'Internal server error' });
}
