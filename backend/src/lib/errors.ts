/**
 * Typed application errors.
 *
 * Each error carries the HTTP status the API layer should answer with and a
 * stable machine-readable code. Anything that is not an AppError is treated
 * as an internal failure.
 */

export type ErrorCode =
  | 'VALIDATION_FAILED'
  | 'UNSUPPORTED_PLATFORM'
  | 'BLOCKED'
  | 'FETCH_FAILED'
  | 'TIMEOUT'
  | 'EXTRACTION_FAILED'
  | 'NOT_FOUND'
  | 'INTERNAL_ERROR';

export class AppError extends Error {
  readonly statusCode: number;
  readonly code: ErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    statusCode: number,
    code: ErrorCode,
    details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 400, 'VALIDATION_FAILED', details);
  }
}

export class UnsupportedPlatformError extends AppError {
  constructor(platform: string) {
    super(`Unsupported platform: ${platform}`, 400, 'UNSUPPORTED_PLATFORM', {
      platform,
    });
  }
}

/** The target answered with an anti-bot wall (CAPTCHA, robot check, 403/429/503). */
export class BlockedError extends AppError {
  constructor(url: string, status?: number) {
    super(
      `Request to ${url} was blocked by anti-bot protection${status ? ` (HTTP ${status})` : ''}`,
      502,
      'BLOCKED',
      { url, status },
    );
  }
}

export class FetchError extends AppError {
  readonly status?: number;

  constructor(url: string, reason: string, status?: number, timedOut = false) {
    super(
      `Failed to fetch ${url}: ${reason}`,
      timedOut ? 504 : 502,
      timedOut ? 'TIMEOUT' : 'FETCH_FAILED',
      { url, status },
    );
    this.status = status;
  }

  get retryable(): boolean {
    return this.status === undefined || this.status >= 500;
  }
}

export class ExtractionError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 502, 'EXTRACTION_FAILED', details);
  }
}

export function getErrorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
