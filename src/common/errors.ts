/**
 * Application error hierarchy.
 *
 * Every error the monitor raises on purpose carries a stable `code` and the
 * HTTP status the API layer should answer with.
 */

export class AppError extends Error {
  readonly code: string;
  readonly statusCode: number;

  constructor(code: string, message: string, statusCode = 500) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.statusCode = statusCode;
  }
}

/**
 * Configuration document missing, unparsable or invalid. Fatal at startup.
 */
export class ConfigError extends AppError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super('CONFIG_ERROR', message, 500);
    this.issues = issues;
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super('VALIDATION_ERROR', message, 400);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super('NOT_FOUND', message, 404);
  }
}

export class FredFetchError extends AppError {
  readonly seriesId: string;
  readonly httpStatus?: number;

  constructor(seriesId: string, message: string, httpStatus?: number) {
    super('FRED_FETCH_FAILED', `FRED fetch failed for ${seriesId}: ${message}`, 502);
    this.seriesId = seriesId;
    this.httpStatus = httpStatus;
  }
}

/**
 * Extracts a printable message from anything thrown.
 */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === 'string') return err;
  return String(err);
}
