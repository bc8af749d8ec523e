/**
 * Error types shared by the scraper, the store and the API.
 *
 * Missing markup on a page is never an error: extractors return null and log.
 * Everything here is either retryable (fetch), fatal for one URL, or fatal
 * for the process (configuration).
 */

export type ErrorCode =
  | 'CONFIGURATION_ERROR'
  | 'HTTP_STATUS'
  | 'FETCH_FAILED'
  | 'STORE_ERROR'
  | 'NOT_FOUND'
  | 'RECONCILE_FAILED';

export class AppError extends Error {
  readonly code: ErrorCode;
  readonly statusCode: number;
  readonly isRetryable: boolean;

  constructor(
    message: string,
    { code, statusCode = 500, isRetryable = false, cause }: {
      code: ErrorCode;
      statusCode?: number;
      isRetryable?: boolean;
      cause?: unknown;
    },
  ) {
    super(message, { cause });
    this.name = new.target.name;
    this.code = code;
    this.statusCode = statusCode;
    this.isRetryable = isRetryable;
  }
}

export class ConfigError extends AppError {
  constructor(message: string, readonly issues: string[] = []) {
    super(message, { code: 'CONFIGURATION_ERROR' });
  }
}

/** A response outside 2xx. Retryable. */
export class HttpStatusError extends AppError {
  constructor(readonly url: string, readonly status: number) {
    super(`HTTP ${status} for ${url}`, { code: 'HTTP_STATUS', statusCode: 502, isRetryable: true });
  }
}

/** Every fetch attempt for a URL failed. */
export class FetchError extends AppError {
  constructor(
    readonly url: string,
    readonly attempts: number,
    readonly status: number | null,
    cause: unknown,
  ) {
    super(`Failed to fetch ${url} after ${attempts} attempt(s): ${errorMessage(cause)}`, {
      code: 'FETCH_FAILED',
      statusCode: 502,
      cause,
    });
  }
}

export class StoreError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, { code: 'STORE_ERROR', cause });
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, { code: 'NOT_FOUND', statusCode: 404 });
  }
}

export class ReconcileError extends AppError {
  constructor(message: string, readonly address: string) {
    super(message, { code: 'RECONCILE_FAILED' });
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === 'string') return err;
  return String(err);
}
