// Error taxonomy shared by the Freshdesk and SharePoint clients

export type ServiceName = 'freshdesk' | 'sharepoint';

export class MigrationError extends Error {
  readonly retryable: boolean;
  readonly statusCode?: number;

  constructor(message: string, options: { retryable?: boolean; statusCode?: number; cause?: unknown } = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = new.target.name;
    this.retryable = options.retryable ?? false;
    this.statusCode = options.statusCode;
  }
}

/**
 * Bad credentials or missing permission. Aborts the run.
 */
export class AuthenticationError extends MigrationError {
  constructor(message: string, statusCode?: number) {
    super(message, { statusCode });
  }
}

export class RateLimitError extends MigrationError {
  /** Delay requested by the server, when it sent one */
  readonly retryAfterMs?: number;

  constructor(message: string, retryAfterMs?: number, statusCode = 429) {
    super(message, { retryable: true, statusCode });
    this.retryAfterMs = retryAfterMs;
  }
}

export class TransientNetworkError extends MigrationError {
  constructor(message: string, options: { statusCode?: number; cause?: unknown } = {}) {
    super(message, { retryable: true, ...options });
  }
}

/**
 * Remote resource is gone, e.g. an attachment URL whose signature expired.
 */
export class NotFoundError extends MigrationError {
  constructor(message: string, statusCode = 404) {
    super(message, { statusCode });
  }
}

export class QuotaExceededError extends MigrationError {
  constructor(message: string, statusCode = 507) {
    super(message, { statusCode });
  }
}

/**
 * Any other non-retryable API failure: 400, 409, or a payload that does not
 * have the expected shape
 */
export class ApiError extends MigrationError {
  constructor(message: string, statusCode?: number) {
    super(message, { statusCode });
  }
}

/**
 * Unreadable or malformed local input, such as a corrupt snapshot file.
 */
export class InvalidInputError extends MigrationError {}

/**
 * Parse a Retry-After header given in seconds or as an HTTP date.
 */
export function parseRetryAfter(value: string | null, now: number = Date.now()): number | undefined {
  if (!value) {
    return undefined;
  }

  const seconds = Number(value);
  if (Number.isFinite(seconds) && seconds >= 0) {
    return seconds * 1000;
  }

  const date = Date.parse(value);
  if (!Number.isNaN(date)) {
    return Math.max(0, date - now);
  }

  return undefined;
}

/**
 * Map a failed HTTP response onto the error taxonomy.
 */
export function errorFromResponse(
  service: ServiceName,
  status: number,
  body: string,
  retryAfter: string | null,
  operation: string
): MigrationError {
  const detail = body ? `: ${body.slice(0, 500)}` : '';
  const message = `${service} ${operation} failed with HTTP ${status}${detail}`;

  if (status === 401 || status === 403) {
    return new AuthenticationError(message, status);
  }
  if (status === 404 || status === 410) {
    return new NotFoundError(message, status);
  }
  if (status === 429) {
    return new RateLimitError(message, parseRetryAfter(retryAfter), status);
  }
  if (status === 507) {
    return new QuotaExceededError(message, status);
  }
  if (status >= 500) {
    // SharePoint throttles with 503 + Retry-After
    if (status === 503 && retryAfter) {
      return new RateLimitError(message, parseRetryAfter(retryAfter), status);
    }
    return new TransientNetworkError(message, { statusCode: status });
  }

  return new ApiError(message, status);
}

/**
 * Wrap a failure thrown by fetch itself (DNS, refused connection, reset socket).
 */
export function networkError(service: ServiceName, operation: string, error: unknown): TransientNetworkError {
  const reason = error instanceof Error ? error.message : String(error);
  return new TransientNetworkError(`${service} ${operation} failed: ${reason}`, { cause: error });
}

export function isRetryableError(error: Error): boolean {
  return error instanceof MigrationError && error.retryable;
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
