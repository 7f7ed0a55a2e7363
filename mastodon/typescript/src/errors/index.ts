/**
 * Mastodon client error types and handling.
 *
 * Every failure the client reports is a {@link MastodonError}. Transport and
 * server failures carry enough detail (status, body, reset time) for the
 * caller to decide on a retry; the client itself never retries.
 */

/**
 * Error codes for Mastodon client errors.
 */
export enum MastodonErrorCode {
  // Transport
  Network = 'NETWORK',

  // Authentication
  Unauthorized = 'UNAUTHORIZED',
  Forbidden = 'FORBIDDEN',

  // HTTP classification
  NotFound = 'NOT_FOUND',
  RateLimited = 'RATE_LIMITED',
  ClientError = 'CLIENT_ERROR',
  ServerError = 'SERVER_ERROR',

  // Decoding and encoding
  MalformedResponse = 'MALFORMED_RESPONSE',
  ValidationError = 'VALIDATION_ERROR',

  // Local misuse
  ConfigurationError = 'CONFIGURATION_ERROR',
  CapabilityMatrix = 'CAPABILITY_MATRIX',
  InvalidCursor = 'INVALID_CURSOR',

  // Streaming
  Stream = 'STREAM',
}

/**
 * Outcome kinds reported by the streaming event reader.
 */
export enum StreamErrorKind {
  /** The server ended the connection. */
  Closed = 'CLOSED',
  /** One frame could not be decoded; the connection stays open. */
  Malformed = 'MALFORMED',
  /** The caller closed the reader while a read was pending. */
  Cancelled = 'CANCELLED',
  /** No frame arrived within the caller's timeout. */
  Timeout = 'TIMEOUT',
}

/**
 * Error body shape returned by the server.
 */
export interface MastodonApiErrorResponse {
  error?: string;
  error_description?: string;
}

export interface MastodonErrorOptions {
  code: MastodonErrorCode;
  message: string;
  statusCode?: number;
  retryable?: boolean;
  details?: Record<string, unknown>;
  cause?: unknown;
}

/**
 * Base Mastodon error class.
 */
export class MastodonError extends Error {
  /** Error code */
  readonly code: MastodonErrorCode;
  /** HTTP status code (if applicable) */
  readonly statusCode?: number;
  /** Whether a caller-side retry may succeed */
  readonly retryable: boolean;
  /** Additional error details */
  readonly details?: Record<string, unknown>;

  constructor(options: MastodonErrorOptions) {
    super(options.message, { cause: options.cause });
    // Subclasses report their own class name.
    this.name = new.target.name;
    this.code = options.code;
    this.statusCode = options.statusCode;
    this.retryable = options.retryable ?? false;
    this.details = options.details;
  }

  /**
   * Creates a JSON representation of the error.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      statusCode: this.statusCode,
      retryable: this.retryable,
      details: this.details,
    };
  }
}

// ============================================================================
// Transport Errors (Retryable)
// ============================================================================

/**
 * Connection failure, timeout or other transport-level error.
 */
export class NetworkError extends MastodonError {
  constructor(message: string, cause?: unknown) {
    super({
      code: MastodonErrorCode.Network,
      message: `Network error: ${message}`,
      retryable: true,
      cause,
    });
  }
}

// ============================================================================
// Authentication Errors (Non-Retryable)
// ============================================================================

/**
 * Missing, invalid or expired access token.
 */
export class UnauthorizedError extends MastodonError {
  constructor(message: string = 'Invalid or missing access token') {
    super({
      code: MastodonErrorCode.Unauthorized,
      message,
      statusCode: 401,
      retryable: false,
    });
  }
}

/**
 * The token lacks the scope or role the operation needs.
 */
export class ForbiddenError extends MastodonError {
  constructor(message: string = 'Not allowed to perform this operation') {
    super({
      code: MastodonErrorCode.Forbidden,
      message,
      statusCode: 403,
      retryable: false,
    });
  }
}

// ============================================================================
// HTTP Errors
// ============================================================================

/**
 * Resource not found.
 */
export class NotFoundError extends MastodonError {
  constructor(resource: string) {
    super({
      code: MastodonErrorCode.NotFound,
      message: `Resource not found: ${resource}`,
      statusCode: 404,
      retryable: false,
      details: { resource },
    });
  }
}

/**
 * Rate limited by the server. `resetAt` is set when the response said when
 * the limit resets.
 */
export class RateLimitedError extends MastodonError {
  readonly resetAt?: Date;

  constructor(resetAt?: Date) {
    super({
      code: MastodonErrorCode.RateLimited,
      message: resetAt
        ? `Rate limited until ${resetAt.toISOString()}`
        : 'Rate limited',
      statusCode: 429,
      retryable: true,
      details: resetAt ? { resetAt: resetAt.toISOString() } : undefined,
    });
    this.resetAt = resetAt;
  }

  /**
   * Milliseconds until the limit resets, measured from `now`.
   */
  retryAfterMs(now: number = Date.now()): number | undefined {
    return this.resetAt ? Math.max(0, this.resetAt.getTime() - now) : undefined;
  }
}

/**
 * Any other 4xx response.
 */
export class ClientError extends MastodonError {
  readonly status: number;
  readonly body: string;

  constructor(status: number, body: string, message?: string) {
    super({
      code: MastodonErrorCode.ClientError,
      message: message ?? `HTTP ${status}`,
      statusCode: status,
      retryable: false,
      details: { body },
    });
    this.status = status;
    this.body = body;
  }
}

/**
 * 5xx response.
 */
export class ServerError extends MastodonError {
  readonly status: number;
  readonly body: string;

  constructor(status: number, body: string, message: string = 'Mastodon server error') {
    super({
      code: MastodonErrorCode.ServerError,
      message,
      statusCode: status,
      retryable: true,
      details: { body },
    });
    this.status = status;
    this.body = body;
  }
}

// ============================================================================
// Decoding and Encoding Errors (Non-Retryable)
// ============================================================================

/**
 * The response did not match the entity shape declared for the target
 * generation.
 */
export class MalformedResponseError extends MastodonError {
  readonly detail: string;

  constructor(detail: string, cause?: unknown) {
    super({
      code: MastodonErrorCode.MalformedResponse,
      message: `Malformed response: ${detail}`,
      retryable: false,
      details: { detail },
      cause,
    });
    this.detail = detail;
  }
}

/**
 * A request value failed validation before anything was sent.
 */
export class ValidationError extends MastodonError {
  constructor(errors: string[]) {
    super({
      code: MastodonErrorCode.ValidationError,
      message: `Validation failed: ${errors.join(', ')}`,
      retryable: false,
      details: { errors },
    });
  }
}

// ============================================================================
// Local Errors (Non-Retryable)
// ============================================================================

/**
 * Configuration error.
 */
export class ConfigurationError extends MastodonError {
  constructor(message: string) {
    super({
      code: MastodonErrorCode.ConfigurationError,
      message: `Configuration error: ${message}`,
      retryable: false,
    });
  }
}

/**
 * Authoring mistake in the capability matrix or the entity model.
 */
export class CapabilityMatrixError extends MastodonError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({
      code: MastodonErrorCode.CapabilityMatrix,
      message,
      retryable: false,
      details,
    });
  }
}

/**
 * A page cursor was handed to an endpoint or server it did not come from.
 */
export class InvalidCursorError extends MastodonError {
  constructor(message: string) {
    super({
      code: MastodonErrorCode.InvalidCursor,
      message,
      retryable: false,
    });
  }
}

// ============================================================================
// Streaming Errors
// ============================================================================

/**
 * Outcome of a streaming read that did not produce an event.
 */
export class StreamError extends MastodonError {
  readonly kind: StreamErrorKind;

  constructor(kind: StreamErrorKind, message: string, cause?: unknown) {
    super({
      code: MastodonErrorCode.Stream,
      message,
      retryable: kind === StreamErrorKind.Closed || kind === StreamErrorKind.Timeout,
      details: { kind },
      cause,
    });
    this.kind = kind;
  }

  static closed(): StreamError {
    return new StreamError(StreamErrorKind.Closed, 'Stream closed by server');
  }

  static cancelled(): StreamError {
    return new StreamError(StreamErrorKind.Cancelled, 'Stream read cancelled');
  }

  static timeout(timeoutMs: number): StreamError {
    return new StreamError(StreamErrorKind.Timeout, `No event within ${timeoutMs}ms`);
  }

  static malformed(detail: string, cause?: unknown): StreamError {
    return new StreamError(StreamErrorKind.Malformed, `Malformed stream frame: ${detail}`, cause);
  }
}

// ============================================================================
// Error Parsing Utilities
// ============================================================================

/**
 * Reads a reset hint from rate limit headers: `X-RateLimit-Reset` carries an
 * ISO timestamp, `Retry-After` either seconds or an HTTP date.
 */
export function parseRateLimitReset(
  headers: Record<string, string>,
  now: number = Date.now()
): Date | undefined {
  const reset = headers['x-ratelimit-reset'];
  if (reset) {
    const at = Date.parse(reset);
    if (!Number.isNaN(at)) {
      return new Date(at);
    }
  }

  const retryAfter = headers['retry-after'];
  if (retryAfter) {
    const seconds = Number(retryAfter);
    if (retryAfter.trim() !== '' && Number.isFinite(seconds)) {
      return new Date(now + seconds * 1000);
    }
    const at = Date.parse(retryAfter);
    if (!Number.isNaN(at)) {
      return new Date(at);
    }
  }

  return undefined;
}

function errorMessageFrom(body: string): string | undefined {
  try {
    const parsed: unknown = JSON.parse(body);
    if (parsed && typeof parsed === 'object' && 'error' in parsed) {
      const { error } = parsed;
      return typeof error === 'string' ? error : undefined;
    }
  } catch {
    // plain-text or HTML error page
    return undefined;
  }
  return undefined;
}

/**
 * Classifies a non-2xx response into the appropriate error type.
 *
 * @param headers - response headers with lower-cased names
 */
export function parseApiError(
  statusCode: number,
  body: string,
  headers: Record<string, string> = {},
  resource: string = 'unknown'
): MastodonError {
  const message = errorMessageFrom(body);

  switch (statusCode) {
    case 401:
      return new UnauthorizedError(message);

    case 403:
      return new ForbiddenError(message);

    case 404:
      return new NotFoundError(resource);

    case 429:
      return new RateLimitedError(parseRateLimitReset(headers));

    default:
      if (statusCode >= 500) {
        return new ServerError(statusCode, body, message);
      }
      return new ClientError(statusCode, body, message);
  }
}

/**
 * Checks if an error is a Mastodon client error.
 */
export function isMastodonError(error: unknown): error is MastodonError {
  return error instanceof MastodonError;
}

/**
 * Checks if an error is retryable.
 */
export function isRetryableError(error: unknown): boolean {
  if (isMastodonError(error)) {
    return error.retryable;
  }
  // Network errors from fetch are typically retryable
  if (error instanceof TypeError && error.message.includes('fetch')) {
    return true;
  }
  return false;
}
