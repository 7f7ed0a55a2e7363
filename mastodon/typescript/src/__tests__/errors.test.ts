/**
 * Tests for Mastodon error types.
 */

import {
  ClientError,
  ConfigurationError,
  ForbiddenError,
  InvalidCursorError,
  MalformedResponseError,
  MastodonError,
  MastodonErrorCode,
  NetworkError,
  NotFoundError,
  RateLimitedError,
  ServerError,
  StreamError,
  StreamErrorKind,
  UnauthorizedError,
  ValidationError,
  isMastodonError,
  isRetryableError,
  parseApiError,
  parseRateLimitReset,
} from '../index.js';

describe('MastodonError', () => {
  it('should create a basic error', () => {
    const error = new MastodonError({
      code: MastodonErrorCode.ClientError,
      message: 'Test error',
    });

    expect(error.code).toBe(MastodonErrorCode.ClientError);
    expect(error.message).toBe('Test error');
    expect(error.retryable).toBe(false);
  });

  it('should serialize to JSON', () => {
    const error = new NotFoundError('/api/v1/statuses/1');

    expect(error.toJSON()).toEqual({
      name: 'NotFoundError',
      code: MastodonErrorCode.NotFound,
      message: 'Resource not found: /api/v1/statuses/1',
      statusCode: 404,
      retryable: false,
      details: { resource: '/api/v1/statuses/1' },
    });
  });
});

describe('Transport and HTTP errors', () => {
  it('should keep the cause of a network error', () => {
    const cause = new Error('Connection refused');
    const error = new NetworkError('Connection refused', cause);

    expect(error.code).toBe(MastodonErrorCode.Network);
    expect(error.message).toBe('Network error: Connection refused');
    expect(error.retryable).toBe(true);
    expect(error.cause).toBe(cause);
  });

  it('should create authentication errors', () => {
    expect(new UnauthorizedError().statusCode).toBe(401);
    expect(new UnauthorizedError().message).toBe('Invalid or missing access token');
    expect(new ForbiddenError().statusCode).toBe(403);
    expect(new ForbiddenError().retryable).toBe(false);
  });

  it('should keep status and body of client and server errors', () => {
    const client = new ClientError(422, '{"error":"Invalid"}');
    expect(client.message).toBe('HTTP 422');
    expect(client.details).toEqual({ body: '{"error":"Invalid"}' });
    expect(client.retryable).toBe(false);

    const server = new ServerError(502, 'Bad Gateway');
    expect(server.status).toBe(502);
    expect(server.retryable).toBe(true);
  });

  describe('RateLimitedError', () => {
    it('should report the time until reset', () => {
      const error = new RateLimitedError(new Date(5000));

      expect(error.message).toBe('Rate limited until 1970-01-01T00:00:05.000Z');
      expect(error.retryAfterMs(2000)).toBe(3000);
      expect(error.retryAfterMs(6000)).toBe(0);
    });

    it('should work without a reset time', () => {
      const error = new RateLimitedError();

      expect(error.message).toBe('Rate limited');
      expect(error.retryAfterMs()).toBeUndefined();
      expect(error.details).toBeUndefined();
    });
  });
});

describe('Local errors', () => {
  it('should prefix configuration errors', () => {
    expect(new ConfigurationError('bad config').message).toBe('Configuration error: bad config');
  });

  it('should list every validation failure', () => {
    const error = new ValidationError(['a: Required', 'b: Expected string, received number']);

    expect(error.message).toBe('Validation failed: a: Required, b: Expected string, received number');
    expect(error.details).toEqual({ errors: ['a: Required', 'b: Expected string, received number'] });
  });

  it('should keep the detail of a malformed response', () => {
    const error = new MalformedResponseError('status.id: Required');

    expect(error.detail).toBe('status.id: Required');
    expect(error.message).toBe('Malformed response: status.id: Required');
  });

  it('should not retry an invalid cursor', () => {
    expect(new InvalidCursorError('No next page available').retryable).toBe(false);
  });
});

describe('StreamError', () => {
  it('should mark closed and timed out reads as retryable', () => {
    expect(StreamError.closed().retryable).toBe(true);
    expect(StreamError.timeout(50).retryable).toBe(true);
    expect(StreamError.cancelled().retryable).toBe(false);
    expect(StreamError.malformed('x').retryable).toBe(false);
  });

  it('should carry its kind', () => {
    const error = StreamError.malformed('update: payload is not valid JSON');

    expect(error.kind).toBe(StreamErrorKind.Malformed);
    expect(error.details).toEqual({ kind: StreamErrorKind.Malformed });
    expect(error.message).toBe('Malformed stream frame: update: payload is not valid JSON');
  });
});

describe('parseRateLimitReset', () => {
  it('should read an ISO reset timestamp', () => {
    const reset = parseRateLimitReset({ 'x-ratelimit-reset': '2030-01-01T00:00:00.000Z' });
    expect(reset?.toISOString()).toBe('2030-01-01T00:00:00.000Z');
  });

  it('should read Retry-After seconds relative to now', () => {
    expect(parseRateLimitReset({ 'retry-after': '30' }, 1000)?.getTime()).toBe(31000);
  });

  it('should read a Retry-After HTTP date', () => {
    const reset = parseRateLimitReset({ 'retry-after': 'Wed, 21 Oct 2015 07:28:00 GMT' });
    expect(reset?.toISOString()).toBe('2015-10-21T07:28:00.000Z');
  });

  it('should ignore values it cannot read', () => {
    expect(parseRateLimitReset({ 'retry-after': 'soon' })).toBeUndefined();
    expect(parseRateLimitReset({ 'retry-after': ' ' })).toBeUndefined();
    expect(parseRateLimitReset({})).toBeUndefined();
  });
});

describe('parseApiError', () => {
  it('should parse 401 with the server message', () => {
    const error = parseApiError(401, '{"error":"The access token is invalid"}');
    expect(error).toBeInstanceOf(UnauthorizedError);
    expect(error.message).toBe('The access token is invalid');
  });

  it('should fall back to the default message for a non-JSON body', () => {
    const error = parseApiError(403, '<html>Forbidden</html>');
    expect(error).toBeInstanceOf(ForbiddenError);
    expect(error.message).toBe('Not allowed to perform this operation');
  });

  it('should parse 404 as NotFoundError', () => {
    const error = parseApiError(404, '{"error":"Record not found"}', {}, '/api/v1/lists/9');
    expect(error).toBeInstanceOf(NotFoundError);
    expect(error.message).toBe('Resource not found: /api/v1/lists/9');
  });

  it('should parse 429 with its reset header', () => {
    const error = parseApiError(429, '', { 'x-ratelimit-reset': '2030-01-01T00:00:00.000Z' });
    expect(error).toBeInstanceOf(RateLimitedError);
    expect(error.details).toEqual({ resetAt: '2030-01-01T00:00:00.000Z' });
  });

  it('should parse other 4xx as ClientError', () => {
    const error = parseApiError(418, 'teapot');
    expect(error).toBeInstanceOf(ClientError);
    expect(error.message).toBe('HTTP 418');
  });

  it('should parse 5xx as ServerError', () => {
    const error = parseApiError(500, '{"error":"Internal error"}');
    expect(error).toBeInstanceOf(ServerError);
    expect(error.message).toBe('Internal error');
    expect(error.retryable).toBe(true);
  });
});

describe('isMastodonError', () => {
  it('should return true for client errors', () => {
    expect(isMastodonError(new RateLimitedError())).toBe(true);
    expect(isMastodonError(new ConfigurationError('bad config'))).toBe(true);
    expect(isMastodonError(StreamError.closed())).toBe(true);
  });

  it('should return false for anything else', () => {
    expect(isMastodonError(new Error('generic'))).toBe(false);
    expect(isMastodonError('string')).toBe(false);
    expect(isMastodonError(null)).toBe(false);
  });
});

describe('isRetryableError', () => {
  it('should return true for retryable errors', () => {
    expect(isRetryableError(new RateLimitedError())).toBe(true);
    expect(isRetryableError(new ServerError(500, ''))).toBe(true);
    expect(isRetryableError(new NetworkError('timeout'))).toBe(true);
  });

  it('should return false for non-retryable errors', () => {
    expect(isRetryableError(new UnauthorizedError())).toBe(false);
    expect(isRetryableError(new NotFoundError('/api/v1/statuses/1'))).toBe(false);
    expect(isRetryableError(new ValidationError(['too long']))).toBe(false);
  });

  it('should return true for fetch TypeErrors', () => {
    expect(isRetryableError(new TypeError('fetch failed'))).toBe(true);
  });
});
