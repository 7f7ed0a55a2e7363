/**
 * Tests for Mastodon configuration.
 */

import {
  ConfigurationError,
  DEFAULT_REQUEST_TIMEOUT_MS,
  DEFAULT_RETRY_CONFIG,
  DEFAULT_USER_AGENT,
  MastodonConfigBuilder,
  SecretString,
} from '../index.js';

describe('SecretString', () => {
  it('should hide value in toString()', () => {
    const secret = new SecretString('test-secret');
    expect(secret.toString()).toBe('[REDACTED]');
    expect(`${secret}`).toBe('[REDACTED]');
  });

  it('should hide value in JSON', () => {
    const secret = new SecretString('test-secret');
    expect(JSON.stringify({ token: secret })).toBe('{"token":"[REDACTED]"}');
  });

  it('should expose value with expose()', () => {
    expect(new SecretString('test-secret').expose()).toBe('test-secret');
  });
});

describe('MastodonConfigBuilder', () => {
  describe('basic configuration', () => {
    it('should build config with defaults', () => {
      const config = new MastodonConfigBuilder('2.9.1')
        .withBaseUrl('https://social.example')
        .build();

      expect(config.generation).toBe('2.9.1');
      expect(config.baseUrl).toBe('https://social.example');
      expect(config.streamingUrl).toBe('https://social.example');
      expect(config.accessToken).toBeUndefined();
      expect(config.requestTimeoutMs).toBe(DEFAULT_REQUEST_TIMEOUT_MS);
      expect(config.userAgent).toBe(DEFAULT_USER_AGENT);
      expect(config.retryConfig).toEqual(DEFAULT_RETRY_CONFIG);
    });

    it('should keep the generation literal in the type', () => {
      const config = new MastodonConfigBuilder('3.1.0').withBaseUrl('https://social.example').build();

      expectTypeOf(config.generation).toEqualTypeOf<'3.1.0'>();
    });

    it('should strip trailing slashes from the base URL', () => {
      const config = new MastodonConfigBuilder('2.9.1')
        .withBaseUrl('https://social.example/')
        .build();

      expect(config.baseUrl).toBe('https://social.example');
    });

    it('should take a separate streaming origin', () => {
      const config = new MastodonConfigBuilder('2.9.1')
        .withBaseUrl('https://social.example')
        .withStreamingUrl('wss://streaming.social.example/')
        .build();

      expect(config.streamingUrl).toBe('https://streaming.social.example');
    });

    it('should trim and wrap the access token', () => {
      const config = new MastodonConfigBuilder('2.9.1')
        .withBaseUrl('https://social.example')
        .withAccessToken(' test-token ')
        .build();

      expect(config.accessToken).toBeInstanceOf(SecretString);
      expect(config.accessToken?.expose()).toBe('test-token');
      expect(JSON.stringify(config)).not.toContain('test-token');
    });

    it('should merge partial retry settings', () => {
      const config = new MastodonConfigBuilder('2.9.1')
        .withBaseUrl('https://social.example')
        .withRetryConfig({ maxRetries: 5 })
        .withRequestTimeout(5000)
        .withUserAgent('my-app/1.0')
        .build();

      expect(config.retryConfig).toEqual({ ...DEFAULT_RETRY_CONFIG, maxRetries: 5 });
      expect(config.requestTimeoutMs).toBe(5000);
      expect(config.userAgent).toBe('my-app/1.0');
    });

    it('should freeze the built config', () => {
      const config = new MastodonConfigBuilder('2.9.1')
        .withBaseUrl('https://social.example')
        .build();

      expect(Object.isFrozen(config)).toBe(true);
      expect(Object.isFrozen(config.retryConfig)).toBe(true);
    });
  });

  describe('validation', () => {
    it('should require a base URL', () => {
      expect(() => new MastodonConfigBuilder('2.9.1').build()).toThrow(
        'Configuration error: Base URL is required'
      );
    });

    it('should reject a base URL that is not http or https', () => {
      expect(() => new MastodonConfigBuilder('2.9.1').withBaseUrl('ftp://social.example')).toThrow(
        'Configuration error: Invalid base URL "ftp://social.example"'
      );
      expect(() => new MastodonConfigBuilder('2.9.1').withBaseUrl('not a url')).toThrow(
        ConfigurationError
      );
    });

    it('should reject an empty access token', () => {
      expect(() => new MastodonConfigBuilder('2.9.1').withAccessToken('')).toThrow(
        'Configuration error: Access token cannot be empty'
      );
    });

    it('should reject retry settings out of range', () => {
      expect(() => new MastodonConfigBuilder('2.9.1').withRetryConfig({ jitterFactor: 2 })).toThrow(
        'Configuration error: Invalid retry config (jitterFactor: Number must be less than or equal to 1)'
      );
      expect(() => new MastodonConfigBuilder('2.9.1').withRetryConfig({ maxRetries: -1 })).toThrow(
        ConfigurationError
      );
    });

    it('should reject a non-positive timeout', () => {
      expect(() => new MastodonConfigBuilder('2.9.1').withRequestTimeout(0)).toThrow(
        ConfigurationError
      );
      expect(() => new MastodonConfigBuilder('2.9.1').withRequestTimeout(Number.NaN)).toThrow(
        ConfigurationError
      );
    });
  });

  describe('fromEnv', () => {
    it('should read the environment', () => {
      const config = MastodonConfigBuilder.fromEnv('3.3.0', {
        MASTODON_BASE_URL: 'https://social.example',
        MASTODON_ACCESS_TOKEN: 'test-token',
        MASTODON_TIMEOUT_MS: '5000',
      }).build();

      expect(config.generation).toBe('3.3.0');
      expect(config.baseUrl).toBe('https://social.example');
      expect(config.accessToken?.expose()).toBe('test-token');
      expect(config.requestTimeoutMs).toBe(5000);
    });

    it('should leave unset variables at their defaults', () => {
      const builder = MastodonConfigBuilder.fromEnv('2.9.1', {});

      expect(() => builder.build()).toThrow('Configuration error: Base URL is required');
    });

    it('should treat empty variables as unset', () => {
      const config = MastodonConfigBuilder.fromEnv('2.9.1', {
        MASTODON_BASE_URL: 'https://social.example',
        MASTODON_STREAMING_URL: 'https://streaming.social.example',
        MASTODON_ACCESS_TOKEN: '',
      }).build();

      expect(config.accessToken).toBeUndefined();
      expect(config.streamingUrl).toBe('https://streaming.social.example');
    });

    it('should reject a timeout that is not a number', () => {
      expect(() =>
        MastodonConfigBuilder.fromEnv('2.9.1', { MASTODON_TIMEOUT_MS: 'soon' })
      ).toThrow('Configuration error: Request timeout must be positive');
    });
  });
});
