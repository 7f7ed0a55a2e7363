/**
 * Client configuration.
 *
 * A configuration names the server generation, where the server lives and
 * how to authenticate. It is validated by {@link MastodonConfigBuilder} and
 * frozen, so one instance can back any number of clients.
 */

import { z } from 'zod';
import { Generation, isGeneration } from '../capabilities/generations.js';
import { ConfigurationError } from '../errors/index.js';

const retryConfigSchema = z.object({
  maxRetries: z.number().int().nonnegative(),
  initialBackoffMs: z.number().nonnegative(),
  maxBackoffMs: z.number().nonnegative(),
  backoffMultiplier: z.number().min(1),
  jitterFactor: z.number().min(0).max(1),
});

/**
 * Backoff settings shared by the opt-in retry helper and stream reconnection.
 */
export type RetryConfig = z.infer<typeof retryConfigSchema>;

export const DEFAULT_RETRY_CONFIG: Readonly<RetryConfig> = Object.freeze({
  maxRetries: 3,
  initialBackoffMs: 1000,
  maxBackoffMs: 30000,
  backoffMultiplier: 2,
  jitterFactor: 0.1,
});

export const DEFAULT_USER_AGENT = 'mastodon-versioned-client/0.1.0';

export const DEFAULT_REQUEST_TIMEOUT_MS = 30000;

export interface MastodonConfig<G extends Generation> {
  readonly generation: G;
  /** REST origin, no trailing slash */
  readonly baseUrl: string;
  /**
   * Origin of the streaming API. Servers may advertise a separate host for it
   * (`urls.streaming_api` on the instance entity). Defaults to `baseUrl`.
   */
  readonly streamingUrl: string;
  readonly accessToken?: SecretString;
  readonly requestTimeoutMs: number;
  readonly userAgent: string;
  readonly retryConfig: Readonly<RetryConfig>;
}

/**
 * Wraps a credential so that it prints and serialises as `[REDACTED]`.
 */
export class SecretString {
  constructor(private readonly value: string) {}

  expose(): string {
    return this.value;
  }

  toString(): string {
    return '[REDACTED]';
  }

  toJSON(): string {
    return '[REDACTED]';
  }
}

const originSchema = z
  .string()
  .trim()
  .url()
  .refine((value) => /^(https?|wss?):\/\//.test(value))
  .transform((value) => value.replace(/\/+$/, ''));

// Empty variables count as unset.
const envValue = z
  .string()
  .optional()
  .transform((value) => (value === '' ? undefined : value));

const envSchema = z.object({
  MASTODON_BASE_URL: envValue,
  MASTODON_STREAMING_URL: envValue,
  MASTODON_ACCESS_TOKEN: envValue,
  MASTODON_TIMEOUT_MS: envValue,
});

function parseOrigin(label: string, url: string, schemes: RegExp): string {
  const parsed = originSchema.safeParse(url);
  if (!parsed.success || !schemes.test(parsed.data)) {
    throw new ConfigurationError(`Invalid ${label} "${url}"`);
  }
  return parsed.data;
}

/**
 * Builds a {@link MastodonConfig}.
 *
 * The generation is passed to the constructor so that `G` is inferred as a
 * literal and every client built from the result is specialised to it.
 *
 * @example
 * ```typescript
 * const config = new MastodonConfigBuilder('3.1.0')
 *   .withBaseUrl('https://social.example')
 *   .withAccessToken(token)
 *   .build();
 * ```
 */
export class MastodonConfigBuilder<G extends Generation> {
  private readonly generation: G;
  private baseUrl?: string;
  private streamingUrl?: string;
  private accessToken?: SecretString;
  private requestTimeoutMs = DEFAULT_REQUEST_TIMEOUT_MS;
  private userAgent = DEFAULT_USER_AGENT;
  private retryConfig: RetryConfig = { ...DEFAULT_RETRY_CONFIG };

  constructor(generation: G) {
    if (!isGeneration(generation)) {
      throw new ConfigurationError(`Unknown generation "${String(generation)}"`);
    }
    this.generation = generation;
  }

  /** http or https origin of the server, e.g. `https://social.example` */
  withBaseUrl(url: string): this {
    this.baseUrl = parseOrigin('base URL', url, /^https?:/);
    return this;
  }

  /** Origin of the streaming API when it differs from the base URL. */
  withStreamingUrl(url: string): this {
    // A wss:// origin is served over https by the SSE endpoints.
    this.streamingUrl = parseOrigin('streaming URL', url, /^(https?|wss?):/).replace(
      /^ws/,
      'http'
    );
    return this;
  }

  withAccessToken(token: string): this {
    const trimmed = token.trim();
    if (trimmed.length === 0) {
      throw new ConfigurationError('Access token cannot be empty');
    }
    this.accessToken = new SecretString(trimmed);
    return this;
  }

  withRequestTimeout(timeoutMs: number): this {
    if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
      throw new ConfigurationError('Request timeout must be positive');
    }
    this.requestTimeoutMs = timeoutMs;
    return this;
  }

  withUserAgent(userAgent: string): this {
    this.userAgent = userAgent;
    return this;
  }

  /** Merges `config` into the current backoff settings. */
  withRetryConfig(config: Partial<RetryConfig>): this {
    const merged = retryConfigSchema.safeParse({ ...this.retryConfig, ...config });
    if (!merged.success) {
      const issue = merged.error.issues[0];
      const detail = issue ? `${issue.path.join('.')}: ${issue.message}` : 'invalid';
      throw new ConfigurationError(`Invalid retry config (${detail})`);
    }
    this.retryConfig = merged.data;
    return this;
  }

  /**
   * Seeds a builder from the environment. Unset variables keep their
   * defaults.
   *
   * - `MASTODON_BASE_URL`
   * - `MASTODON_STREAMING_URL`
   * - `MASTODON_ACCESS_TOKEN`
   * - `MASTODON_TIMEOUT_MS`
   */
  static fromEnv<G extends Generation>(
    generation: G,
    env: NodeJS.ProcessEnv = process.env
  ): MastodonConfigBuilder<G> {
    const vars = envSchema.parse(env);
    const builder = new MastodonConfigBuilder(generation);

    if (vars.MASTODON_BASE_URL !== undefined) builder.withBaseUrl(vars.MASTODON_BASE_URL);
    if (vars.MASTODON_STREAMING_URL !== undefined) {
      builder.withStreamingUrl(vars.MASTODON_STREAMING_URL);
    }
    if (vars.MASTODON_ACCESS_TOKEN !== undefined) {
      builder.withAccessToken(vars.MASTODON_ACCESS_TOKEN);
    }
    if (vars.MASTODON_TIMEOUT_MS !== undefined) {
      builder.withRequestTimeout(Number(vars.MASTODON_TIMEOUT_MS));
    }
    return builder;
  }

  /**
   * @throws ConfigurationError when no base URL was set
   */
  build(): MastodonConfig<G> {
    if (this.baseUrl === undefined) {
      throw new ConfigurationError('Base URL is required');
    }

    return Object.freeze({
      generation: this.generation,
      baseUrl: this.baseUrl,
      streamingUrl: this.streamingUrl ?? this.baseUrl,
      accessToken: this.accessToken,
      requestTimeoutMs: this.requestTimeoutMs,
      userAgent: this.userAgent,
      retryConfig: Object.freeze({ ...this.retryConfig }),
    });
  }
}
