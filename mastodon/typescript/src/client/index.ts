/**
 * Mastodon client - main entry point.
 *
 * One client targets one server generation, fixed by the configuration it is
 * built from. Endpoints, entities and streaming timelines the generation
 * does not have are not part of its types.
 */

import type { Generation } from '../capabilities/generations.js';
import { CapabilityFlag, isFlagActive, resolveActiveFlags } from '../capabilities/matrix.js';
import type { MastodonConfig } from '../config/index.js';
import type { ActiveEntityName, Entity } from '../entities/types.js';
import type {
  ActiveEndpointName,
  EndpointCallArgs,
  EndpointResult,
  PageCallArgs,
  PagedEndpointName,
  PagedItem,
} from '../endpoints/types.js';
import { ConfigurationError, UnauthorizedError, ValidationError } from '../errors/index.js';
import {
  Logger,
  MetricsCollector,
  ObservabilityOptions,
  resolveObservability,
} from '../observability/index.js';
import type { Page } from '../pagination/index.js';
import type { Sleep } from '../resilience/retry.js';
import { STREAM_TIMELINES, StreamTimelineDefinition } from '../streaming/definitions.js';
import { EventReader } from '../streaming/reader.js';
import { ReconnectingEventReader } from '../streaming/reconnect.js';
import {
  FetchStreamTransport,
  StreamRequest,
  StreamTransport,
} from '../streaming/transport.js';
import type { ActiveStreamTimeline, StreamCallArgs } from '../streaming/types.js';
import type { HttpTransport } from '../transport/index.js';
import { RequestExecutor } from './executor.js';

export { RequestExecutor } from './executor.js';
export type { RequestExecutorOptions } from './executor.js';

/**
 * Collaborators of a client. Everything defaults to `fetch` and no-op
 * observability.
 */
export interface MastodonClientOptions extends ObservabilityOptions {
  transport?: HttpTransport;
  streamTransport?: StreamTransport;
  /** Delay function used between stream reconnection attempts */
  reconnectWait?: Sleep;
}

/**
 * What the target generation offers.
 */
export interface ClientCapabilities<G extends Generation> {
  readonly generation: G;
  readonly flags: ReadonlySet<string>;
  isActive(flag: CapabilityFlag): boolean;
}

function isParams(value: unknown): value is Readonly<Record<string, unknown>> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Mastodon client for generation `G`.
 *
 * @example
 * ```typescript
 * const config = new MastodonConfigBuilder('3.3.0')
 *   .withBaseUrl('https://social.example')
 *   .withAccessToken(token)
 *   .build();
 * const client = new MastodonClient(config);
 *
 * const status = await client.execute('statuses.get', { id: '1' });
 * for await (const item of client.paginate('timelines.home')) {
 *   console.log(item.content);
 * }
 * ```
 */
export class MastodonClient<G extends Generation> {
  readonly config: MastodonConfig<G>;
  readonly capabilities: ClientCapabilities<G>;
  private readonly executor: RequestExecutor<G>;
  private readonly streamTransport: StreamTransport;
  private readonly streamTimelines: ReadonlyMap<string, StreamTimelineDefinition>;
  private readonly logger: Logger;
  private readonly metrics: MetricsCollector;
  private readonly reconnectWait?: Sleep;

  constructor(config: MastodonConfig<G>, options: MastodonClientOptions = {}) {
    this.config = config;
    const observability = resolveObservability(options);
    this.logger = observability.logger;
    this.metrics = observability.metrics;
    this.streamTransport = options.streamTransport ?? new FetchStreamTransport();
    this.reconnectWait = options.reconnectWait;

    this.executor = new RequestExecutor({
      config,
      transport: options.transport,
      ...observability,
    });

    const flags = resolveActiveFlags(config.generation);
    this.capabilities = {
      generation: config.generation,
      flags,
      isActive: (flag) => isFlagActive(flag, config.generation),
    };

    this.streamTimelines = new Map(
      Object.entries(STREAM_TIMELINES).filter(([, definition]) => flags.has(definition.flag))
    );

    this.logger.debug('Mastodon client created', {
      generation: config.generation,
      baseUrl: config.baseUrl,
      authenticated: config.accessToken !== undefined,
    });
  }

  get generation(): G {
    return this.config.generation;
  }

  /**
   * Endpoints callable at this generation.
   */
  endpoints(): ActiveEndpointName<G>[] {
    return this.executor.endpoints();
  }

  /**
   * Calls an endpoint and returns its decoded response.
   */
  execute<E extends ActiveEndpointName<G>>(
    name: E,
    ...args: EndpointCallArgs<E, G>
  ): Promise<EndpointResult<E, G>> {
    return this.executor.execute(name, ...args);
  }

  /**
   * Fetches one page of a paginated endpoint, or the page a cursor points at.
   */
  page<E extends PagedEndpointName<G>>(
    name: E,
    ...args: PageCallArgs<E, G>
  ): Promise<Page<PagedItem<E, G>>> {
    return this.executor.page(name, ...args);
  }

  /**
   * Iterates every item of a paginated endpoint.
   */
  paginate<E extends PagedEndpointName<G>>(
    name: E,
    ...args: EndpointCallArgs<E, G>
  ): AsyncIterableIterator<PagedItem<E, G>> {
    return this.executor.paginate(name, ...args);
  }

  /**
   * Decodes a value received outside the client, such as a stored payload,
   * with this generation's entity shapes.
   */
  decode<N extends ActiveEntityName<G>>(name: N, raw: unknown): Entity<N, G> {
    return this.executor.entities.decode(name, raw);
  }

  /**
   * Opens a streaming timeline.
   *
   * @example
   * ```typescript
   * const reader = await client.stream('hashtag', { tag: 'cats' });
   * for await (const event of reader) {
   *   if (event.type === 'update') console.log(event.payload.id);
   * }
   * ```
   */
  stream<T extends ActiveStreamTimeline<G>>(
    timeline: T,
    ...args: StreamCallArgs<T>
  ): Promise<EventReader<G>>;
  async stream(timeline: string, ...rest: unknown[]): Promise<EventReader<G>> {
    const reader = this.createReader(timeline, this.streamRequest(timeline, rest[0]));
    await reader.connect();
    return reader;
  }

  /**
   * Opens a streaming timeline that reconnects with exponential backoff
   * after the connection drops. The first connection is made on the first
   * read.
   */
  streamWithReconnect<T extends ActiveStreamTimeline<G>>(
    timeline: T,
    ...args: StreamCallArgs<T>
  ): ReconnectingEventReader<G>;
  streamWithReconnect(timeline: string, ...rest: unknown[]): ReconnectingEventReader<G> {
    const request = this.streamRequest(timeline, rest[0]);
    return new ReconnectingEventReader({
      open: async () => {
        const reader = this.createReader(timeline, request);
        await reader.connect();
        return reader;
      },
      retryConfig: this.config.retryConfig,
      logger: this.logger.child({ timeline }),
      metrics: this.metrics,
      wait: this.reconnectWait,
    });
  }

  private createReader(timeline: string, request: StreamRequest): EventReader<G> {
    return new EventReader({
      entities: this.executor.entities,
      connect: () => this.streamTransport.connect(request),
      timeline,
      logger: this.logger,
      metrics: this.metrics,
    });
  }

  private streamRequest(timeline: string, params: unknown): StreamRequest {
    const definition = this.streamTimelines.get(timeline);
    if (!definition) {
      throw new ConfigurationError(
        `Streaming timeline "${timeline}" is not available at generation ${this.generation}`
      );
    }

    const token = this.config.accessToken;
    if (definition.auth === 'required' && !token) {
      throw new UnauthorizedError(`Streaming timeline "${timeline}" requires an access token`);
    }

    const url = new URL(`${this.config.streamingUrl}${definition.path}`);
    if (definition.param) {
      const value = isParams(params) ? params[definition.param] : undefined;
      if (typeof value !== 'string' || value === '') {
        throw new ValidationError([`${timeline}.${definition.param}: Required`]);
      }
      url.searchParams.set(definition.param, value);
    }

    const headers: Record<string, string> = { 'User-Agent': this.config.userAgent };
    if (token) {
      headers['Authorization'] = `Bearer ${token.expose()}`;
    }

    return { url: url.toString(), headers };
  }
}
