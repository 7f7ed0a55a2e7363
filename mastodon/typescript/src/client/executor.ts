/**
 * Request executor: one HTTP request per call, specialised to a generation.
 */

import type { Generation } from '../capabilities/generations.js';
import type { MastodonConfig } from '../config/index.js';
import { EntityModel } from '../entities/model.js';
import { listOf } from '../entities/schema.js';
import type { EndpointDefinition } from '../endpoints/definitions.js';
import {
  activeEndpoints,
  assertRegistryConsistent,
  endpointDefinition,
  expandPath,
} from '../endpoints/registry.js';
import type {
  ActiveEndpointName,
  EndpointCallArgs,
  EndpointResult,
  PageCallArgs,
  PagedEndpointName,
  PagedItem,
} from '../endpoints/types.js';
import {
  ConfigurationError,
  MalformedResponseError,
  UnauthorizedError,
  parseApiError,
} from '../errors/index.js';
import {
  Logger,
  MetricNames,
  MetricsCollector,
  ObservabilityOptions,
  Tracer,
  resolveObservability,
} from '../observability/index.js';
import { Page, PageCursor, pageWindow } from '../pagination/index.js';
import { RequestEncoder } from '../requests/encode.js';
import { FetchTransport, HttpRequest, HttpResponse, HttpTransport } from '../transport/index.js';

export interface RequestExecutorOptions<G extends Generation> extends ObservabilityOptions {
  config: MastodonConfig<G>;
  transport?: HttpTransport;
}

type CallArgs = Readonly<Record<string, unknown>>;

interface Exchange {
  readonly definition: EndpointDefinition;
  readonly response: HttpResponse;
}

function isCallArgs(value: unknown): value is CallArgs {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toCallArgs(value: unknown): CallArgs {
  return isCallArgs(value) ? value : {};
}

function isSuccess(status: number): boolean {
  return status >= 200 && status < 300;
}

/**
 * Executes endpoint calls for one generation.
 *
 * Only the endpoints active at the generation are held; the rest of the
 * registry is unreachable through this instance. Failures are reported,
 * never retried.
 */
export class RequestExecutor<G extends Generation> {
  readonly generation: G;
  readonly entities: EntityModel<G>;
  private readonly config: MastodonConfig<G>;
  private readonly encoder: RequestEncoder<G>;
  private readonly surface: ReadonlyMap<string, EndpointDefinition>;
  private readonly transport: HttpTransport;
  private readonly logger: Logger;
  private readonly metrics: MetricsCollector;
  private readonly tracer: Tracer;

  constructor(options: RequestExecutorOptions<G>) {
    this.config = options.config;
    this.generation = options.config.generation;
    this.transport = options.transport ?? new FetchTransport();
    const observability = resolveObservability(options);
    this.logger = observability.logger;
    this.metrics = observability.metrics;
    this.tracer = observability.tracer;

    assertRegistryConsistent(this.generation);
    this.entities = new EntityModel(this.generation);
    this.encoder = new RequestEncoder(this.generation);
    this.surface = new Map(
      activeEndpoints(this.generation).map((name): [string, EndpointDefinition] => [
        name,
        endpointDefinition(name),
      ])
    );
  }

  /**
   * Endpoints callable through this executor.
   */
  endpoints(): ActiveEndpointName<G>[] {
    return activeEndpoints(this.generation);
  }

  /**
   * Calls an endpoint and decodes its response. On a paginated endpoint this
   * returns the items of the first page.
   */
  execute<E extends ActiveEndpointName<G>>(
    name: E,
    ...args: EndpointCallArgs<E, G>
  ): Promise<EndpointResult<E, G>>;
  async execute(name: string, ...rest: unknown[]): Promise<unknown> {
    const { definition, response } = await this.exchange(name, toCallArgs(rest[0]));
    return this.decodeBody(name, definition, response);
  }

  /**
   * Fetches one page of a paginated endpoint. Without a cursor the first
   * page is returned; with one, the page it points at. The query is taken
   * from the cursor in that case.
   */
  page<E extends PagedEndpointName<G>>(
    name: E,
    ...args: PageCallArgs<E, G>
  ): Promise<Page<PagedItem<E, G>>>;
  page(name: string, ...rest: unknown[]): Promise<Page<unknown>> {
    const cursor = rest[1] instanceof PageCursor ? rest[1] : undefined;
    return this.fetchPage(name, toCallArgs(rest[0]), cursor);
  }

  /**
   * Iterates every item of a paginated endpoint, following `next` links
   * until none is returned.
   */
  paginate<E extends PagedEndpointName<G>>(
    name: E,
    ...args: EndpointCallArgs<E, G>
  ): AsyncIterableIterator<PagedItem<E, G>>;
  paginate(name: string, ...rest: unknown[]): AsyncIterableIterator<unknown> {
    return this.iterateItems(name, toCallArgs(rest[0]));
  }

  private async *iterateItems(name: string, args: CallArgs): AsyncIterableIterator<unknown> {
    const first = await this.fetchPage(name, args);
    yield* first.allItems();
  }

  private async fetchPage(name: string, args: CallArgs, cursor?: PageCursor): Promise<Page<unknown>> {
    const { definition, response } = await this.exchange(name, args, cursor);
    if (cursor) {
      this.metrics.incrementCounter(MetricNames.PAGES_FETCHED, 1, { endpoint: name });
    }

    const decoded = this.decodeBody(name, definition, response);
    const items: unknown[] = Array.isArray(decoded) ? decoded : [decoded];

    return new Page(items, pageWindow(response.headers['link']), (next) =>
      this.fetchPage(name, args, next)
    );
  }

  /**
   * Sends one request and returns the successful response, instrumented
   * with a span, counters and a latency histogram.
   */
  private async exchange(name: string, args: CallArgs, cursor?: PageCursor): Promise<Exchange> {
    const definition = this.surface.get(name);
    if (!definition) {
      throw new ConfigurationError(
        `Endpoint "${name}" is not available at generation ${this.generation}`
      );
    }

    const span = this.tracer.startSpan(`mastodon.${name}`, {
      'http.method': definition.method,
      'http.route': definition.path,
      'mastodon.generation': this.generation,
    });
    const startTime = Date.now();

    this.logger.debug('Executing Mastodon request', {
      endpoint: name,
      method: definition.method,
      path: definition.path,
      paged: cursor !== undefined,
    });
    this.metrics.incrementCounter(MetricNames.REQUESTS_TOTAL, 1, {
      endpoint: name,
      method: definition.method,
    });

    try {
      const request = this.buildRequest(name, definition, args, cursor);
      const response = await this.transport.send(request);
      const durationMs = Date.now() - startTime;

      span.setAttribute('http.status_code', response.status);
      this.metrics.recordHistogram(MetricNames.REQUEST_LATENCY, durationMs / 1000, {
        endpoint: name,
      });

      if (!isSuccess(response.status)) {
        if (response.status === 429) {
          this.metrics.incrementCounter(MetricNames.RATE_LIMITS_HIT, 1, { endpoint: name });
        }
        throw parseApiError(
          response.status,
          response.body,
          response.headers,
          new URL(request.url).pathname
        );
      }

      this.metrics.incrementCounter(MetricNames.REQUESTS_SUCCESS, 1, { endpoint: name });
      span.setStatus('ok');
      span.end();

      return { definition, response };
    } catch (error) {
      const durationMs = Date.now() - startTime;
      this.metrics.incrementCounter(MetricNames.REQUESTS_FAILED, 1, { endpoint: name });

      span.setStatus('error', error instanceof Error ? error.message : 'Unknown error');
      span.end();

      this.logger.error('Mastodon request failed', {
        endpoint: name,
        error: error instanceof Error ? error.message : String(error),
        durationMs,
      });

      throw error;
    }
  }

  private buildRequest(
    name: string,
    definition: EndpointDefinition,
    args: CallArgs,
    cursor?: PageCursor
  ): HttpRequest {
    const token = this.config.accessToken;
    if (definition.auth === 'required' && !token) {
      throw new UnauthorizedError(`Endpoint "${name}" requires an access token`);
    }

    const expected = new URL(`${this.config.baseUrl}${expandPath(name, definition.path, args)}`);
    let url: string;
    if (cursor) {
      url = cursor.resolve(expected);
    } else {
      if (definition.query) {
        const params = this.encoder.toQuery(definition.query, args['query']);
        params.forEach((value, key) => expected.searchParams.append(key, value));
      }
      url = expected.toString();
    }

    const headers: Record<string, string> = {
      Accept: 'application/json',
      'User-Agent': this.config.userAgent,
    };
    if (token) {
      headers['Authorization'] = `Bearer ${token.expose()}`;
    }

    const request: HttpRequest = {
      method: definition.method,
      url,
      headers,
      timeoutMs: this.config.requestTimeoutMs,
    };

    if (definition.body) {
      const encoded = this.encoder.toBody(definition.body, args['body']);
      if (encoded.encoding === 'json') {
        headers['Content-Type'] = encoded.contentType;
      }
      request.body = encoded.payload;
    }

    return request;
  }

  private decodeBody(name: string, definition: EndpointDefinition, response: HttpResponse): unknown {
    let raw: unknown = {};
    if (response.body.trim() !== '') {
      try {
        raw = JSON.parse(response.body);
      } catch (error) {
        throw new MalformedResponseError(`${name}: response body is not valid JSON`, error);
      }
    }

    const { kind, codec } = definition.response;
    try {
      return this.entities.decodeAs(kind === 'one' ? codec : listOf(codec), raw, name);
    } catch (error) {
      this.logger.warn('Mastodon response did not match the declared shape', {
        endpoint: name,
        generation: this.generation,
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
  }
}
