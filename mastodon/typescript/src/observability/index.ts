/**
 * Logging, metrics and tracing for the Mastodon client.
 *
 * Each concern is an interface with a silent default and an in-memory
 * variant that tests inspect. Components take an {@link ObservabilityOptions}
 * bag and fill the gaps with {@link resolveObservability}.
 */

// ============================================================================
// Logging
// ============================================================================

export enum LogLevel {
  Trace = 0,
  Debug = 1,
  Info = 2,
  Warn = 3,
  Error = 4,
}

export type LogContext = Record<string, unknown>;

export interface Logger {
  trace(message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  child(context: LogContext): Logger;
}

const REDACTED = '[REDACTED]';

// Compared lower-cased. Covers OAuth credentials and Web Push subscription keys.
const SENSITIVE_KEYS: ReadonlySet<string> = new Set([
  'access_token',
  'accesstoken',
  'auth',
  'authorization',
  'client_secret',
  'p256dh',
  'password',
  'refresh_token',
  'secret',
  'token',
]);

function isRecord(value: unknown): value is LogContext {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Copies `context`, replacing the values of credential-like keys at any depth.
 */
export function redactSensitive(context: LogContext): LogContext {
  return Object.fromEntries(
    Object.entries(context).map(([key, value]) => {
      if (SENSITIVE_KEYS.has(key.toLowerCase())) {
        return [key, REDACTED];
      }
      return [key, isRecord(value) ? redactSensitive(value) : value];
    })
  );
}

/**
 * Routes the five level methods into one `write`, merging bound context and
 * redacting it first.
 */
abstract class LeveledLogger implements Logger {
  protected constructor(protected readonly bound: LogContext) {}

  trace(message: string, context?: LogContext): void {
    this.emit(LogLevel.Trace, message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.emit(LogLevel.Debug, message, context);
  }

  info(message: string, context?: LogContext): void {
    this.emit(LogLevel.Info, message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.emit(LogLevel.Warn, message, context);
  }

  error(message: string, context?: LogContext): void {
    this.emit(LogLevel.Error, message, context);
  }

  abstract child(context: LogContext): Logger;

  protected enabled(_level: LogLevel): boolean {
    return true;
  }

  protected abstract write(level: LogLevel, message: string, context: LogContext): void;

  private emit(level: LogLevel, message: string, context?: LogContext): void {
    if (!this.enabled(level)) return;
    this.write(level, message, redactSensitive({ ...this.bound, ...context }));
  }
}

export interface ConsoleLoggerOptions {
  level?: LogLevel;
  context?: LogContext;
  format?: 'json' | 'pretty';
}

/**
 * Writes one line per record to `console.log`.
 *
 * `pretty` renders `[time] LEVEL: message {context}`; `json` flattens the
 * context into the record object.
 */
export class ConsoleLogger extends LeveledLogger {
  private readonly level: LogLevel;
  private readonly format: 'json' | 'pretty';

  constructor(options: ConsoleLoggerOptions = {}) {
    super(options.context ?? {});
    this.level = options.level ?? LogLevel.Info;
    this.format = options.format ?? 'pretty';
  }

  child(context: LogContext): Logger {
    return new ConsoleLogger({
      level: this.level,
      format: this.format,
      context: { ...this.bound, ...context },
    });
  }

  protected override enabled(level: LogLevel): boolean {
    return level >= this.level;
  }

  protected write(level: LogLevel, message: string, context: LogContext): void {
    const timestamp = new Date().toISOString();
    const label = LogLevel[level].toUpperCase();

    if (this.format === 'json') {
      console.log(JSON.stringify({ timestamp, level: label, message, ...context }));
      return;
    }
    const suffix = Object.keys(context).length === 0 ? '' : ` ${JSON.stringify(context)}`;
    console.log(`[${timestamp}] ${label}: ${message}${suffix}`);
  }
}

export class NoopLogger implements Logger {
  trace(_message: string, _context?: LogContext): void {}
  debug(_message: string, _context?: LogContext): void {}
  info(_message: string, _context?: LogContext): void {}
  warn(_message: string, _context?: LogContext): void {}
  error(_message: string, _context?: LogContext): void {}
  child(_context: LogContext): Logger {
    return this;
  }
}

export interface LogRecord {
  level: LogLevel;
  message: string;
  context: LogContext;
  timestamp: Date;
}

/**
 * Keeps records in memory. Children append to their parent's list.
 */
export class InMemoryLogger extends LeveledLogger {
  private readonly records: LogRecord[];

  constructor(context: LogContext = {}, records: LogRecord[] = []) {
    super(context);
    this.records = records;
  }

  child(context: LogContext): Logger {
    return new InMemoryLogger({ ...this.bound, ...context }, this.records);
  }

  getLogs(): LogRecord[] {
    return [...this.records];
  }

  getLogsByLevel(level: LogLevel): LogRecord[] {
    return this.records.filter((record) => record.level === level);
  }

  clear(): void {
    this.records.length = 0;
  }

  protected write(level: LogLevel, message: string, context: LogContext): void {
    this.records.push({ level, message, context, timestamp: new Date() });
  }
}

// ============================================================================
// Metrics
// ============================================================================

export type MetricLabels = Record<string, string>;

export interface MetricsCollector {
  incrementCounter(name: string, value?: number, labels?: MetricLabels): void;
  recordHistogram(name: string, value: number, labels?: MetricLabels): void;
  setGauge(name: string, value: number, labels?: MetricLabels): void;
}

/**
 * Metric names emitted by the client and the stream readers.
 */
export const MetricNames = {
  /** Requests sent, labelled by endpoint and method */
  REQUESTS_TOTAL: 'mastodon_requests_total',
  REQUESTS_SUCCESS: 'mastodon_requests_success',
  REQUESTS_FAILED: 'mastodon_requests_failed',
  /** 429 responses */
  RATE_LIMITS_HIT: 'mastodon_rate_limits_hit',
  /** Seconds from send to decoded result */
  REQUEST_LATENCY: 'mastodon_request_latency_seconds',
  /** Requests that followed a page cursor */
  PAGES_FETCHED: 'mastodon_pages_fetched',
  /** Stream outcomes, labelled by event name, `unrecognized` or `malformed` */
  STREAM_EVENTS: 'mastodon_stream_events',
  STREAM_RECONNECTS: 'mastodon_stream_reconnects',
} as const;

export class NoopMetricsCollector implements MetricsCollector {
  incrementCounter(): void {}
  recordHistogram(): void {}
  setGauge(): void {}
}

/**
 * Series key in exposition style: `name{a="1",b="2"}`, labels sorted.
 */
function seriesKey(name: string, labels: MetricLabels = {}): string {
  const pairs = Object.keys(labels)
    .sort()
    .map((label) => `${label}="${labels[label] ?? ''}"`);
  return pairs.length === 0 ? name : `${name}{${pairs.join(',')}}`;
}

export class InMemoryMetricsCollector implements MetricsCollector {
  private readonly counters = new Map<string, number>();
  private readonly histograms = new Map<string, number[]>();
  private readonly gauges = new Map<string, number>();

  incrementCounter(name: string, value = 1, labels?: MetricLabels): void {
    const key = seriesKey(name, labels);
    this.counters.set(key, (this.counters.get(key) ?? 0) + value);
  }

  recordHistogram(name: string, value: number, labels?: MetricLabels): void {
    const key = seriesKey(name, labels);
    const samples = this.histograms.get(key);
    if (samples) {
      samples.push(value);
    } else {
      this.histograms.set(key, [value]);
    }
  }

  setGauge(name: string, value: number, labels?: MetricLabels): void {
    this.gauges.set(seriesKey(name, labels), value);
  }

  getCounter(name: string, labels?: MetricLabels): number {
    return this.counters.get(seriesKey(name, labels)) ?? 0;
  }

  getHistogram(name: string, labels?: MetricLabels): number[] {
    return [...(this.histograms.get(seriesKey(name, labels)) ?? [])];
  }

  getGauge(name: string, labels?: MetricLabels): number | undefined {
    return this.gauges.get(seriesKey(name, labels));
  }

  clear(): void {
    this.counters.clear();
    this.histograms.clear();
    this.gauges.clear();
  }
}

// ============================================================================
// Tracing
// ============================================================================

export type SpanStatus = 'ok' | 'error' | 'unset';

export type AttributeValue = string | number | boolean;

export type SpanAttributes = Record<string, AttributeValue>;

export interface SpanContext {
  readonly spanId: string;
  readonly traceId: string;
  setAttribute(key: string, value: AttributeValue): void;
  addEvent(name: string, attributes?: SpanAttributes): void;
  setStatus(status: SpanStatus, message?: string): void;
  end(): void;
}

export interface Tracer {
  startSpan(name: string, attributes?: SpanAttributes): SpanContext;
  getCurrentSpan(): SpanContext | undefined;
}

const NOOP_SPAN: SpanContext = {
  spanId: '0'.repeat(16),
  traceId: '0'.repeat(32),
  setAttribute() {},
  addEvent() {},
  setStatus() {},
  end() {},
};

export class NoopTracer implements Tracer {
  startSpan(): SpanContext {
    return NOOP_SPAN;
  }

  getCurrentSpan(): SpanContext | undefined {
    return undefined;
  }
}

function hexId(length: number): string {
  return Array.from({ length }, () => Math.floor(Math.random() * 16).toString(16)).join('');
}

export interface SpanEvent {
  name: string;
  timestamp: Date;
  attributes?: SpanAttributes;
}

export class InMemorySpanContext implements SpanContext {
  readonly spanId = hexId(16);
  readonly startTime = new Date();
  readonly attributes: SpanAttributes;
  readonly events: SpanEvent[] = [];
  endTime?: Date;
  status: SpanStatus = 'unset';
  statusMessage?: string;

  constructor(
    readonly name: string,
    readonly traceId: string,
    attributes: SpanAttributes = {}
  ) {
    this.attributes = { ...attributes };
  }

  setAttribute(key: string, value: AttributeValue): void {
    this.attributes[key] = value;
  }

  addEvent(name: string, attributes?: SpanAttributes): void {
    this.events.push({ name, timestamp: new Date(), attributes });
  }

  setStatus(status: SpanStatus, message?: string): void {
    this.status = status;
    this.statusMessage = message;
  }

  end(): void {
    this.endTime ??= new Date();
  }

  getDurationMs(): number | undefined {
    return this.endTime && this.endTime.getTime() - this.startTime.getTime();
  }
}

/**
 * Records every span under one trace id until {@link clear}.
 */
export class InMemoryTracer implements Tracer {
  private spans: InMemorySpanContext[] = [];
  private traceId = hexId(32);

  startSpan(name: string, attributes?: SpanAttributes): SpanContext {
    const span = new InMemorySpanContext(name, this.traceId, attributes);
    this.spans.push(span);
    return span;
  }

  getCurrentSpan(): SpanContext | undefined {
    return this.spans.at(-1);
  }

  getSpans(): InMemorySpanContext[] {
    return [...this.spans];
  }

  clear(): void {
    this.spans = [];
    this.traceId = hexId(32);
  }
}

// ============================================================================
// Wiring
// ============================================================================

export interface ObservabilityOptions {
  logger?: Logger;
  metrics?: MetricsCollector;
  tracer?: Tracer;
}

export interface Observability {
  readonly logger: Logger;
  readonly metrics: MetricsCollector;
  readonly tracer: Tracer;
}

/**
 * Fills unset collaborators with their silent defaults.
 */
export function resolveObservability(options: ObservabilityOptions = {}): Observability {
  return {
    logger: options.logger ?? new NoopLogger(),
    metrics: options.metrics ?? new NoopMetricsCollector(),
    tracer: options.tracer ?? new NoopTracer(),
  };
}
