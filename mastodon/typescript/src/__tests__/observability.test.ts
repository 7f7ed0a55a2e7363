/**
 * Tests for observability components.
 */

import {
  ConsoleLogger,
  InMemoryLogger,
  InMemoryMetricsCollector,
  InMemoryTracer,
  LogLevel,
  NoopLogger,
  NoopMetricsCollector,
  NoopTracer,
  redactSensitive,
  resolveObservability,
} from '../index.js';

describe('Logging', () => {
  describe('InMemoryLogger', () => {
    it('should store log messages', () => {
      const logger = new InMemoryLogger();
      logger.info('test message', { key: 'value' });

      const logs = logger.getLogs();
      expect(logs).toHaveLength(1);
      expect(logs[0]?.level).toBe(LogLevel.Info);
      expect(logs[0]?.message).toBe('test message');
      expect(logs[0]?.context).toEqual({ key: 'value' });
    });

    it('should filter by log level', () => {
      const logger = new InMemoryLogger();
      logger.info('info1');
      logger.error('error1');
      logger.trace('trace1');
      logger.error('error2');

      const errors = logger.getLogsByLevel(LogLevel.Error);
      expect(errors.map((log) => log.message)).toEqual(['error1', 'error2']);
    });

    it('should create child logger with context', () => {
      const logger = new InMemoryLogger({ module: 'client' });
      logger.child({ timeline: 'public' }).warn('Stream dropped, reconnecting');

      expect(logger.getLogs()[0]?.context).toEqual({ module: 'client', timeline: 'public' });
    });

    it('should redact sensitive fields', () => {
      const logger = new InMemoryLogger();
      logger.info('request', { access_token: 'test-token', endpoint: 'statuses.get' });

      expect(logger.getLogs()[0]?.context).toEqual({
        access_token: '[REDACTED]',
        endpoint: 'statuses.get',
      });
    });

    it('should clear logs', () => {
      const logger = new InMemoryLogger();
      logger.info('test');
      logger.clear();
      expect(logger.getLogs()).toHaveLength(0);
    });
  });

  describe('redactSensitive', () => {
    it('should redact nested records', () => {
      expect(
        redactSensitive({ headers: { Authorization: 'Bearer test-token', Accept: 'application/json' } })
      ).toEqual({ headers: { Authorization: '[REDACTED]', Accept: 'application/json' } });
    });
  });

  describe('ConsoleLogger', () => {
    afterEach(() => {
      vi.restoreAllMocks();
    });

    it('should log to console', () => {
      const consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
      new ConsoleLogger({ level: LogLevel.Info }).info('test message');

      expect(consoleSpy).toHaveBeenCalledTimes(1);
      expect(String(consoleSpy.mock.calls[0]?.[0])).toContain('INFO: test message');
    });

    it('should filter by log level', () => {
      const consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
      const logger = new ConsoleLogger({ level: LogLevel.Warn });
      logger.debug('debug');
      logger.info('info');
      logger.warn('warn');
      logger.error('error');

      expect(consoleSpy).toHaveBeenCalledTimes(2);
    });

    it('should redact sensitive fields', () => {
      const consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
      new ConsoleLogger().info('test', { token: 'test-secret', normal: 'value' });

      const output = String(consoleSpy.mock.calls[0]?.[0]);
      expect(output).toContain('{"token":"[REDACTED]","normal":"value"}');
      expect(output).not.toContain('test-secret');
    });

    it('should output JSON format with child context', () => {
      const consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
      new ConsoleLogger({ format: 'json' }).child({ timeline: 'user' }).info('Stream opened');

      const parsed: unknown = JSON.parse(String(consoleSpy.mock.calls[0]?.[0]));
      expect(parsed).toMatchObject({ level: 'INFO', message: 'Stream opened', timeline: 'user' });
    });
  });

  describe('NoopLogger', () => {
    it('should not throw', () => {
      const logger = new NoopLogger();
      expect(() => {
        logger.trace('test');
        logger.info('test');
        logger.error('test');
        logger.child({}).info('child');
      }).not.toThrow();
    });
  });
});

describe('Metrics', () => {
  describe('InMemoryMetricsCollector', () => {
    it('should increment counter', () => {
      const metrics = new InMemoryMetricsCollector();
      metrics.incrementCounter('requests_total');
      metrics.incrementCounter('requests_total', 3);

      expect(metrics.getCounter('requests_total')).toBe(4);
    });

    it('should key labels independently of their order', () => {
      const metrics = new InMemoryMetricsCollector();
      metrics.incrementCounter('requests_total', 1, { method: 'GET', endpoint: 'statuses.get' });
      metrics.incrementCounter('requests_total', 1, { endpoint: 'statuses.get', method: 'GET' });
      metrics.incrementCounter('requests_total', 1, { endpoint: 'lists.list', method: 'GET' });

      expect(metrics.getCounter('requests_total', { endpoint: 'statuses.get', method: 'GET' })).toBe(2);
      expect(metrics.getCounter('requests_total')).toBe(0);
    });

    it('should record histogram values and gauges', () => {
      const metrics = new InMemoryMetricsCollector();
      metrics.recordHistogram('latency', 0.1);
      metrics.recordHistogram('latency', 0.2);
      metrics.setGauge('open_streams', 2);

      expect(metrics.getHistogram('latency')).toEqual([0.1, 0.2]);
      expect(metrics.getGauge('open_streams')).toBe(2);
    });

    it('should clear all metrics', () => {
      const metrics = new InMemoryMetricsCollector();
      metrics.incrementCounter('counter');
      metrics.recordHistogram('histogram', 100);
      metrics.setGauge('gauge', 50);

      metrics.clear();

      expect(metrics.getCounter('counter')).toBe(0);
      expect(metrics.getHistogram('histogram')).toEqual([]);
      expect(metrics.getGauge('gauge')).toBeUndefined();
    });
  });
});

describe('Tracing', () => {
  describe('InMemoryTracer', () => {
    it('should record spans with attributes, events and status', () => {
      const tracer = new InMemoryTracer();
      const span = tracer.startSpan('mastodon.statuses.get', { 'http.method': 'GET' });
      span.setAttribute('http.status_code', 200);
      span.addEvent('decoded');
      span.setStatus('ok');
      span.end();

      const [recorded] = tracer.getSpans();
      expect(recorded?.attributes).toEqual({ 'http.method': 'GET', 'http.status_code': 200 });
      expect(recorded?.events.map((event) => event.name)).toEqual(['decoded']);
      expect(recorded?.status).toBe('ok');
      expect(recorded?.getDurationMs()).toBeGreaterThanOrEqual(0);
      expect(tracer.getCurrentSpan()).toBe(span);
    });

    it('should share one trace id until cleared', () => {
      const tracer = new InMemoryTracer();
      const first = tracer.startSpan('a');
      const second = tracer.startSpan('b');
      expect(first.traceId).toBe(second.traceId);
      expect(first.spanId).not.toBe(second.spanId);

      tracer.clear();
      expect(tracer.getSpans()).toHaveLength(0);
      expect(tracer.getCurrentSpan()).toBeUndefined();
    });
  });

  describe('NoopTracer', () => {
    it('should hand out spans that record nothing', () => {
      const tracer = new NoopTracer();
      const span = tracer.startSpan();
      span.setStatus('error', 'ignored');
      span.end();

      expect(tracer.getCurrentSpan()).toBeUndefined();
    });
  });
});

describe('resolveObservability', () => {
  it('should keep given collaborators and default the rest', () => {
    const logger = new InMemoryLogger();
    const resolved = resolveObservability({ logger });

    expect(resolved.logger).toBe(logger);
    expect(resolved.metrics).toBeInstanceOf(NoopMetricsCollector);
    expect(resolved.tracer).toBeInstanceOf(NoopTracer);
  });
});
