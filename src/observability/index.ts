/**
 * Logging, metrics and tracing seams for the resilient client.
 *
 * The client only talks to the `Logger`, `MetricsCollector` and `Tracer`
 * interfaces. No-op implementations are the defaults; the in-memory ones
 * back the tests.
 */

// ============================================================================
// Logging
// ============================================================================

export enum LogLevel {
  Debug = 0,
  Info = 1,
  Warn = 2,
  Error = 3,
}

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  /** Returns a logger that adds `context` to every record. */
  child(context: LogContext): Logger;
}

/**
 * A log line after context merging and redaction.
 */
export interface LogRecord {
  level: LogLevel;
  message: string;
  context: LogContext;
  timestamp: Date;
}

const SENSITIVE_KEY = /^(authorization|cookie|password|secret|credential|token|api[-_]?key|access[-_]?token)$/i;

/**
 * Replaces the values of credential-like keys with `[REDACTED]`, including
 * inside nested plain objects.
 */
export function redactSensitive(context: LogContext): LogContext {
  return Object.fromEntries(
    Object.entries(context).map(([key, value]): [string, unknown] => {
      if (SENSITIVE_KEY.test(key)) {
        return [key, '[REDACTED]'];
      }
      return [key, isPlainObject(value) ? redactSensitive(value) : value];
    })
  );
}

function isPlainObject(value: unknown): value is LogContext {
  return typeof value === 'object' && value !== null && Object.getPrototypeOf(value) === Object.prototype;
}

/**
 * Level filtering, context merging and redaction shared by the loggers.
 * Subclasses decide where records go.
 */
abstract class BaseLogger implements Logger {
  protected constructor(
    protected readonly level: LogLevel,
    protected readonly context: LogContext
  ) {}

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

  protected abstract write(record: LogRecord): void;

  private emit(level: LogLevel, message: string, context?: LogContext): void {
    if (level < this.level) {
      return;
    }
    this.write({
      level,
      message,
      context: redactSensitive({ ...this.context, ...context }),
      timestamp: new Date(),
    });
  }
}

export interface ConsoleLoggerOptions {
  /** Lowest level written. Defaults to `Info`. */
  level?: LogLevel;
  context?: LogContext;
  /** `pretty` (default) or one JSON object per line */
  format?: 'json' | 'pretty';
}

/**
 * Writes to the console; `Warn` and `Error` go to stderr.
 */
export class ConsoleLogger extends BaseLogger {
  private readonly format: 'json' | 'pretty';

  constructor(options: ConsoleLoggerOptions = {}) {
    super(options.level ?? LogLevel.Info, options.context ?? {});
    this.format = options.format ?? 'pretty';
  }

  child(context: LogContext): Logger {
    return new ConsoleLogger({
      level: this.level,
      context: { ...this.context, ...context },
      format: this.format,
    });
  }

  protected write(record: LogRecord): void {
    const levelName = LogLevel[record.level].toUpperCase();
    const timestamp = record.timestamp.toISOString();
    const out = record.level >= LogLevel.Warn ? console.error : console.log;

    if (this.format === 'json') {
      out(JSON.stringify({ timestamp, level: levelName, message: record.message, ...record.context }));
      return;
    }
    const suffix = Object.keys(record.context).length > 0 ? ` ${JSON.stringify(record.context)}` : '';
    out(`[${timestamp}] ${levelName}: ${record.message}${suffix}`);
  }
}

/**
 * Discards everything.
 */
export class NoopLogger implements Logger {
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
  child(_context: LogContext): Logger {
    return this;
  }
}

/**
 * Keeps records in memory. Children append to their parent's records.
 */
export class InMemoryLogger extends BaseLogger {
  private readonly records: LogRecord[];

  constructor(context: LogContext = {}, records: LogRecord[] = []) {
    super(LogLevel.Debug, context);
    this.records = records;
  }

  child(context: LogContext): Logger {
    return new InMemoryLogger({ ...this.context, ...context }, this.records);
  }

  getLogs(): LogRecord[] {
    return [...this.records];
  }

  getLogsByLevel(level: LogLevel): LogRecord[] {
    return this.records.filter((record) => record.level === level);
  }

  getMessages(): string[] {
    return this.records.map((record) => record.message);
  }

  clear(): void {
    this.records.length = 0;
  }

  protected write(record: LogRecord): void {
    this.records.push(record);
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
 * Metric names emitted by the client. Request metrics carry a `method` label.
 */
export const MetricNames = {
  /** Counter: logical requests issued by callers */
  REQUESTS_TOTAL: 'resilient_client_requests_total',
  /** Counter: requests that returned a payload */
  REQUESTS_SUCCESS: 'resilient_client_requests_success',
  /** Counter: requests that raised an error */
  REQUESTS_FAILED: 'resilient_client_requests_failed',
  /** Counter: retries scheduled after a retryable failure */
  RETRIES: 'resilient_client_retries',
  /** Counter: GETs answered from the response cache */
  CACHE_HITS: 'resilient_client_cache_hits',
  /** Counter: GETs that had to go to the network */
  CACHE_MISSES: 'resilient_client_cache_misses',
  /** Counter: attempts that waited for a rate limiter token */
  RATE_LIMIT_WAITS: 'resilient_client_rate_limit_waits',
  /** Histogram: request latency in seconds */
  REQUEST_LATENCY: 'resilient_client_request_latency_seconds',
  /** Gauge: tokens left in the rate limiter after the last acquire */
  RATE_LIMIT_TOKENS: 'resilient_client_rate_limit_tokens',
  /** Gauge: live entries in the response cache */
  CACHE_ENTRIES: 'resilient_client_cache_entries',
} as const;

export class NoopMetricsCollector implements MetricsCollector {
  incrementCounter(): void {}
  recordHistogram(): void {}
  setGauge(): void {}
}

/**
 * `name{a="1",b="2"}` with labels sorted by name.
 */
function seriesKey(name: string, labels?: MetricLabels): string {
  const entries = Object.entries(labels ?? {});
  if (entries.length === 0) {
    return name;
  }
  entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  return `${name}{${entries.map(([key, value]) => `${key}="${value}"`).join(',')}}`;
}

/**
 * Keeps every series in memory for assertions.
 */
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
    this.histograms.set(key, [...(this.histograms.get(key) ?? []), value]);
  }

  setGauge(name: string, value: number, labels?: MetricLabels): void {
    this.gauges.set(seriesKey(name, labels), value);
  }

  getCounter(name: string, labels?: MetricLabels): number {
    return this.counters.get(seriesKey(name, labels)) ?? 0;
  }

  getHistogram(name: string, labels?: MetricLabels): number[] {
    return this.histograms.get(seriesKey(name, labels)) ?? [];
  }

  getGauge(name: string, labels?: MetricLabels): number | undefined {
    return this.gauges.get(seriesKey(name, labels));
  }
}

// ============================================================================
// Tracing
// ============================================================================

export type SpanStatus = 'unset' | 'ok' | 'error';

export type AttributeValue = string | number | boolean;

export type SpanAttributes = Record<string, AttributeValue>;

/**
 * One logical request, from cache lookup to the final attempt.
 */
export interface Span {
  setAttribute(key: string, value: AttributeValue): void;
  addEvent(name: string, attributes?: SpanAttributes): void;
  setStatus(status: SpanStatus, message?: string): void;
  end(): void;
}

export interface Tracer {
  startSpan(name: string, attributes?: SpanAttributes): Span;
}

const NOOP_SPAN: Span = {
  setAttribute() {},
  addEvent() {},
  setStatus() {},
  end() {},
};

export class NoopTracer implements Tracer {
  startSpan(_name: string, _attributes?: SpanAttributes): Span {
    return NOOP_SPAN;
  }
}

export interface SpanEvent {
  name: string;
  attributes?: SpanAttributes;
}

/**
 * A span recorded by `InMemoryTracer`.
 */
export class InMemorySpan implements Span {
  readonly attributes: SpanAttributes;
  readonly events: SpanEvent[] = [];
  status: SpanStatus = 'unset';
  statusMessage?: string;
  ended = false;

  constructor(
    readonly name: string,
    attributes: SpanAttributes = {}
  ) {
    this.attributes = { ...attributes };
  }

  setAttribute(key: string, value: AttributeValue): void {
    this.attributes[key] = value;
  }

  addEvent(name: string, attributes?: SpanAttributes): void {
    this.events.push({ name, attributes });
  }

  setStatus(status: SpanStatus, message?: string): void {
    this.status = status;
    this.statusMessage = message;
  }

  end(): void {
    this.ended = true;
  }
}

/**
 * Records spans in start order.
 */
export class InMemoryTracer implements Tracer {
  private readonly spans: InMemorySpan[] = [];

  startSpan(name: string, attributes?: SpanAttributes): Span {
    const span = new InMemorySpan(name, attributes);
    this.spans.push(span);
    return span;
  }

  getSpans(): InMemorySpan[] {
    return [...this.spans];
  }
}
