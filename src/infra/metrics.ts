/**
 * Observability / Logging
 * =======================
 *
 * Structured logging plus run counters and timers.
 * Every pipeline component owns one collector named after it.
 */

// =============================================================================
// Types
// =============================================================================

/**
 * Log level.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Threshold accepted by configureLogging. `silent` suppresses console output.
 */
export type LogThreshold = LogLevel | 'silent';

/**
 * Structured log entry.
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: number;
  component: string;
  context?: Record<string, unknown>;
}

/**
 * Summary of recorded durations.
 */
export interface TimerStats {
  count: number;
  sum: number;
  avg: number;
  min: number;
  max: number;
}

const LEVEL_ORDER: Record<LogThreshold, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

/**
 * Check whether a string names a log threshold.
 */
export function isLogThreshold(value: string): value is LogThreshold {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

function initialThreshold(): LogThreshold {
  const fromEnv = process.env.TESTFORGE_LOG_LEVEL;
  return fromEnv !== undefined && isLogThreshold(fromEnv) ? fromEnv : 'info';
}

let consoleThreshold: LogThreshold = initialThreshold();

/**
 * Set the console threshold for every collector.
 * Entries below the threshold are still kept in memory.
 */
export function configureLogging(options: { level: LogThreshold }): void {
  consoleThreshold = options.level;
}

/**
 * Current console threshold.
 */
export function getLogThreshold(): LogThreshold {
  return consoleThreshold;
}

// =============================================================================
// Metrics Collector
// =============================================================================

/**
 * Per-component logger and metrics store.
 */
export class MetricsCollector {
  private counters: Map<string, number> = new Map();
  private timers: Map<string, number[]> = new Map();
  private logs: LogEntry[] = [];

  private readonly component: string;
  private readonly maxLogs: number;

  constructor(component: string, maxLogs: number = 1000) {
    this.component = component;
    this.maxLogs = maxLogs;
  }

  // ===========================================================================
  // Logging
  // ===========================================================================

  /**
   * Log a message.
   */
  log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    const entry: LogEntry = {
      level,
      message,
      timestamp: Date.now(),
      component: this.component,
    };
    if (context) entry.context = context;

    this.logs.push(entry);

    if (this.logs.length > this.maxLogs) {
      this.logs = this.logs.slice(-this.maxLogs);
    }

    if (LEVEL_ORDER[level] < LEVEL_ORDER[consoleThreshold]) {
      return;
    }

    const prefix = `[${this.component}]`;
    switch (level) {
      case 'debug':
        console.debug(prefix, message, context ?? '');
        break;
      case 'info':
        console.log(prefix, message, context ?? '');
        break;
      case 'warn':
        console.warn(prefix, message, context ?? '');
        break;
      case 'error':
        console.error(prefix, message, context ?? '');
        break;
    }
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.log('error', message, context);
  }

  /**
   * Get logs, optionally filtered by level and limited to the most recent.
   */
  getLogs(level?: LogLevel, limit?: number): LogEntry[] {
    let logs = this.logs;
    if (level) {
      logs = logs.filter((l) => l.level === level);
    }
    if (limit) {
      logs = logs.slice(-limit);
    }
    return logs;
  }

  // ===========================================================================
  // Counters
  // ===========================================================================

  /**
   * Increment a counter.
   */
  increment(name: string, value: number = 1): void {
    this.counters.set(name, (this.counters.get(name) ?? 0) + value);
  }

  /**
   * Get counter value.
   */
  getCounter(name: string): number {
    return this.counters.get(name) ?? 0;
  }

  // ===========================================================================
  // Timers
  // ===========================================================================

  /**
   * Start a timer. The returned function stops it and returns the duration in ms.
   */
  startTimer(name: string): () => number {
    const start = performance.now();
    return () => {
      const duration = performance.now() - start;
      const values = this.timers.get(name) ?? [];
      values.push(duration);
      this.timers.set(name, values.length > 1000 ? values.slice(-1000) : values);
      return duration;
    };
  }

  /**
   * Get timer statistics, or null if nothing was recorded.
   */
  getTimerStats(name: string): TimerStats | null {
    const values = this.timers.get(name);
    if (!values || values.length === 0) {
      return null;
    }

    const sum = values.reduce((a, b) => a + b, 0);
    return {
      count: values.length,
      sum,
      avg: sum / values.length,
      min: Math.min(...values),
      max: Math.max(...values),
    };
  }
}

// =============================================================================
// Factory
// =============================================================================

/**
 * Create a metrics collector.
 */
export function createMetricsCollector(component: string): MetricsCollector {
  return new MetricsCollector(component);
}
