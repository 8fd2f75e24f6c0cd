/**
 * Infrastructure Module
 * =====================
 *
 * Logging, counters and locks shared by the pipeline.
 */

// Metrics / Logging
export {
  MetricsCollector,
  createMetricsCollector,
  configureLogging,
  getLogThreshold,
  isLogThreshold,
  type LogLevel,
  type LogThreshold,
  type LogEntry,
  type TimerStats,
} from './metrics.js';

// Locks
export { Mutex, KeyedMutex } from './lock.js';
