export * from './events/index.js';
export { EventsLogger, logger, formatLogLine, type LogEntry, type LogLevel } from './logger.js';
export {
  EventsConfigSchema,
  applyEnvOverrides,
  configureEvents,
  getEventsConfig,
  loadConfig,
  type EventsConfig,
} from './config.js';
export {
  emitToManyReceivers,
  receiveFromManyEmitters,
  runBenchmarks,
  formatBenchmarkResult,
  type BenchmarkResult,
} from './bench/benchmark.js';
