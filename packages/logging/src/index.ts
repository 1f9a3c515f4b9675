/**
 * @fnhost/logging - categorized pino logging with filters and sinks
 */

export {
  LoggerFactory,
  LoggingBuilder,
  createNullLogger,
  type LoggerFactoryOptions,
} from './factory.js';
export { matchesCategory, isEnabled } from './filters.js';
export {
  LOG_LEVELS,
  isLogLevel,
  type LogLevel,
  type LogEntry,
  type LogSink,
  type LogFilterPredicate,
  type LogFilterRule,
} from './types.js';
export type { Logger, DestinationStream } from 'pino';
