/**
 * Built-in observers.
 * @module
 */
export {
  createLoggingObserver,
  defaultRedactedHeaders,
  type LoggingObserverOptions,
  type LogLevel,
} from './logging.js';
