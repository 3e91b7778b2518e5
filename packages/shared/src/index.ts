export {
  createLogger,
  isLogLevel,
  silentLogger,
  type LogLevel,
  type LogMetadata,
  type LogSink,
  type Logger,
  type LoggerOptions,
} from './logger.js';
