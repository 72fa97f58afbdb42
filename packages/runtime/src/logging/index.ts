export {
  consoleLogger,
  silentLogger,
  withMinimumLevel,
  createCapturingLogger,
  type Logger,
  type LogLevel,
  type LogEntry,
} from './logger.js';
