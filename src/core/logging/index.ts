export {
  LogLevel,
  type Logger,
  type LoggingConfig,
  ROOT_LOGGER_NAME,
  configureLogging,
  getLogger,
  resetLoggers,
} from './logger.js';
