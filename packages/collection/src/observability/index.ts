export {
  CollectionLogger,
  createLogger,
  type LogEntry,
  type LogLevel,
  type LoggerConfig,
} from './logger.js';
