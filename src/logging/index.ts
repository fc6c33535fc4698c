export { logger } from './logger.js';
export { LogLevel, type LogEntry, type LoggerConfig, type LogSink } from './types.js';
export { PinoSink } from './pino-sink.js';
