// RFC 5424 log levels
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  NOTICE = 'notice',
  WARNING = 'warning',
  ERROR = 'error',
  CRITICAL = 'critical',
  ALERT = 'alert',
  EMERGENCY = 'emergency'
}

// Log entry structure
export interface LogEntry {
  level: LogLevel;
  message: string;
  logger?: string;
  timestamp?: string;
  data?: Record<string, unknown>;
}

// Logger configuration
export interface LoggerConfig {
  enabled: boolean;
  level: LogLevel;
  stderrEnabled: boolean;
  fileEnabled: boolean;
  filePath: string;
  requestsEnabled: boolean;
}

export interface LogSink {
  log(entry: LogEntry): void;
  close(): void;
}
