import { LogLevel, LogEntry, LoggerConfig, LogSink } from './types.js';
import { PinoSink } from './pino-sink.js';

function parseLevel(value: string | undefined): LogLevel {
  if (!value) return LogLevel.ERROR;

  const match = Object.values(LogLevel).find((level) => level === value.toLowerCase());
  if (!match) {
    console.error(`[Logger] Unknown FAVRO_LOG_LEVEL "${value}", using "error"`);
  }
  return match ?? LogLevel.ERROR;
}

export class Logger {
  private config: LoggerConfig;
  private stderrSink: LogSink | null;
  private fileSink: LogSink | null;
  private extraSinks: LogSink[] = [];

  constructor(config?: Partial<LoggerConfig>) {
    this.config = { ...this.loadConfig(), ...config };
    this.stderrSink = this.config.stderrEnabled ? new PinoSink({ kind: 'stderr' }) : null;
    this.fileSink = this.config.fileEnabled
      ? new PinoSink({ kind: 'file', path: this.config.filePath })
      : null;
  }

  // Load config from environment
  private loadConfig(): LoggerConfig {
    return {
      enabled: process.env.FAVRO_LOG_ENABLED !== 'false',
      level: parseLevel(process.env.FAVRO_LOG_LEVEL),
      stderrEnabled: process.env.FAVRO_LOG_STDERR_ENABLED === 'true',
      fileEnabled: process.env.FAVRO_LOG_FILE_ENABLED === 'true',
      filePath: process.env.FAVRO_LOG_FILE_PATH || './logs/favro-cli.log',
      requestsEnabled: process.env.FAVRO_LOG_REQUESTS === 'true',
    };
  }

  // Check if level should be logged
  private shouldLog(level: LogLevel): boolean {
    if (!this.config.enabled) return false;
    const levels = Object.values(LogLevel);
    return levels.indexOf(level) >= levels.indexOf(this.config.level);
  }

  private log(entry: LogEntry): void {
    if (!this.shouldLog(entry.level)) return;

    if (!entry.timestamp) {
      entry.timestamp = new Date().toISOString();
    }

    this.stderrSink?.log(entry);
    this.fileSink?.log(entry);
    for (const sink of this.extraSinks) {
      sink.log(entry);
    }
  }

  debug(message: string, data?: Record<string, unknown>, logger?: string): void {
    this.log({ level: LogLevel.DEBUG, message, data, logger });
  }

  info(message: string, data?: Record<string, unknown>, logger?: string): void {
    this.log({ level: LogLevel.INFO, message, data, logger });
  }

  notice(message: string, data?: Record<string, unknown>, logger?: string): void {
    this.log({ level: LogLevel.NOTICE, message, data, logger });
  }

  warning(message: string, data?: Record<string, unknown>, logger?: string): void {
    this.log({ level: LogLevel.WARNING, message, data, logger });
  }

  error(message: string, data?: Record<string, unknown>, logger?: string): void {
    this.log({ level: LogLevel.ERROR, message, data, logger });
  }

  critical(message: string, data?: Record<string, unknown>, logger?: string): void {
    this.log({ level: LogLevel.CRITICAL, message, data, logger });
  }

  attach(sink: LogSink): void {
    this.extraSinks.push(sink);
  }

  detach(sink: LogSink): void {
    this.extraSinks = this.extraSinks.filter((s) => s !== sink);
  }

  // Runtime config update, used by --verbose
  updateConfig(newConfig: Partial<LoggerConfig>): void {
    this.config = { ...this.config, ...newConfig };

    if (newConfig.stderrEnabled !== undefined) {
      if (newConfig.stderrEnabled && !this.stderrSink) {
        this.stderrSink = new PinoSink({ kind: 'stderr' });
      } else if (!newConfig.stderrEnabled && this.stderrSink) {
        this.stderrSink.close();
        this.stderrSink = null;
      }
    }

    if (newConfig.fileEnabled !== undefined || newConfig.filePath !== undefined) {
      this.fileSink?.close();
      this.fileSink = this.config.fileEnabled
        ? new PinoSink({ kind: 'file', path: this.config.filePath })
        : null;
    }

    this.debug('Logging configuration updated', { config: { ...this.config } }, 'logger');
  }

  getConfig(): LoggerConfig {
    return { ...this.config };
  }

  close(): void {
    this.stderrSink?.close();
    this.fileSink?.close();
  }
}

// Singleton instance
export const logger = new Logger();
