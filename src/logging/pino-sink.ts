import pino from 'pino';
import { LogEntry, LogLevel, LogSink } from './types.js';
import { redactSecrets } from '../config.js';

export type SinkDestination = { kind: 'file'; path: string } | { kind: 'stderr' };

export class PinoSink implements LogSink {
  private pino: pino.Logger;

  constructor(destination: SinkDestination) {
    this.pino = pino(
      {
        level: 'debug', // Pino level (we filter in logger.ts)

        formatters: {
          level: (label) => ({ level: label }),
        },

        timestamp: pino.stdTimeFunctions.isoTime,

        redact: {
          paths: ['*.token', '*.password', '*.auth', 'Authorization', '*.Authorization'],
          censor: '***REDACTED***',
        },
      },
      destination.kind === 'file'
        ? pino.destination({
            dest: destination.path,
            sync: false,
            mkdir: true,
          })
        : pino.destination(2)
    );
  }

  log(entry: LogEntry): void {
    try {
      const safeMessage = redactSecrets(entry.message);
      const safeData: Record<string, unknown> | undefined = entry.data
        ? JSON.parse(redactSecrets(JSON.stringify(entry.data)))
        : undefined;

      this.pino[this.mapToPinoLevel(entry.level)](
        {
          level: entry.level, // Keep the RFC 5424 level in the record
          logger: entry.logger,
          timestamp: entry.timestamp || new Date().toISOString(),
          ...safeData,
        },
        safeMessage
      );
    } catch (error) {
      console.error('[PinoSink] Failed to write log:', error);
    }
  }

  private mapToPinoLevel(level: LogLevel): 'debug' | 'info' | 'warn' | 'error' | 'fatal' {
    switch (level) {
      case LogLevel.DEBUG: return 'debug';
      case LogLevel.INFO: return 'info';
      case LogLevel.NOTICE: return 'info';
      case LogLevel.WARNING: return 'warn';
      case LogLevel.ERROR: return 'error';
      case LogLevel.CRITICAL: return 'error';
      case LogLevel.ALERT: return 'fatal';
      case LogLevel.EMERGENCY: return 'fatal';
      default: return 'info';
    }
  }

  close(): void {
    this.pino.flush();
  }
}
