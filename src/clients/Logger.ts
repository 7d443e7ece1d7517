import winston from 'winston';
import { Logger as ILogger, LogLevel, LogMeta } from '../interfaces/Logger';

const SENSITIVE_KEYS = ['password', 'secret', 'token', 'credential', 'keyfile'];

export interface LoggerOptions {
  /** Mute every transport */
  silent?: boolean;
}

const LOG_LEVELS: readonly string[] = Object.values(LogLevel);

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.includes(value);
}

function isPlainObject(value: unknown): value is LogMeta {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class Logger implements ILogger {
  private winston: winston.Logger;

  constructor(logLevel: LogLevel = LogLevel.WARN, options: LoggerOptions = {}) {
    this.winston = winston.createLogger({
      level: logLevel,
      silent: options.silent ?? false,
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.errors({ stack: true }),
        winston.format.printf(info => {
          const { timestamp, level, message, stack, ...meta } = info;
          const logEntry: LogMeta = {
            timestamp,
            level,
            message,
          };

          if (stack) {
            logEntry.stack = stack;
          }

          if (Object.keys(meta).length > 0) {
            logEntry.meta = this.sanitizeMeta(meta);
          }

          return JSON.stringify(logEntry);
        })
      ),
      // stdout carries the prune report
      transports: [
        new winston.transports.Console({
          stderrLevels: Object.values(LogLevel),
        }),
      ],
    });
  }

  /**
   * Sanitize metadata to remove sensitive information
   */
  private sanitizeMeta(meta: LogMeta): LogMeta {
    const sanitized: LogMeta = { ...meta };

    for (const [key, value] of Object.entries(sanitized)) {
      const lowerKey = key.toLowerCase();
      const isSensitive = SENSITIVE_KEYS.some(sensitive => lowerKey.includes(sensitive));

      if (isSensitive) {
        sanitized[key] = '[REDACTED]';
      } else if (isPlainObject(value)) {
        sanitized[key] = this.sanitizeMeta(value);
      }
    }

    return sanitized;
  }

  info(message: string, meta?: LogMeta): void {
    this.winston.info(message, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.winston.warn(message, meta);
  }

  error(message: string, error?: Error, meta?: LogMeta): void {
    const details: NodeJS.ErrnoException | undefined = error;
    const errorMeta = {
      ...meta,
      ...(details && {
        error: {
          name: details.name,
          message: details.message,
          stack: details.stack,
          ...(details.code !== undefined && { code: details.code }),
          ...(details.syscall !== undefined && { syscall: details.syscall }),
          ...(details.path !== undefined && { path: details.path }),
        },
      }),
    };
    this.winston.error(message, errorMeta);
  }

  debug(message: string, meta?: LogMeta): void {
    this.winston.debug(message, meta);
  }

  logPruneStart(keepSpec: string, dryRun: boolean): void {
    this.info('Prune run started', {
      operation: 'prune_start',
      keepSpec,
      dryRun,
    });
  }

  logListingParsed(archiveCount: number, familyCount: number): void {
    this.info('Archive listing parsed', {
      operation: 'listing_parsed',
      archiveCount,
      familyCount,
    });
  }

  logFamilyDecision(baseName: string, archiveCount: number, deleteCount: number): void {
    this.debug('Retention decided for archive family', {
      operation: 'family_decision',
      baseName,
      archiveCount,
      deleteCount,
      keepCount: archiveCount - deleteCount,
    });
  }

  logPruneComplete(deletedCount: number, remainingCount: number, dryRun: boolean, duration: number): void {
    this.info('Prune run completed', {
      operation: 'prune_complete',
      deletedCount,
      remainingCount,
      dryRun,
      duration,
    });
  }

  logCommandError(command: string, error: Error, meta?: LogMeta): void {
    this.error(`Command failed: ${command}`, error, {
      operation: 'command_error',
      command,
      ...meta,
    });
  }

  logConfigurationStart(config: LogMeta): void {
    this.debug('Prune starting with configuration', {
      operation: 'startup',
      config: this.sanitizeMeta(config),
    });
  }
}
