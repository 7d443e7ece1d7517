export type LogMeta = Record<string, unknown>;

export interface Logger {
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, error?: Error, meta?: LogMeta): void;
  debug(message: string, meta?: LogMeta): void;

  // Specialized logging methods for prune runs
  logPruneStart(keepSpec: string, dryRun: boolean): void;
  logListingParsed(archiveCount: number, familyCount: number): void;
  logFamilyDecision(baseName: string, archiveCount: number, deleteCount: number): void;
  logPruneComplete(deletedCount: number, remainingCount: number, dryRun: boolean, duration: number): void;
  logCommandError(command: string, error: Error, meta?: LogMeta): void;
  logConfigurationStart(config: LogMeta): void;
}

export enum LogLevel {
  ERROR = 'error',
  WARN = 'warn',
  INFO = 'info',
  DEBUG = 'debug',
}
