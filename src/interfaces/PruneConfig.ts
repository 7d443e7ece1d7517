import { LogLevel } from './Logger';

export interface PruneConfig {
  keepSpec: string;
  keyfile?: string;
  dryRun: boolean;
  tarsnapPath: string;
  commandTimeoutMs: number;
  logLevel: LogLevel;
}
