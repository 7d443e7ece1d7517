/**
 * Interface for the tarsnap commands the pruner issues
 */
export interface TarsnapClient {
  /** Raw `--list-archives -v` output, timestamps in UTC */
  listArchives(): Promise<string>;

  /** Delete the named archives in a single call */
  deleteArchives(names: readonly string[]): Promise<void>;
}

export interface TarsnapClientConfig {
  /** tarsnap executable */
  tarsnapPath: string;

  /** Key file passed as --keyfile */
  keyfile?: string;

  /** Kill a command that runs longer than this */
  commandTimeoutMs: number;
}
