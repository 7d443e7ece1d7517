/**
 * Result of a prune run
 */
export interface PruneResult {
  /** Names scheduled for deletion */
  toDelete: string[];

  /** Names left in place, sorted */
  remaining: string[];

  /** Whether this was a dry run */
  dryRun: boolean;

  /** Whether a delete command was issued */
  deleted: boolean;

  /** Number of archives in the listing */
  archiveCount: number;

  /** Number of archive families */
  familyCount: number;

  /** Duration of the run in milliseconds */
  duration: number;
}

/**
 * Interface for the prune orchestration manager
 */
export interface PruneManager {
  /** List, decide, report and (unless dry) delete */
  executePrune(): Promise<PruneResult>;
}
