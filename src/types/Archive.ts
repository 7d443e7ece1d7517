/**
 * A single dated archive as reported by `tarsnap --list-archives -v`
 */
export interface Archive {
  /** Full archive name */
  readonly name: string;

  /** Creation time, UTC, second precision */
  readonly timestamp: Date;
}

/**
 * Archives grouped by base name, in first-seen order
 */
export type ArchiveFamilies = Map<string, Archive[]>;
