import {
  RetentionSelector as IRetentionSelector,
  PrunePlan,
} from '../interfaces/RetentionSelector';
import { Archive, ArchiveFamilies } from '../types/Archive';
import { KeepSpec } from '../types/KeepSpec';
import { bucketKey } from '../retention/TimeBuckets';

/**
 * Grandfather-father-son retention: every keep spec retains the newest
 * archive of each of its `count` most recent periods, and an archive
 * survives if any spec retains it
 */
export class RetentionSelector implements IRetentionSelector {
  /**
   * Walk newest to oldest, keeping the first archive of each new period.
   * Archives inside an already-kept period are skipped and do not count.
   */
  selectRetained(archives: readonly Archive[], keepSpec: KeepSpec): string[] {
    const retained: string[] = [];
    let previousBucket: string | undefined;

    for (const archive of archives) {
      if (retained.length === keepSpec.count) {
        break;
      }

      const bucket = bucketKey(archive.timestamp, keepSpec.granularity);
      if (bucket !== previousBucket) {
        retained.push(archive.name);
        previousBucket = bucket;
      }
    }

    return retained;
  }

  namesToDelete(archives: readonly Archive[], keepSpecs: readonly KeepSpec[]): string[] {
    const newestFirst = sortNewestFirst(archives);

    const keep = new Set<string>();
    for (const keepSpec of keepSpecs) {
      for (const name of this.selectRetained(newestFirst, keepSpec)) {
        keep.add(name);
      }
    }

    return archives.filter(archive => !keep.has(archive.name)).map(archive => archive.name);
  }

  planDeletion(families: ArchiveFamilies, keepSpecs: readonly KeepSpec[]): PrunePlan {
    const toDelete: string[] = [];
    for (const archives of families.values()) {
      toDelete.push(...this.namesToDelete(archives, keepSpecs));
    }

    return {
      toDelete,
      remaining: this.remainingNames(families, toDelete),
    };
  }

  remainingNames(families: ArchiveFamilies, toDelete: Iterable<string>): string[] {
    const remaining = new Set<string>();
    for (const archives of families.values()) {
      for (const archive of archives) {
        remaining.add(archive.name);
      }
    }
    for (const name of toDelete) {
      remaining.delete(name);
    }
    return [...remaining].sort();
  }
}

/**
 * Stable copy sorted by timestamp, newest first
 */
export function sortNewestFirst(archives: readonly Archive[]): Archive[] {
  return [...archives].sort((a, b) => b.timestamp.getTime() - a.timestamp.getTime());
}
