import { Archive, ArchiveFamilies } from '../types/Archive';
import { KeepSpec } from '../types/KeepSpec';

/**
 * Deletion decision for a whole listing
 */
export interface PrunePlan {
  /** Archive names to delete, family by family */
  toDelete: string[];

  /** Every other archive name, sorted */
  remaining: string[];
}

/**
 * Interface for the retention decision engine
 */
export interface RetentionSelector {
  /**
   * Names retained by a single keep spec
   * @param archives archives of one family, newest first
   */
  selectRetained(archives: readonly Archive[], keepSpec: KeepSpec): string[];

  /**
   * Names of one family's archives not retained by any keep spec,
   * in the order the archives were given
   */
  namesToDelete(archives: readonly Archive[], keepSpecs: readonly KeepSpec[]): string[];

  /** Apply the keep specs to every family independently */
  planDeletion(families: ArchiveFamilies, keepSpecs: readonly KeepSpec[]): PrunePlan;

  /** All archive names not in `toDelete`, sorted */
  remainingNames(families: ArchiveFamilies, toDelete: Iterable<string>): string[];
}
