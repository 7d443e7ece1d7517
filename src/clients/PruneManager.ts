import { PruneManager as IPruneManager, PruneResult } from '../interfaces/PruneManager';
import { TarsnapClient } from '../interfaces/TarsnapClient';
import { RetentionSelector } from '../interfaces/RetentionSelector';
import { PruneConfig } from '../interfaces/PruneConfig';
import { Logger } from '../interfaces/Logger';
import { parseKeepSpecs, formatKeepSpec } from '../retention/KeepSpecParser';
import { parseListing } from '../listing/ListingParser';
import { PruneReporter } from './PruneReporter';

/**
 * PruneManager implementation that orchestrates a complete prune run.
 * Errors are not caught here; any failure aborts the run.
 */
export class PruneManager implements IPruneManager {
  private tarsnapClient: TarsnapClient;
  private selector: RetentionSelector;
  private reporter: PruneReporter;
  private logger: Logger;
  private config: PruneConfig;

  constructor(
    tarsnapClient: TarsnapClient,
    selector: RetentionSelector,
    reporter: PruneReporter,
    logger: Logger,
    config: PruneConfig
  ) {
    this.tarsnapClient = tarsnapClient;
    this.selector = selector;
    this.reporter = reporter;
    this.logger = logger;
    this.config = config;
  }

  async executePrune(): Promise<PruneResult> {
    const startTime = Date.now();
    const { dryRun } = this.config;

    this.logger.logPruneStart(this.config.keepSpec, dryRun);

    // Reject a bad policy before touching tarsnap
    const keepSpecs = parseKeepSpecs(this.config.keepSpec);
    this.logger.debug('Keep specs parsed', { keepSpecs: keepSpecs.map(formatKeepSpec) });

    const listing = await this.tarsnapClient.listArchives();
    const families = parseListing(listing);

    let archiveCount = 0;
    for (const archives of families.values()) {
      archiveCount += archives.length;
    }
    this.logger.logListingParsed(archiveCount, families.size);

    const plan = this.selector.planDeletion(families, keepSpecs);
    for (const [baseName, archives] of families) {
      const familyNames = new Set(archives.map(archive => archive.name));
      const deleteCount = plan.toDelete.filter(name => familyNames.has(name)).length;
      this.logger.logFamilyDecision(baseName, archives.length, deleteCount);
    }

    this.reporter.reportPlan(plan, dryRun);

    let deleted = false;
    if (!dryRun) {
      if (plan.toDelete.length > 0) {
        this.reporter.reportDeleting(plan.toDelete.length);
        await this.tarsnapClient.deleteArchives(plan.toDelete);
        deleted = true;
      } else {
        this.reporter.reportNothingToDelete();
      }
    }

    const duration = Date.now() - startTime;
    this.logger.logPruneComplete(plan.toDelete.length, plan.remaining.length, dryRun, duration);

    return {
      toDelete: plan.toDelete,
      remaining: plan.remaining,
      dryRun,
      deleted,
      archiveCount,
      familyCount: families.size,
      duration,
    };
  }
}
