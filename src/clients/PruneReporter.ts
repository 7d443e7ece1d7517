import { PrunePlan } from '../interfaces/RetentionSelector';

export type LineWriter = (line: string) => void;

export function pluralSuffix(count: number): string {
  return count === 1 ? '' : 's';
}

/**
 * Human-readable account of a prune run, on standard output by default
 */
export class PruneReporter {
  private write: LineWriter;

  constructor(write: LineWriter = line => console.log(line)) {
    this.write = write;
  }

  reportPlan(plan: PrunePlan, dryRun: boolean): void {
    const count = plan.toDelete.length;
    this.write(
      `${dryRun ? 'Would' : 'Will'} delete the following ${count} archive${pluralSuffix(count)}:`
    );
    this.writeNames(plan.toDelete);

    const remaining = plan.remaining.length;
    this.write(`Leaving the following ${remaining} remaining archive${pluralSuffix(remaining)}:`);
    this.writeNames(plan.remaining);
  }

  reportDeleting(count: number): void {
    this.write(`Deleting ${count} archive${pluralSuffix(count)}...`);
  }

  reportNothingToDelete(): void {
    this.write('Nothing to delete.');
  }

  reportMessage(message: string): void {
    this.write(message);
  }

  private writeNames(names: readonly string[]): void {
    for (const name of [...names].sort()) {
      this.write(`  ${name}`);
    }
  }
}
