import { KeepSpec } from '../types/KeepSpec';
import { PruneError } from '../types/PruneError';
import { GRANULARITY_TAGS, granularityFromTag } from './TimeBuckets';

export class InvalidKeepSpecError extends PruneError {
  constructor(public readonly token: string) {
    super(`invalid keep spec: '${token}'`, 'keep_spec');
    this.name = 'InvalidKeepSpecError';
  }
}

// Longest tags first so "mon" and "min" are never cut short
const TAG_ALTERNATION = Object.keys(GRANULARITY_TAGS)
  .sort((a, b) => b.length - a.length)
  .join('|');

const KEEP_SPEC_TOKEN = new RegExp(`^(\\d+)(${TAG_ALTERNATION})$`);

/**
 * Parse a policy such as "2d,5w,4mon" into keep specs, in input order
 */
export function parseKeepSpecs(text: string): KeepSpec[] {
  return text.split(',').map(parseKeepSpecToken);
}

export function parseKeepSpecToken(token: string): KeepSpec {
  const match = KEEP_SPEC_TOKEN.exec(token);
  if (!match) {
    throw new InvalidKeepSpecError(token);
  }

  const count = Number(match[1]);
  if (!Number.isSafeInteger(count) || count < 1) {
    throw new InvalidKeepSpecError(token);
  }

  return { granularity: granularityFromTag(match[2]), count };
}

export function formatKeepSpec(spec: KeepSpec): string {
  const tag = Object.keys(GRANULARITY_TAGS).find(key => GRANULARITY_TAGS[key] === spec.granularity);
  return `${spec.count}${tag ?? spec.granularity}`;
}
