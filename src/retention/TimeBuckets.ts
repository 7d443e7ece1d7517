import { Granularity } from '../types/KeepSpec';
import { PruneError } from '../types/PruneError';

export class InvalidGranularityError extends PruneError {
  constructor(public readonly granularity: string) {
    super(`invalid granularity: '${granularity}'`, 'time_bucket');
    this.name = 'InvalidGranularityError';
  }
}

/**
 * Keep-spec suffixes and the granularity each one selects
 */
export const GRANULARITY_TAGS: Readonly<Record<string, Granularity>> = {
  s: 'second',
  min: 'minute',
  h: 'hour',
  d: 'day',
  w: 'week',
  mon: 'month',
  y: 'year',
};

const MS_PER_DAY = 24 * 60 * 60 * 1000;

export function granularityFromTag(tag: string): Granularity {
  if (!Object.prototype.hasOwnProperty.call(GRANULARITY_TAGS, tag)) {
    throw new InvalidGranularityError(tag);
  }
  return GRANULARITY_TAGS[tag];
}

/**
 * Derive the retention period a timestamp falls into.
 * Two timestamps share a period at `granularity` iff their keys are equal.
 */
export function bucketKey(timestamp: Date, granularity: Granularity): string {
  // toISOString is always UTC: YYYY-MM-DDTHH:MM:SS.sssZ
  const iso = timestamp.toISOString();

  switch (granularity) {
    case 'second':
      return iso.slice(0, 19).replace('T', ' ');
    case 'minute':
      return iso.slice(0, 16).replace('T', ' ');
    case 'hour':
      return iso.slice(0, 13).replace('T', ' ');
    case 'day':
      return iso.slice(0, 10);
    case 'week': {
      const { year, week } = isoWeek(timestamp);
      return `${String(year).padStart(4, '0')}-W${String(week).padStart(2, '0')}`;
    }
    case 'month':
      return iso.slice(0, 7);
    case 'year':
      return iso.slice(0, 4);
    default: {
      const unknown: never = granularity;
      throw new InvalidGranularityError(String(unknown));
    }
  }
}

/**
 * ISO-8601 week-numbering year and week of a UTC timestamp.
 * The week belongs to the year that contains its Thursday.
 */
export function isoWeek(timestamp: Date): { year: number; week: number } {
  // Date.UTC maps years 0-99 onto 1900-1999, so keep to setters
  const date = new Date(timestamp.getTime());
  date.setUTCHours(0, 0, 0, 0);
  const dayOfWeek = date.getUTCDay() || 7;
  date.setUTCDate(date.getUTCDate() + 4 - dayOfWeek);

  const year = date.getUTCFullYear();
  const yearStart = new Date(0);
  yearStart.setUTCFullYear(year, 0, 1);
  const dayOfYear = (date.getTime() - yearStart.getTime()) / MS_PER_DAY;
  return { year, week: Math.floor(dayOfYear / 7) + 1 };
}
