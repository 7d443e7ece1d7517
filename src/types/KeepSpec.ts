export type Granularity = 'second' | 'minute' | 'hour' | 'day' | 'week' | 'month' | 'year';

/**
 * Keep the `count` most recent distinct periods at `granularity`
 */
export interface KeepSpec {
  granularity: Granularity;
  count: number;
}
