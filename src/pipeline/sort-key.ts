import type { SortKey, Transaction } from '../types/transaction.js';

export const DEFAULT_SEASON_START_YEAR = 2025;

/** Offseason runs September through March; months before September belong to the next year. */
const SEASON_START_MONTH = 9;

const RESIGNED_KEY: SortKey = [1900, 1, 1];
const UNDATED_KEY: SortKey = [2099, 12, 31];
const FEED_UNDATED_KEY: SortKey = [0, 0, 0];

type Sortable = Pick<Transaction, 'date' | 'text' | 'raw'>;

/**
 * Oldest-first key. Undated re-signings (marked with '*') sort ahead of every
 * dated move; other undated moves sort after them.
 */
export function dateSortKey(t: Sortable, seasonStartYear = DEFAULT_SEASON_START_YEAR): SortKey {
  if (t.date === null) {
    return isResigned(t) ? RESIGNED_KEY : UNDATED_KEY;
  }
  return seasonDate(t.date, seasonStartYear) ?? UNDATED_KEY;
}

/** Key for newest-first feeds: undated moves sink to the bottom once reversed. */
export function feedSortKey(t: Sortable, seasonStartYear = DEFAULT_SEASON_START_YEAR): SortKey {
  if (t.date === null) return FEED_UNDATED_KEY;
  return seasonDate(t.date, seasonStartYear) ?? FEED_UNDATED_KEY;
}

export function compareSortKeys(a: SortKey, b: SortKey): number {
  return a[0] - b[0] || a[1] - b[1] || a[2] - b[2];
}

/** Stable, oldest first. Returns a new array. */
export function sortChronologically<T extends Sortable>(
  items: readonly T[],
  seasonStartYear = DEFAULT_SEASON_START_YEAR,
): T[] {
  return sortBy(items, (t) => dateSortKey(t, seasonStartYear), 1);
}

/** Stable, newest first, undated last. Returns a new array. */
export function sortNewestFirst<T extends Sortable>(
  items: readonly T[],
  seasonStartYear = DEFAULT_SEASON_START_YEAR,
): T[] {
  return sortBy(items, (t) => feedSortKey(t, seasonStartYear), -1);
}

function isResigned(t: Sortable): boolean {
  return t.raw.includes('*') || t.text.includes('*');
}

function seasonDate(date: string, seasonStartYear: number): SortKey | null {
  const [monthStr, dayStr] = date.split('/');
  if (monthStr === undefined || dayStr === undefined) return null;

  const month = parseInt(monthStr, 10);
  const day = parseInt(dayStr, 10);
  if (Number.isNaN(month) || Number.isNaN(day)) return null;

  const year = month >= SEASON_START_MONTH ? seasonStartYear : seasonStartYear + 1;
  return [year, month, day];
}

function sortBy<T>(items: readonly T[], keyOf: (item: T) => SortKey, direction: 1 | -1): T[] {
  return items
    .map((item, index) => ({ item, index, key: keyOf(item) }))
    .sort((a, b) => direction * compareSortKeys(a.key, b.key) || a.index - b.index)
    .map(({ item }) => item);
}
