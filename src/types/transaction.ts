import type { TeamCode } from '../catalog/teams.js';

/** Date prefix and remaining text pulled out of one cell. */
export interface ParsedEntry {
  /** 'M/D' as written in the sheet, e.g. '9/15' */
  date: string | null;
  text: string;
}

/** One roster move, built from a single cell of a team sheet. */
export interface Transaction {
  readonly teamCode: TeamCode;
  readonly teamName: string;
  /** Header of the column the cell came from, e.g. 'Traded For' */
  readonly category: string;
  readonly date: string | null;
  /** Cell text after the date prefix is removed, annotation markers kept */
  readonly text: string;
  /** Trimmed cell text as it appears in the sheet */
  readonly raw: string;
  /** Category counts toward the MLB-only feed */
  readonly isMlb: boolean;
  /** Value of the paired 'New Team' column, when there is one */
  readonly pairedValue: string | null;
}

/** [year, month, day], compared element by element. */
export type SortKey = readonly [number, number, number];

export type CategoryBuckets = ReadonlyMap<string, readonly Transaction[]>;

export interface Corpus {
  /** Every transaction, oldest first */
  transactions: readonly Transaction[];
  /** Team → category → transactions in sheet order */
  teams: ReadonlyMap<TeamCode, CategoryBuckets>;
}
