/**
 * Team page layout and the column vocabulary of the workbook.
 *
 * Category names are the header cells of each team sheet, verbatim.
 */

export interface SectionConfig {
  title: string;
  /** Categories merged into this section, in display order. */
  categories: readonly string[];
  /** Render each category as its own labelled sub-list. */
  subheaders?: boolean;
}

export const SECTIONS: readonly SectionConfig[] = Object.freeze([
  { title: 'MLB Signings', categories: ['MLB Signings'] },
  { title: 'MiLB Signings', categories: ['MiLB Signings'] },
  { title: 'International Signings', categories: ['Intl Amateur Signings'] },
  { title: 'Trades', categories: ['Traded For', 'Traded Away'], subheaders: true },
  { title: 'Extensions', categories: ['Extensions'] },
  { title: 'Waiver Claims', categories: ['Waiver Claims'] },
  { title: 'Lost off Waivers', categories: ['Lost off Waivers'] },
  { title: 'Outrighted', categories: ['Outrighted'] },
  { title: 'Added to 40-Man', categories: ['Added to 40-Man'] },
  {
    title: 'Rule-5 Draft',
    categories: ['Rule-5 Draft Additions', 'Rule-5 Draft Losses'],
    subheaders: true,
  },
  { title: 'MLB Free Agents / Non-tendered', categories: ['Elected MLB FA/Non-tendered'] },
  { title: 'MiLB Free Agents', categories: ['Elected MiLB FA'] },
  { title: 'Released', categories: ['Released'] },
  { title: 'Retired', categories: ['Retired'] },
]);

const SUBHEADER_LABELS: ReadonlyMap<string, string> = new Map([
  ['Traded For', 'Acquired'],
  ['Traded Away', 'Traded Away'],
  ['Rule-5 Draft Additions', 'Additions'],
  ['Rule-5 Draft Losses', 'Losses'],
]);

export function subheaderLabel(category: string): string {
  return SUBHEADER_LABELS.get(category) ?? category;
}

/** Categories whose transactions are flagged as MLB moves. */
export const MLB_RELEVANT_CATEGORIES: ReadonlySet<string> = new Set([
  'MLB Signing',
  'Extension',
  'Traded For',
  'Traded Away',
  'Waiver Claim',
  'Lost off Waivers',
]);

/** Categories left out of the homepage feeds; they mirror another team's entry. */
export const FEED_EXCLUDED_CATEGORIES: ReadonlySet<string> = new Set([
  'Lost off Waivers',
  'Traded Away',
]);

export const PAIRING_HEADER = 'New Team';

/** Columns that only annotate a neighbour and are never read on their own. */
export const SKIP_COLUMNS: ReadonlySet<string> = new Set([PAIRING_HEADER]);

/**
 * Primary category → header expected in the column immediately to its right.
 * The pairing only holds when that neighbour's header matches.
 */
export const PAIRED_COLUMNS: ReadonlyMap<string, string> = new Map([
  ['Elected MLB FA/Non-tendered', PAIRING_HEADER],
  ['Elected MiLB FA', PAIRING_HEADER],
  ['Released', PAIRING_HEADER],
]);
