import { EXCLUDED_SHEETS, isTeamCode, type TeamCode } from '../catalog/teams.js';
import type { CategoryBuckets, Corpus, Transaction } from '../types/transaction.js';
import type { WorkbookGrids } from '../types/workbook.js';
import { logger } from '../utils/logger.js';
import { mapSheet } from './sheet-mapper.js';
import { DEFAULT_SEASON_START_YEAR, sortChronologically } from './sort-key.js';

/**
 * Map every team sheet in the workbook and collect the results.
 * Sheets that are not a known team code are skipped.
 */
export function buildCorpus(
  grids: WorkbookGrids,
  seasonStartYear = DEFAULT_SEASON_START_YEAR,
): Corpus {
  const all: Transaction[] = [];
  const teams = new Map<TeamCode, CategoryBuckets>();

  for (const [sheetName, grid] of grids) {
    if (EXCLUDED_SHEETS.has(sheetName) || !isTeamCode(sheetName)) {
      logger.debug({ sheet: sheetName }, 'Skipping non-team sheet');
      continue;
    }

    const { transactions, buckets } = mapSheet(sheetName, grid);
    all.push(...transactions);
    teams.set(sheetName, buckets);

    logger.child({ team: sheetName }).debug(
      { count: transactions.length, categories: buckets.size },
      'Mapped team sheet',
    );
  }

  return {
    transactions: sortChronologically(all, seasonStartYear),
    teams,
  };
}
