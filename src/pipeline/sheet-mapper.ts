import { teamInfo, type TeamCode } from '../catalog/teams.js';
import { MLB_RELEVANT_CATEGORIES, PAIRED_COLUMNS, SKIP_COLUMNS } from '../catalog/sections.js';
import type { Transaction } from '../types/transaction.js';
import type { CellValue, SheetGrid } from '../types/workbook.js';
import { parseEntry } from './entry-parser.js';

const HEADER_ROW = 1;
const FIRST_DATA_ROW = 2;

export interface SheetTransactions {
  /** Sheet order: column by column, top to bottom */
  transactions: Transaction[];
  /** Category → transactions; every readable column has a bucket, empty or not */
  buckets: Map<string, Transaction[]>;
}

interface SourceColumn {
  index: number;
  category: string;
  pairedIndex: number | null;
}

/** Turn one team sheet into transactions, reading columns by their header. */
export function mapSheet(teamCode: TeamCode, grid: SheetGrid): SheetTransactions {
  const headers = readHeaders(grid);
  const columns = sourceColumns(headers);
  const { name: teamName } = teamInfo(teamCode);

  const transactions: Transaction[] = [];
  const buckets = new Map<string, Transaction[]>();
  for (const column of columns) {
    if (!buckets.has(column.category)) buckets.set(column.category, []);
  }

  for (const column of columns) {
    const bucket = buckets.get(column.category) ?? [];

    for (let rowIdx = FIRST_DATA_ROW; rowIdx < grid.length; rowIdx++) {
      const row = grid[rowIdx] ?? [];
      const raw = cellText(row[column.index]);
      if (!raw) continue;

      const { date, text } = parseEntry(raw);
      const pairedValue = column.pairedIndex === null ? null : cellText(row[column.pairedIndex]);

      const txn: Transaction = Object.freeze({
        teamCode,
        teamName,
        category: column.category,
        date,
        text,
        raw,
        isMlb: MLB_RELEVANT_CATEGORIES.has(column.category),
        pairedValue,
      });

      transactions.push(txn);
      bucket.push(txn);
    }
  }

  return { transactions, buckets };
}

/** Column index → trimmed header, for non-empty header cells only. */
export function readHeaders(grid: SheetGrid): Map<number, string> {
  const headers = new Map<number, string>();
  const row = grid[HEADER_ROW] ?? [];
  row.forEach((cell, index) => {
    const name = cellText(cell);
    if (name) headers.set(index, name);
  });
  return headers;
}

function sourceColumns(headers: ReadonlyMap<number, string>): SourceColumn[] {
  const columns: SourceColumn[] = [];
  for (const [index, category] of headers) {
    if (SKIP_COLUMNS.has(category)) continue;
    columns.push({ index, category, pairedIndex: pairedColumn(headers, index, category) });
  }
  return columns;
}

/** Index of the annotation column paired with this one, if its neighbour carries the expected header. */
export function pairedColumn(
  headers: ReadonlyMap<number, string>,
  index: number,
  category: string,
): number | null {
  const expected = PAIRED_COLUMNS.get(category);
  if (expected === undefined) return null;
  return headers.get(index + 1) === expected ? index + 1 : null;
}

/** Trimmed text of a cell, or null when the cell is blank. */
export function cellText(cell: CellValue): string | null {
  if (cell === null || cell === undefined) return null;
  if (cell instanceof Date && Number.isNaN(cell.getTime())) return null;
  const text = cell instanceof Date ? cell.toISOString().split('T')[0]! : String(cell).trim();
  return text === '' ? null : text;
}
