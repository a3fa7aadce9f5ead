import fs from 'node:fs/promises';
import * as XLSX from 'xlsx';
import type { CellValue, WorkbookGrids } from '../types/workbook.js';
import { logger } from '../utils/logger.js';
import { WorkbookReadError } from './errors.js';

/** Load an .xlsx file from disk and return every sheet as a grid. */
export async function readWorkbook(filePath: string): Promise<WorkbookGrids> {
  let workbook: XLSX.WorkBook;
  try {
    const data = await fs.readFile(filePath);
    workbook = XLSX.read(data, { type: 'buffer' });
  } catch (err) {
    throw new WorkbookReadError(filePath, { cause: err });
  }

  const grids = workbookToGrids(workbook);
  logger.info({ path: filePath, sheets: grids.size }, 'Workbook loaded');
  return grids;
}

/**
 * Every sheet as rows of formatted cell text, in workbook order.
 * Row indexes count from the sheet's first row, blank rows included.
 */
export function workbookToGrids(workbook: XLSX.WorkBook): WorkbookGrids {
  const grids = new Map<string, CellValue[][]>();
  for (const name of workbook.SheetNames) {
    const sheet = workbook.Sheets[name];
    if (!sheet) continue;
    grids.set(
      name,
      XLSX.utils.sheet_to_json<CellValue[]>(sheet, {
        header: 1,
        raw: false,
        defval: null,
        blankrows: true,
        range: 0,
      }),
    );
  }
  return grids;
}
