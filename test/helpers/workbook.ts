import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import * as XLSX from 'xlsx';
import type { SheetGrid } from '../../src/types/workbook.js';

/** Write sheets to an .xlsx file, in the order given. */
export async function writeWorkbook(filePath: string, sheets: [string, SheetGrid][]): Promise<void> {
  const workbook = XLSX.utils.book_new();
  for (const [name, grid] of sheets) {
    XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet(grid.map((row) => [...row])), name);
  }
  const data: Buffer = XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' });
  await fs.writeFile(filePath, data);
}

export function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'offseason-tracker-'));
}
