/** A cell as the spreadsheet reader hands it over. */
export type CellValue = string | number | boolean | Date | null | undefined;

export type SheetGrid = readonly (readonly CellValue[])[];

/** Sheet name → grid, in workbook order. */
export type WorkbookGrids = ReadonlyMap<string, SheetGrid>;
