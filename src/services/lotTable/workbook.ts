import * as ExcelJS from 'exceljs';
import { outputColumns, REQUIRED_COLUMNS, type CellValue, type LotRow } from './layout';

export class WorkbookFormatError extends Error {
  readonly code = 'INVALID_WORKBOOK';

  constructor(message: string) {
    super(message);
    this.name = 'WorkbookFormatError';
  }
}

export type LotSheet = {
  columns: string[];
  rows: LotRow[];
};

/**
 * Plain cell value from ExcelJS' union (rich text, formulas, hyperlinks...).
 */
export function cellToValue(value: ExcelJS.CellValue): CellValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value;
  if (value instanceof Date) return value.toISOString();
  if (typeof value === 'object') {
    if ('richText' in value) return value.richText.map((t) => t.text).join('');
    if ('text' in value && typeof value.text === 'string') return value.text;
    if ('result' in value) {
      const result = value.result;
      if (result === undefined || result === null) return null;
      if (typeof result === 'string' || typeof result === 'number' || typeof result === 'boolean') return result;
      if (result instanceof Date) return result.toISOString();
      return null;
    }
    if ('error' in value) return String(value.error);
  }
  return null;
}

export function readLotSheet(worksheet: ExcelJS.Worksheet): LotSheet {
  const header = worksheet.getRow(1);
  const columns: string[] = [];
  header.eachCell({ includeEmpty: false }, (cell, colNumber) => {
    const name = cellToValue(cell.value);
    if (name !== null && String(name).trim()) columns[colNumber - 1] = String(name).trim();
  });

  if (columns.filter(Boolean).length === 0) {
    throw new WorkbookFormatError('[Workbook] First worksheet has no header row');
  }
  // Header names are case-sensitive.
  const missing = REQUIRED_COLUMNS.filter((c) => !columns.includes(c));
  if (missing.length > 0) {
    throw new WorkbookFormatError(`[Workbook] Missing required column(s): ${missing.join(', ')}`);
  }

  const rows: LotRow[] = [];
  worksheet.eachRow({ includeEmpty: false }, (row, rowNumber) => {
    if (rowNumber === 1) return;
    const record: LotRow = {};
    columns.forEach((name, idx) => {
      if (!name) return;
      record[name] = cellToValue(row.getCell(idx + 1).value);
    });
    rows.push(record);
  });

  return { columns: columns.filter(Boolean), rows };
}

export async function readLotWorkbook(filePath: string): Promise<LotSheet> {
  const workbook = new ExcelJS.Workbook();
  await workbook.xlsx.readFile(filePath);
  const worksheet = workbook.worksheets[0];
  if (!worksheet) {
    throw new WorkbookFormatError(`[Workbook] ${filePath} contains no worksheet`);
  }
  return readLotSheet(worksheet);
}

export async function writeLotWorkbook(
  filePath: string,
  originalColumns: string[],
  rows: LotRow[],
  itemColumnCount: number
): Promise<void> {
  const workbook = new ExcelJS.Workbook();
  const sheet = workbook.addWorksheet('Dimensions');
  const columns = outputColumns(originalColumns, itemColumnCount);

  sheet.columns = columns.map((name) => ({ header: name, key: name, width: Math.max(10, name.length + 2) }));
  for (const row of rows) {
    sheet.addRow(Object.fromEntries(columns.map((c) => [c, row[c] ?? null])));
  }
  sheet.getRow(1).font = { bold: true };

  await workbook.xlsx.writeFile(filePath);
}
