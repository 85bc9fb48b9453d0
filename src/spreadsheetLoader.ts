import ExcelJS from 'exceljs';
import fs from 'fs/promises';
import path from 'path';
import { Readable } from 'stream';
import { TabularData, TabularRow } from './types.js';

export type SheetValue = string | number | boolean | Date | null;

export const SUPPORTED_EXTENSIONS = ['.xlsx', '.csv'];

export class SpreadsheetLoadError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SpreadsheetLoadError';
  }
}

function normalizeCell(cell: ExcelJS.Cell): SheetValue {
  const value = cell.value;
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean' || value instanceof Date) {
    return value;
  }
  // Rich text, hyperlink, formula and error cells all expose a display text.
  const text = cell.text;
  return text === '' ? null : text;
}

function isBlank(value: SheetValue): boolean {
  return value === null || (typeof value === 'string' && value.trim() === '');
}

function headerNames(sheet: ExcelJS.Worksheet): string[] {
  const headerRow = sheet.getRow(1);
  const seen = new Map<string, number>();
  const names: string[] = [];

  for (let col = 1; col <= headerRow.cellCount; col += 1) {
    let name = headerRow.getCell(col).text.replace(/^\uFEFF/, '');
    if (name.trim() === '') {
      name = `Column ${col}`;
    }
    const count = seen.get(name) ?? 0;
    seen.set(name, count + 1);
    names.push(count === 0 ? name : `${name}.${count}`);
  }

  return names;
}

/** Reads row 1 as headers and every later non-blank row as a record. */
export function worksheetToTable(sheet: ExcelJS.Worksheet): TabularData {
  if (sheet.actualRowCount === 0) {
    return { columns: [], rows: [] };
  }

  const columns = headerNames(sheet);
  const rows: TabularRow[] = [];

  for (let rowNumber = 2; rowNumber <= sheet.rowCount; rowNumber += 1) {
    const row = sheet.getRow(rowNumber);
    const values = columns.map((_, index) => normalizeCell(row.getCell(index + 1)));
    if (values.every(isBlank)) {
      continue;
    }
    const record: Record<string, SheetValue> = {};
    columns.forEach((column, index) => {
      record[column] = values[index];
    });
    rows.push(record);
  }

  return { columns, rows };
}

async function readWorksheet(buffer: Buffer, extension: string): Promise<ExcelJS.Worksheet | undefined> {
  const workbook = new ExcelJS.Workbook();
  if (extension === '.csv') {
    // Identity map keeps cells as text, so part numbers such as 00123 survive.
    return workbook.csv.read(Readable.from(buffer), { map: (value: string) => value });
  }
  await workbook.xlsx.load(buffer);
  return workbook.worksheets[0];
}

export async function loadSpreadsheet(buffer: Buffer, fileName: string): Promise<TabularData> {
  const extension = path.extname(fileName).toLowerCase();
  if (extension === '.xls') {
    throw new SpreadsheetLoadError('Legacy .xls workbooks are not supported; save the file as .xlsx or .csv');
  }
  if (!SUPPORTED_EXTENSIONS.includes(extension)) {
    throw new SpreadsheetLoadError(`Unsupported file type "${extension || fileName}"; expected .xlsx or .csv`);
  }

  let sheet: ExcelJS.Worksheet | undefined;
  try {
    sheet = await readWorksheet(buffer, extension);
  } catch (error) {
    throw new SpreadsheetLoadError(`Could not read ${path.basename(fileName)}`, { cause: error });
  }

  if (!sheet) {
    throw new SpreadsheetLoadError(`${path.basename(fileName)} has no worksheets`);
  }
  return worksheetToTable(sheet);
}

export async function loadSpreadsheetFile(filePath: string): Promise<TabularData> {
  let buffer: Buffer;
  try {
    buffer = await fs.readFile(filePath);
  } catch (error) {
    throw new SpreadsheetLoadError(`Could not open ${filePath}`, { cause: error });
  }
  return loadSpreadsheet(buffer, filePath);
}
