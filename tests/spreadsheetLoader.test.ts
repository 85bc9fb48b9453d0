import ExcelJS from 'exceljs';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { describe, expect, it } from 'vitest';
import { loadSpreadsheet, loadSpreadsheetFile, SpreadsheetLoadError } from '../src/spreadsheetLoader.js';

async function workbookBuffer(build: (sheet: ExcelJS.Worksheet) => void): Promise<Buffer> {
  const workbook = new ExcelJS.Workbook();
  build(workbook.addWorksheet('Parts'));
  return Buffer.from(await workbook.xlsx.writeBuffer());
}

describe('loadSpreadsheet', () => {
  it('reads the first worksheet of an xlsx workbook', async () => {
    const buffer = await workbookBuffer(sheet => {
      sheet.addRow(['Part No', 'Description', 'Location']);
      sheet.addRow(['AB12345', 'Hex bolt', '12M R 0 2 A 1']);
      sheet.addRow([42, 'Nut', '12M_ST-140_R_0_2_A_1']);
    });

    const table = await loadSpreadsheet(buffer, 'parts.xlsx');
    expect(table.columns).toEqual(['Part No', 'Description', 'Location']);
    expect(table.rows).toEqual([
      { 'Part No': 'AB12345', Description: 'Hex bolt', Location: '12M R 0 2 A 1' },
      { 'Part No': 42, Description: 'Nut', Location: '12M_ST-140_R_0_2_A_1' }
    ]);
  });

  it('skips blank rows and flattens rich text cells', async () => {
    const buffer = await workbookBuffer(sheet => {
      sheet.addRow(['Part No', 'Description', 'Location']);
      sheet.addRow(['P1', 'Bolt', 'A']);
      sheet.addRow([null, '  ', null]);
      sheet.addRow(['P2', null, 'B']);
      sheet.getCell('B4').value = { richText: [{ text: 'Hex ' }, { text: 'nut' }] };
    });

    const table = await loadSpreadsheet(buffer, 'PARTS.XLSX');
    expect(table.rows).toEqual([
      { 'Part No': 'P1', Description: 'Bolt', Location: 'A' },
      { 'Part No': 'P2', Description: 'Hex nut', Location: 'B' }
    ]);
  });

  it('names blank headers and de-duplicates repeated ones', async () => {
    const buffer = await workbookBuffer(sheet => {
      sheet.addRow(['Loc', null, 'Loc']);
      sheet.addRow(['A', 'B', 'C']);
    });

    const table = await loadSpreadsheet(buffer, 'parts.xlsx');
    expect(table.columns).toEqual(['Loc', 'Column 2', 'Loc.1']);
    expect(table.rows).toEqual([{ Loc: 'A', 'Column 2': 'B', 'Loc.1': 'C' }]);
  });

  it('returns an empty table for an empty worksheet', async () => {
    const buffer = await workbookBuffer(() => undefined);
    expect(await loadSpreadsheet(buffer, 'empty.xlsx')).toEqual({ columns: [], rows: [] });
  });

  it('reads csv cells as text so leading zeros survive', async () => {
    const csv = Buffer.from('Part No,Desc,Loc\n00123,Washer,A_B_C\n,,\n0042,"Bolt, long",12M R 0\n');
    const table = await loadSpreadsheet(csv, 'parts.csv');

    expect(table.columns).toEqual(['Part No', 'Desc', 'Loc']);
    expect(table.rows).toEqual([
      { 'Part No': '00123', Desc: 'Washer', Loc: 'A_B_C' },
      { 'Part No': '0042', Desc: 'Bolt, long', Loc: '12M R 0' }
    ]);
  });

  it('rejects legacy xls and unknown file types', async () => {
    await expect(loadSpreadsheet(Buffer.from('x'), 'old.xls')).rejects.toThrow(
      'Legacy .xls workbooks are not supported; save the file as .xlsx or .csv'
    );
    await expect(loadSpreadsheet(Buffer.from('x'), 'notes.txt')).rejects.toBeInstanceOf(SpreadsheetLoadError);
  });

  it('wraps unreadable workbooks with the original cause', async () => {
    const error = await loadSpreadsheet(Buffer.from('not a zip archive'), 'broken.xlsx').catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(SpreadsheetLoadError);
    expect(error).toHaveProperty('message', 'Could not read broken.xlsx');
    expect(error).toHaveProperty('cause');
  });
});

describe('loadSpreadsheetFile', () => {
  it('loads a csv file from disk', async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'part-labels-loader-'));
    try {
      const filePath = path.join(dir, 'parts.csv');
      await fs.writeFile(filePath, 'Part No,Desc,Loc\nP1,Bolt,A\n', 'utf8');
      const table = await loadSpreadsheetFile(filePath);
      expect(table.rows).toEqual([{ 'Part No': 'P1', Desc: 'Bolt', Loc: 'A' }]);
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });

  it('reports a missing file as a load error', async () => {
    await expect(loadSpreadsheetFile(path.join(os.tmpdir(), 'part-labels-missing', 'nope.csv'))).rejects.toBeInstanceOf(
      SpreadsheetLoadError
    );
  });
});
