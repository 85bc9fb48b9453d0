import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { describeSpreadsheet, LabelGenerator } from '../src/labelGenerator.js';
import { TabularData } from '../src/types.js';

const SAMPLE: TabularData = {
  columns: ['Part Number', 'Description', 'Bin Location'],
  rows: [
    { 'Part Number': 'AB12345', Description: 'Hex bolt', 'Bin Location': '12M R 0 2 A 1' },
    { 'Part Number': 'CD67890', Description: 'Washer', 'Bin Location': '12M R 0 2 A 1' },
    { 'Part Number': 99, Description: null, 'Bin Location': '12M R 0 2 A 2' },
    { 'Part Number': 'EF11111', Description: 'Nut', 'Bin Location': '12M R 0 2 A 3' }
  ]
};

describe('describeSpreadsheet', () => {
  it('summarises rows, columns and the first few records', () => {
    expect(describeSpreadsheet(SAMPLE)).toEqual({
      rowCount: 4,
      columns: ['Part Number', 'Description', 'Bin Location'],
      resolvedColumns: { partNumber: 'Part Number', description: 'Description', location: 'Bin Location' },
      sample: [
        { 'Part Number': 'AB12345', Description: 'Hex bolt', 'Bin Location': '12M R 0 2 A 1' },
        { 'Part Number': 'CD67890', Description: 'Washer', 'Bin Location': '12M R 0 2 A 1' },
        { 'Part Number': '99', Description: '', 'Bin Location': '12M R 0 2 A 2' }
      ]
    });
  });
});

describe('LabelGenerator', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'part-labels-tests-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('generates a multiple-part PDF in memory', async () => {
    const generator = new LabelGenerator(tempDir);
    const generated = await generator.generate(SAMPLE, 'v1');

    expect(generated.fileName).toBe('multiplepart_labels.pdf');
    expect(generated.result.blockCount).toBe(3);
    expect(generated.pageCount).toBe(1);
    expect(generated.pdf?.subarray(0, 5).toString('latin1')).toBe('%PDF-');
  });

  it('returns no PDF when nothing was laid out', async () => {
    const generator = new LabelGenerator(tempDir);
    const generated = await generator.generate({ columns: SAMPLE.columns, rows: [] }, 'v2');

    expect(generated.pdf).toBeNull();
    expect(generated.pageCount).toBe(0);
    expect(generated.fileName).toBe('singlepart_labels.pdf');
    expect(await generator.save(generated)).toBeNull();
  });

  it('writes the PDF for a file on disk into the output directory', async () => {
    const sourcePath = path.join(tempDir, 'parts.csv');
    await fs.writeFile(sourcePath, 'Part No,Desc,Loc\nP1,Bolt,A_1\nP2,Nut,A_2\n', 'utf8');

    const outputDir = path.join(tempDir, 'out');
    const generator = new LabelGenerator(outputDir);
    const saved = await generator.generateFromFile(sourcePath, 'v2');

    expect(saved.outputPath).toBe(path.join(outputDir, 'singlepart_labels.pdf'));
    const written = await fs.readFile(path.join(outputDir, 'singlepart_labels.pdf'));
    expect(written.subarray(0, 5).toString('latin1')).toBe('%PDF-');
    expect(saved.result.blockCount).toBe(2);
  });
});
