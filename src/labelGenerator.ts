import fs from 'fs/promises';
import path from 'path';
import { resolveColumns } from './columnResolver.js';
import { toCellText } from './labelBlockBuilder.js';
import { LabelLayoutEngine } from './layoutEngine.js';
import { renderLabelDocument } from './pdfRenderer.js';
import { loadSpreadsheet, loadSpreadsheetFile } from './spreadsheetLoader.js';
import { LayoutProgressCallback, LayoutResult, LayoutVariant, ResolvedColumns, TabularData } from './types.js';

export interface SpreadsheetSummary {
  rowCount: number;
  columns: string[];
  resolvedColumns: ResolvedColumns | null;
  sample: Array<Record<string, string>>;
}

export interface GeneratedLabels {
  result: LayoutResult;
  pdf: Buffer | null;
  pageCount: number;
  fileName: string;
}

export interface SavedLabels extends GeneratedLabels {
  outputPath: string | null;
}

export const OUTPUT_FILE_NAMES: Record<LayoutVariant, string> = {
  v1: 'multiplepart_labels.pdf',
  v2: 'singlepart_labels.pdf'
};

export function describeSpreadsheet(table: TabularData, sampleSize = 3): SpreadsheetSummary {
  return {
    rowCount: table.rows.length,
    columns: [...table.columns],
    resolvedColumns: resolveColumns(table.columns),
    sample: table.rows.slice(0, sampleSize).map(row =>
      Object.fromEntries(table.columns.map(column => [column, toCellText(row[column])]))
    )
  };
}

export class LabelGenerator {
  private outputDir: string;

  constructor(outputDir: string = path.join(process.cwd(), 'labels')) {
    this.outputDir = outputDir;
  }

  getOutputDir(): string {
    return this.outputDir;
  }

  async generate(table: TabularData, variant: LayoutVariant, onProgress?: LayoutProgressCallback): Promise<GeneratedLabels> {
    const engine = new LabelLayoutEngine({ variant });
    const result = engine.layout(table, onProgress);
    const fileName = OUTPUT_FILE_NAMES[engine.getVariant()];

    if (!result.document) {
      return { result, pdf: null, pageCount: 0, fileName };
    }

    const rendered = await renderLabelDocument(result.document, {
      title: engine.getVariant() === 'v1' ? 'Multiple Part Labels' : 'Single Part Labels'
    });
    return { result, pdf: rendered.bytes, pageCount: rendered.pageCount, fileName };
  }

  async generateFromBuffer(
    buffer: Buffer,
    sourceName: string,
    variant: LayoutVariant,
    onProgress?: LayoutProgressCallback
  ): Promise<GeneratedLabels> {
    const table = await loadSpreadsheet(buffer, sourceName);
    return this.generate(table, variant, onProgress);
  }

  /** Writes a generated PDF into the output directory; returns null when there was nothing to write. */
  async save(generated: GeneratedLabels): Promise<string | null> {
    if (!generated.pdf) {
      return null;
    }
    await fs.mkdir(this.outputDir, { recursive: true });
    const outputPath = path.join(this.outputDir, generated.fileName);
    await fs.writeFile(outputPath, generated.pdf);
    return outputPath;
  }

  async generateFromFile(filePath: string, variant: LayoutVariant, onProgress?: LayoutProgressCallback): Promise<SavedLabels> {
    const table = await loadSpreadsheetFile(filePath);
    const generated = await this.generate(table, variant, onProgress);
    return { ...generated, outputPath: await this.save(generated) };
  }
}
