import PDFDocument from 'pdfkit';
import { LabelBlock, LabelDocument, LabelTable, RenderInstruction, TableCell } from './types.js';

// A4 in points
export const PAGE_WIDTH = 595.28;
export const PAGE_HEIGHT = 841.89;
export const MARGIN = 72;

const POINTS_PER_CM = 72 / 2.54;
// Helvetica cap-to-baseline ratio, close enough to line runs of mixed sizes up on one baseline.
const ASCENT_RATIO = 0.72;

export function cm(value: number): number {
  return value * POINTS_PER_CM;
}

export interface RenderedDocument {
  bytes: Buffer;
  pageCount: number;
}

export interface RenderOptions {
  title?: string;
}

export function instructionHeight(instruction: RenderInstruction): number {
  if (instruction.kind === 'spacer') {
    return cm(instruction.heightCm);
  }
  return instruction.rows.reduce((sum, row) => sum + cm(row.heightCm), 0);
}

export function blockHeight(block: LabelBlock): number {
  return block.instructions.reduce((sum, instruction) => sum + instructionHeight(instruction), 0);
}

function drawWrappedText(doc: PDFKit.PDFDocument, cell: TableCell, x: number, y: number, width: number, height: number): void {
  const text = cell.runs.map(run => run.text).join('');
  if (!text) {
    return;
  }
  const run = cell.runs[0];
  const lineGap = Math.max(0, cell.leading - run.size);
  doc.font(run.font).fontSize(run.size).fillColor('#000000');

  const textHeight = Math.min(doc.heightOfString(text, { width, lineGap }), height);
  let top = y;
  if (cell.valign === 'middle') {
    top = y + (height - textHeight) / 2;
  } else if (cell.valign === 'bottom') {
    top = y + height - textHeight;
  }

  doc.text(text, x, top, { width, height: y + height - top, align: cell.align, lineGap, ellipsis: true });
}

function drawRunLine(doc: PDFKit.PDFDocument, cell: TableCell, x: number, y: number, width: number, height: number): void {
  const runs = cell.runs.filter(run => run.text.length > 0);
  if (runs.length === 0) {
    return;
  }

  const widths = runs.map(run => doc.font(run.font).fontSize(run.size).widthOfString(run.text));
  const totalWidth = widths.reduce((sum, value) => sum + value, 0);
  const lineSize = Math.max(...runs.map(run => run.size));

  let cursor = x;
  if (cell.align === 'center') {
    cursor = x + (width - totalWidth) / 2;
  } else if (cell.align === 'right') {
    cursor = x + width - totalWidth;
  }

  let baseline = y + lineSize * ASCENT_RATIO;
  if (cell.valign === 'middle') {
    baseline = y + (height + lineSize * ASCENT_RATIO) / 2;
  } else if (cell.valign === 'bottom') {
    baseline = y + height;
  }

  runs.forEach((run, index) => {
    doc.font(run.font).fontSize(run.size).fillColor('#000000');
    doc.text(run.text, cursor, baseline - run.size * ASCENT_RATIO, { lineBreak: false });
    cursor += widths[index];
  });
}

function drawTable(doc: PDFKit.PDFDocument, table: LabelTable, top: number): number {
  const widths = table.columnWidthsCm.map(cm);
  const tableWidth = widths.reduce((sum, value) => sum + value, 0);
  const left = (PAGE_WIDTH - tableWidth) / 2;
  let y = top;

  for (const row of table.rows) {
    const rowHeight = cm(row.heightCm);
    let x = left;

    row.cells.forEach((cell, index) => {
      const width = widths[index] ?? 0;
      if (cell.background) {
        doc.rect(x, y, width, rowHeight).fill(cell.background);
      }

      const { padding } = cell;
      const innerX = x + padding.left;
      const innerY = y + padding.top;
      const innerWidth = Math.max(0, width - padding.left - padding.right);
      const innerHeight = Math.max(0, rowHeight - padding.top - padding.bottom);
      if (cell.wrap) {
        drawWrappedText(doc, cell, innerX, innerY, innerWidth, innerHeight);
      } else {
        drawRunLine(doc, cell, innerX, innerY, innerWidth, innerHeight);
      }

      doc.lineWidth(table.gridLineWidth).rect(x, y, width, rowHeight).stroke('#000000');
      x += width;
    });

    y += rowHeight;
  }

  return y - top;
}

/**
 * Serializes a laid-out label document to PDF. Each label page starts a new
 * sheet; a block that would run past the bottom margin moves to a fresh one.
 */
export async function renderLabelDocument(document: LabelDocument, options: RenderOptions = {}): Promise<RenderedDocument> {
  const doc = new PDFDocument({
    size: document.pageSize,
    margin: MARGIN,
    autoFirstPage: false,
    bufferPages: true,
    info: {
      Title: options.title ?? 'Part Labels',
      Creator: 'part-label-generator'
    }
  });

  const chunks: Buffer[] = [];
  doc.on('data', (chunk: Buffer) => chunks.push(chunk));
  const pdfComplete = new Promise<Buffer>((resolve, reject) => {
    doc.on('end', () => resolve(Buffer.concat(chunks)));
    doc.on('error', reject);
  });

  const bottom = PAGE_HEIGHT - MARGIN;

  for (const page of document.pages) {
    doc.addPage();
    let y = MARGIN;

    for (const block of page.blocks) {
      if (y > MARGIN && y + blockHeight(block) > bottom) {
        doc.addPage();
        y = MARGIN;
      }
      for (const instruction of block.instructions) {
        y += instruction.kind === 'spacer' ? cm(instruction.heightCm) : drawTable(doc, instruction, y);
      }
    }
  }

  const pageCount = doc.bufferedPageRange().count;
  doc.end();

  return { bytes: await pdfComplete, pageCount };
}
