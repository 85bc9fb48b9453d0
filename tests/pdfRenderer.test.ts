import { describe, expect, it } from 'vitest';
import { generateLabelLayout } from '../src/layoutEngine.js';
import { blockHeight, cm, MARGIN, PAGE_HEIGHT, renderLabelDocument } from '../src/pdfRenderer.js';
import { LabelDocument, LayoutVariant, TabularData } from '../src/types.js';

function locations(count: number): TabularData {
  return {
    columns: ['Part No', 'Description', 'Location'],
    rows: Array.from({ length: count }, (_, index) => ({
      'Part No': `AB-${10000 + index}`,
      Description: index % 2 === 0 ? 'Hex bolt M8 x 40 zinc plated' : 'x'.repeat(120),
      Location: `12M_ST-${index}_R_0_2_A_1`
    }))
  };
}

function layout(count: number, variant: LayoutVariant): LabelDocument {
  const { document } = generateLabelLayout(locations(count), variant);
  if (!document) {
    throw new Error('expected a document');
  }
  return document;
}

describe('renderLabelDocument', () => {
  it('writes one PDF page per label page', async () => {
    const rendered = await renderLabelDocument(layout(5, 'v1'));

    expect(rendered.pageCount).toBe(2);
    expect(rendered.bytes.subarray(0, 5).toString('latin1')).toBe('%PDF-');
    expect(rendered.bytes.subarray(-16).toString('latin1')).toContain('%%EOF');
  });

  it('renders single-part labels', async () => {
    const rendered = await renderLabelDocument(layout(4, 'v2'), { title: 'Single Part Labels' });
    expect(rendered.pageCount).toBe(1);
    expect(rendered.bytes.length).toBeGreaterThan(0);
  });
});

describe('label geometry', () => {
  it('converts centimetres to points', () => {
    expect(cm(2.54)).toBeCloseTo(72, 9);
  });

  it('fits four blocks of either variant between the page margins', () => {
    const usable = PAGE_HEIGHT - 2 * MARGIN;
    const v1Block = layout(1, 'v1').pages[0].blocks[0];
    const v2Block = layout(1, 'v2').pages[0].blocks[0];

    expect(blockHeight(v1Block)).toBeCloseTo(cm(5.5), 6);
    expect(blockHeight(v2Block)).toBeCloseTo(cm(5.4), 6);
    expect(4 * blockHeight(v1Block)).toBeLessThan(usable);
    expect(4 * blockHeight(v2Block)).toBeLessThan(usable);
  });
});
