import { LabelStyle } from './labelStyle.js';
import { selectDescriptionTypography, selectPartNumberTypography } from './typography.js';
import {
  CellPadding,
  LabelBlock,
  LabelTable,
  LocationFields,
  PartRecord,
  RenderInstruction,
  ResolvedColumns,
  TableCell,
  TabularRow
} from './types.js';

const HEADER_PADDING: CellPadding = { top: 3, right: 5, bottom: 3, left: 5 };
const STRIP_PADDING: CellPadding = { top: 3, right: 2, bottom: 3, left: 2 };

/** Best-effort string form of a cell value; never throws. */
export function toCellText(value: unknown): string {
  if (value === null || value === undefined) {
    return '';
  }
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number') {
    return Number.isNaN(value) ? '' : String(value);
  }
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? '' : value.toISOString();
  }
  try {
    return String(value);
  } catch {
    return Object.prototype.toString.call(value);
  }
}

export function toPartRecord(row: TabularRow, columns: ResolvedColumns): PartRecord {
  return Object.freeze({
    partNumber: toCellText(row[columns.partNumber]),
    description: toCellText(row[columns.description]),
    locationRaw: toCellText(row[columns.location])
  });
}

function headerCell(text: string, style: LabelStyle): TableCell {
  return {
    runs: [{ text, font: style.regularFont, size: style.header.size }],
    align: 'center',
    valign: 'middle',
    background: null,
    wrap: false,
    leading: style.header.size + 2,
    padding: HEADER_PADDING
  };
}

function partTable(record: PartRecord, style: LabelStyle): LabelTable {
  const partNumber = selectPartNumberTypography(record.partNumber, style);
  const description = selectDescriptionTypography(record.description, style);

  return {
    kind: 'table',
    columnWidthsCm: [style.labelColumnWidthCm, style.contentWidthCm],
    gridLineWidth: style.gridLineWidth,
    rows: [
      {
        heightCm: style.partNumber.heightCm,
        cells: [
          headerCell(style.header.partNumberText, style),
          {
            runs: partNumber.runs,
            align: style.partNumber.align,
            valign: style.partNumber.valign,
            background: null,
            wrap: false,
            leading: partNumber.leading,
            padding: style.partNumber.padding
          }
        ]
      },
      {
        heightCm: style.description.heightCm,
        cells: [
          headerCell(style.header.descriptionText, style),
          {
            runs: [{ text: description.text, font: style.regularFont, size: description.size }],
            align: 'left',
            valign: style.description.valign,
            background: null,
            wrap: true,
            leading: description.leading,
            padding: style.description.padding
          }
        ]
      }
    ]
  };
}

/** Splits the content width across the 7 location cells by the strip weights. */
export function locationColumnWidths(style: LabelStyle): number[] {
  const { weights } = style.locationStrip;
  const total = weights.reduce((sum, weight) => sum + weight, 0);
  return [style.labelColumnWidthCm, ...weights.map(weight => (weight * style.contentWidthCm) / total)];
}

function locationStrip(location: LocationFields, style: LabelStyle): LabelTable {
  const strip = style.locationStrip;

  const labelCell: TableCell = {
    runs: [{ text: strip.label, font: style.regularFont, size: strip.labelSize }],
    align: 'center',
    valign: 'top',
    background: null,
    wrap: false,
    leading: strip.labelSize + 2,
    padding: STRIP_PADDING
  };

  const fieldCells = location.map((field, index): TableCell => ({
    runs: [{ text: field, font: style.regularFont, size: strip.fieldSize }],
    align: 'center',
    valign: 'top',
    background: strip.palette[index % strip.palette.length],
    wrap: false,
    leading: strip.fieldSize + 2,
    padding: STRIP_PADDING
  }));

  return {
    kind: 'table',
    columnWidthsCm: locationColumnWidths(style),
    gridLineWidth: style.gridLineWidth,
    rows: [{ heightCm: strip.heightCm, cells: [labelCell, ...fieldCells] }]
  };
}

/**
 * Picks the records a block shows. Pair labels duplicate a lone record so
 * both rows are filled; anything past `partsPerBlock` is dropped.
 */
export function selectBlockRecords(records: PartRecord[], style: LabelStyle): PartRecord[] {
  const selected = records.slice(0, style.partsPerBlock);
  if (selected.length === 1 && style.partsPerBlock === 2 && style.duplicateLoneRecord) {
    return [selected[0], selected[0]];
  }
  return selected;
}

export function buildLabelBlock(
  locationKey: string,
  records: PartRecord[],
  location: LocationFields,
  style: LabelStyle
): LabelBlock | null {
  const selected = selectBlockRecords(records, style);
  if (selected.length === 0) {
    return null;
  }

  const [first, ...rest] = selected;
  const instructions: RenderInstruction[] = [
    partTable(first, style),
    { kind: 'spacer', heightCm: style.spacing.afterFirstTableCm },
    ...rest.map(record => partTable(record, style)),
    locationStrip(location, style),
    { kind: 'spacer', heightCm: style.spacing.afterBlockCm }
  ];

  return {
    variant: style.variant,
    locationKey,
    records: selected,
    location,
    instructions
  };
}
