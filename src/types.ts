export type LayoutVariant = 'v1' | 'v2';

export const LAYOUT_VARIANTS: readonly LayoutVariant[] = ['v1', 'v2'];

export function isLayoutVariant(value: unknown): value is LayoutVariant {
  return LAYOUT_VARIANTS.some(variant => variant === value);
}

/** One row of loaded tabular data, keyed by the verbatim column name. */
export type TabularRow = Readonly<Record<string, unknown>>;

export interface TabularData {
  columns: string[];
  rows: TabularRow[];
}

export interface PartRecord {
  readonly partNumber: string;
  readonly description: string;
  readonly locationRaw: string;
}

export type LocationFields = readonly [string, string, string, string, string, string, string];

export interface ResolvedColumns {
  partNumber: string;
  description: string;
  location: string;
}

export type HorizontalAlign = 'left' | 'center' | 'right';
export type VerticalAlign = 'top' | 'middle' | 'bottom';

export interface TextRun {
  text: string;
  font: string;
  size: number;
}

export interface CellPadding {
  top: number;
  right: number;
  bottom: number;
  left: number;
}

export interface TableCell {
  runs: TextRun[];
  align: HorizontalAlign;
  valign: VerticalAlign;
  background: string | null;
  // Wrapped cells flow over several lines; unwrapped cells keep their runs on one line.
  wrap: boolean;
  leading: number;
  padding: CellPadding;
}

export interface TableRow {
  heightCm: number;
  cells: TableCell[];
}

export interface LabelTable {
  kind: 'table';
  columnWidthsCm: number[];
  rows: TableRow[];
  gridLineWidth: number;
}

export interface LabelSpacer {
  kind: 'spacer';
  heightCm: number;
}

export type RenderInstruction = LabelTable | LabelSpacer;

export interface LabelBlock {
  variant: LayoutVariant;
  locationKey: string;
  records: PartRecord[];
  location: LocationFields;
  instructions: RenderInstruction[];
}

export interface LabelPage {
  blocks: LabelBlock[];
}

export interface LabelDocument {
  variant: LayoutVariant;
  pageSize: 'A4';
  columns: ResolvedColumns;
  pages: LabelPage[];
}

export interface GroupDiagnostic {
  index: number;
  locationKey: string;
  reason: string;
}

export type GroupOutcome =
  | { ok: true; block: LabelBlock | null }
  | { ok: false; diagnostic: GroupDiagnostic };

export interface LayoutResult {
  document: LabelDocument | null;
  columns: ResolvedColumns | null;
  groupCount: number;
  blockCount: number;
  skipped: GroupDiagnostic[];
}

export type LayoutProgressCallback = (
  index: number,
  total: number,
  locationKey: string,
  diagnostic?: GroupDiagnostic
) => void;
