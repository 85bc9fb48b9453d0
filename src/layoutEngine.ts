import { resolveColumns } from './columnResolver.js';
import { buildLabelBlock, toCellText, toPartRecord } from './labelBlockBuilder.js';
import { createLabelStyle, LabelStyle, LabelStyleOverrides } from './labelStyle.js';
import { parseLocation } from './locationParser.js';
import { paginate } from './paginator.js';
import {
  GroupDiagnostic,
  GroupOutcome,
  LabelBlock,
  LayoutProgressCallback,
  LayoutResult,
  LayoutVariant,
  LocationFields,
  PartRecord,
  ResolvedColumns,
  TabularData,
  TabularRow
} from './types.js';

export type BlockBuilder = (
  locationKey: string,
  records: PartRecord[],
  location: LocationFields,
  style: LabelStyle
) => LabelBlock | null;

export interface LayoutEngineOptions {
  variant?: LayoutVariant;
  style?: LabelStyleOverrides;
  buildBlock?: BlockBuilder;
}

export interface LocationGroup {
  key: string;
  rows: TabularRow[];
}

/**
 * Groups rows by the exact string form of the location column, in first-seen order.
 * Rows with an empty location cell belong to no group and never print.
 */
export function groupByLocation(rows: TabularRow[], locationColumn: string): LocationGroup[] {
  const groups = new Map<string, TabularRow[]>();
  for (const row of rows) {
    const key = toCellText(row[locationColumn]);
    if (key === '') {
      continue;
    }
    const existing = groups.get(key);
    if (existing) {
      existing.push(row);
    } else {
      groups.set(key, [row]);
    }
  }
  return Array.from(groups, ([key, groupRows]) => ({ key, rows: groupRows }));
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : toCellText(error);
}

export class LabelLayoutEngine {
  private readonly style: LabelStyle;
  private readonly buildBlock: BlockBuilder;

  constructor(options: LayoutEngineOptions = {}) {
    this.style = createLabelStyle(options.variant ?? 'v1', options.style);
    this.buildBlock = options.buildBlock ?? buildLabelBlock;
  }

  getVariant(): LayoutVariant {
    return this.style.variant;
  }

  getStyle(): LabelStyle {
    return this.style;
  }

  /**
   * Lays out one label document. Groups are processed strictly in order;
   * a group that throws is skipped and reported, the rest still print.
   * Returns a null document when no group produced a block.
   */
  layout(table: TabularData, onProgress?: LayoutProgressCallback): LayoutResult {
    const columns = resolveColumns(table.columns);
    if (!columns || table.rows.length === 0) {
      return { document: null, columns, groupCount: 0, blockCount: 0, skipped: [] };
    }

    const groups = groupByLocation(table.rows, columns.location);
    const blocks: LabelBlock[] = [];
    const skipped: LayoutResult['skipped'] = [];

    groups.forEach((group, index) => {
      const outcome = this.processGroup(index, groups.length, group, columns, onProgress);
      if (!outcome.ok) {
        skipped.push(outcome.diagnostic);
        return;
      }
      if (outcome.block) {
        blocks.push(outcome.block);
      }
    });

    if (blocks.length === 0) {
      return { document: null, columns, groupCount: groups.length, blockCount: 0, skipped };
    }

    return {
      document: {
        variant: this.style.variant,
        pageSize: 'A4',
        columns,
        pages: paginate(blocks, this.style.blocksPerPage)
      },
      columns,
      groupCount: groups.length,
      blockCount: blocks.length,
      skipped
    };
  }

  private processGroup(
    index: number,
    total: number,
    group: LocationGroup,
    columns: ResolvedColumns,
    onProgress?: LayoutProgressCallback
  ): GroupOutcome {
    try {
      onProgress?.(index, total, group.key);
      const records = group.rows.map(row => toPartRecord(row, columns));
      if (records.length === 0) {
        return { ok: true, block: null };
      }
      const location = parseLocation(records[0].locationRaw);
      return { ok: true, block: this.buildBlock(group.key, records, location, this.style) };
    } catch (error) {
      const diagnostic: GroupDiagnostic = { index, locationKey: group.key, reason: describeError(error) };
      return { ok: false, diagnostic: this.reportFailure(diagnostic, total, onProgress) };
    }
  }

  // A callback that also throws on the failure report is folded into the diagnostic.
  private reportFailure(diagnostic: GroupDiagnostic, total: number, onProgress?: LayoutProgressCallback): GroupDiagnostic {
    try {
      onProgress?.(diagnostic.index, total, diagnostic.locationKey, diagnostic);
      return diagnostic;
    } catch (error) {
      return { ...diagnostic, reason: `${diagnostic.reason}; progress callback failed: ${describeError(error)}` };
    }
  }
}

export function generateLabelLayout(
  table: TabularData,
  variant: LayoutVariant,
  onProgress?: LayoutProgressCallback
): LayoutResult {
  return new LabelLayoutEngine({ variant }).layout(table, onProgress);
}

export * from './types.js';
