import { ResolvedColumns } from './types.js';

const PART_NUMBER_MARKERS = ['NO', 'NUM', '#'];
const PART_NUMBER_EXACT = new Set(['PARTNO', 'PART']);

function findColumn(columns: string[], upper: string[], predicate: (name: string) => boolean): string | undefined {
  const index = upper.findIndex(predicate);
  return index >= 0 ? columns[index] : undefined;
}

/**
 * Infers which columns hold the part number, description and location.
 * Matching runs on upper-cased names; the returned identifiers are the
 * original column names so rows can be read verbatim.
 *
 * Degenerate inference (several roles on one column) is accepted. Only an
 * empty column list resolves to null.
 */
export function resolveColumns(columns: string[]): ResolvedColumns | null {
  if (columns.length === 0) {
    return null;
  }

  const upper = columns.map(column => column.toUpperCase());

  const partNumber =
    findColumn(columns, upper, name => name.includes('PART') && PART_NUMBER_MARKERS.some(marker => name.includes(marker))) ??
    findColumn(columns, upper, name => PART_NUMBER_EXACT.has(name)) ??
    columns[0];

  const description =
    findColumn(columns, upper, name => name.includes('DESC')) ??
    (columns.length > 1 ? columns[1] : partNumber);

  const location =
    findColumn(columns, upper, name => name.includes('LOC') || name.includes('POS')) ??
    (columns.length > 2 ? columns[2] : description);

  return { partNumber, description, location };
}
