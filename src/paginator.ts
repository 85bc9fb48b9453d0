import { LabelBlock, LabelPage } from './types.js';

export const DEFAULT_BLOCKS_PER_PAGE = 4;

/**
 * Places blocks in order, starting a new page before every block whose
 * running index is a positive multiple of `capacity` (the 5th, 9th, ...).
 */
export function paginate(blocks: LabelBlock[], capacity: number = DEFAULT_BLOCKS_PER_PAGE): LabelPage[] {
  if (!Number.isInteger(capacity) || capacity < 1) {
    throw new RangeError(`Page capacity must be a positive integer, got ${capacity}`);
  }

  const pages: LabelPage[] = [];
  let current: LabelPage | null = null;
  let placed = 0;

  for (const block of blocks) {
    if (current === null || (placed > 0 && placed % capacity === 0)) {
      current = { blocks: [] };
      pages.push(current);
    }
    current.blocks.push(block);
    placed += 1;
  }

  return pages;
}
