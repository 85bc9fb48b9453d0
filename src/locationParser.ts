import { LocationFields } from './types.js';

export const LOCATION_FIELD_COUNT = 7;

const TOKEN_PATTERN = /[^_\s]+/g;

/**
 * Splits a rack location code into its 7 positional fields.
 *
 * Works for both space/dash codes ("12M R 0 2 A 1") and underscore codes
 * ("12M_ST-140_R_0_2_A_1"). Missing fields are '' and extra tokens are dropped.
 */
export function parseLocation(raw: unknown): LocationFields {
  const tokens = typeof raw === 'string' ? raw.trim().match(TOKEN_PATTERN) ?? [] : [];
  const field = (index: number): string => tokens[index] ?? '';

  return [field(0), field(1), field(2), field(3), field(4), field(5), field(6)];
}
