/**
 * Zod schemas and parsers for slot-related input
 */

import { z } from 'zod';
import { InvalidInputError } from '../errors';
import type { SlotId, SlotSelection } from './slots.types';

/** Largest id range accepted from a single `a-b` term */
export const MAX_RANGE_SPAN = 10_000;

export const WalletAddressSchema = z
  .string()
  .trim()
  .regex(/^0x[0-9a-fA-F]{40}$/, 'Expected a 20-byte hex address (0x + 40 hex chars)')
  .transform((s) => s.toLowerCase());

export const SlotIdSchema = z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER);

/** Chain and market identifiers: case-insensitive, stored lowercase */
export const IdentifierSchema = z
  .string()
  .trim()
  .toLowerCase()
  .regex(/^[a-z0-9]+$/, 'Expected letters and digits only');

/**
 * Validate and normalize a wallet address. Throws InvalidInputError.
 */
export function parseWalletAddress(input: string): string {
  const result = WalletAddressSchema.safeParse(input);
  if (!result.success) {
    throw new InvalidInputError(`Invalid wallet address "${input}"`, 'wallet');
  }
  return result.data;
}

export function parseIdentifier(input: string, field: 'chain' | 'market'): string {
  const result = IdentifierSchema.safeParse(input);
  if (!result.success) {
    throw new InvalidInputError(`Invalid ${field} "${input}": letters and digits only`, field);
  }
  return result.data;
}

function parseSlotNumber(token: string, raw: string): SlotId {
  if (!/^\d+$/.test(token)) {
    throw new InvalidInputError(`Invalid slot selection "${raw}": "${token}" is not a slot id`, 'slot');
  }
  const value = Number(token);
  if (!SlotIdSchema.safeParse(value).success) {
    throw new InvalidInputError(`Invalid slot selection "${raw}": "${token}" is out of range`, 'slot');
  }
  return value;
}

/**
 * Parse a slot selection: `all`, a single id (`5`), a range (`3-7`) or a
 * comma-separated mix (`1,4-6`). Returns ascending, de-duplicated ids.
 */
export function parseSlotSelection(input: string): SlotSelection {
  const raw = input.trim();
  if (raw.toLowerCase() === 'all') return 'all';
  if (raw === '') {
    throw new InvalidInputError('Empty slot selection', 'slot');
  }

  const ids = new Set<SlotId>();
  for (const term of raw.split(',').map((t) => t.trim())) {
    const dash = term.indexOf('-');
    if (dash === -1) {
      ids.add(parseSlotNumber(term, raw));
      continue;
    }
    const start = parseSlotNumber(term.slice(0, dash), raw);
    const end = parseSlotNumber(term.slice(dash + 1), raw);
    if (end < start) {
      throw new InvalidInputError(`Invalid slot range "${term}": end is before start`, 'slot');
    }
    if (end - start + 1 > MAX_RANGE_SPAN) {
      throw new InvalidInputError(`Slot range "${term}" spans more than ${MAX_RANGE_SPAN} ids`, 'slot');
    }
    for (let id = start; id <= end; id++) ids.add(id);
  }
  return [...ids].sort((a, b) => a - b);
}

/**
 * Render ids as compact ranges: [1, 2, 3, 7] → "1-3,7".
 */
export function formatSlotRanges(ids: readonly SlotId[]): string {
  const sorted = [...new Set(ids)].sort((a, b) => a - b);
  const parts: string[] = [];
  let i = 0;
  while (i < sorted.length) {
    let j = i;
    while (j + 1 < sorted.length && sorted[j + 1] === sorted[j] + 1) j++;
    parts.push(i === j ? `${sorted[i]}` : `${sorted[i]}-${sorted[j]}`);
    i = j + 1;
  }
  return parts.join(',');
}
