/**
 * Resource naming convention
 *
 * Every container, network, session and workspace a slot owns is named
 *
 *   <workload>-<slot>-<chain>-<market>[-<role>]
 *
 * and the inventory recovers (slot, chain, market) from that name alone, so
 * `format` and `parse` must round-trip exactly.
 */

import { DEFAULT_WORKLOAD, InvalidInputError } from '@slotwarden/ipc';
import type { ParsedName, SlotRef } from '@slotwarden/ipc';

const WORKLOAD_RE = /^[a-z][a-z0-9-]*[a-z0-9]$/;
const SEGMENT_RE = /^[a-z0-9]+$/;
const ROLE_RE = /^[a-z][a-z0-9]*$/;

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export class SlotNaming {
  private readonly pattern: RegExp;

  constructor(readonly workload: string = DEFAULT_WORKLOAD) {
    if (!WORKLOAD_RE.test(workload)) {
      throw new InvalidInputError(`Invalid workload name "${workload}"`, 'workload');
    }
    this.pattern = new RegExp(
      `^${escapeRegExp(workload)}-(0|[1-9]\\d*)-([a-z0-9]+)-([a-z0-9]+)(?:-([a-z][a-z0-9]*))?$`,
    );
  }

  /**
   * Build the name for a slot (and optional role).
   */
  format(ref: SlotRef, role?: string): string {
    if (!Number.isSafeInteger(ref.slotId) || ref.slotId < 0) {
      throw new InvalidInputError(`Invalid slot id ${ref.slotId}`, 'slot');
    }
    if (!SEGMENT_RE.test(ref.chain)) throw new InvalidInputError(`Invalid chain "${ref.chain}"`, 'chain');
    if (!SEGMENT_RE.test(ref.market)) throw new InvalidInputError(`Invalid market "${ref.market}"`, 'market');
    if (role !== undefined && !ROLE_RE.test(role)) throw new InvalidInputError(`Invalid role "${role}"`, 'role');

    const base = `${this.workload}-${ref.slotId}-${ref.chain}-${ref.market}`;
    return role === undefined ? base : `${base}-${role}`;
  }

  /**
   * Parse a name. Returns null when it does not follow the grammar.
   */
  parse(name: string): ParsedName | null {
    const m = this.pattern.exec(name);
    if (!m) return null;
    const slotId = Number(m[1]);
    if (!Number.isSafeInteger(slotId)) return null;
    const parsed: ParsedName = { workload: this.workload, slotId, chain: m[2], market: m[3] };
    if (m[4] !== undefined) parsed.role = m[4];
    return parsed;
  }

  /** True when the name claims to be ours, whether or not it parses */
  owns(name: string): boolean {
    return name.startsWith(`${this.workload}-`);
  }
}
