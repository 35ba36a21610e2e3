/**
 * Subnet and port allocation
 *
 * Each started slot gets one /24 inside `<prefix>.X.0/24` and one block of
 * consecutive host ports. Reads of current usage and the claim are done
 * under one mutex, so two concurrent starts never receive the same octet or
 * port. Claims are held in-process until the caller releases them, which it
 * does once the container start has resolved.
 */

import * as net from 'node:net';
import {
  BASE_PORT,
  MAX_PORT_BLOCKS,
  PORT_BLOCK_SIZE,
  ResourceAllocationExhaustedError,
  SUBNET_OCTETS,
  SUBNET_PREFIX,
  noopLogger,
} from '@slotwarden/ipc';
import type { Logger, SlotId } from '@slotwarden/ipc';
import { Mutex } from './mutex';
import type { ContainerRuntime, NetworkSummary } from './runtime/types';

export interface Allocation {
  slotId: SlotId;
  octet: number;
  subnet: string;
  /** Host ports, `blockSize` long, ascending */
  ports: number[];
}

/** Resolves true when the host port can be bound */
export type PortProbe = (port: number) => Promise<boolean>;

export const tcpPortProbe: PortProbe = (port) =>
  new Promise((resolve) => {
    const server = net.createServer();
    server.once('error', () => resolve(false));
    server.once('listening', () => server.close(() => resolve(true)));
    server.listen(port, '0.0.0.0');
  });

export interface AllocatorOptions {
  subnetPrefix?: string;
  subnetOctets?: number;
  basePort?: number;
  blockSize?: number;
  maxBlocks?: number;
  probe?: PortProbe;
  logger?: Logger;
}

/** IPv4 dotted quad to an unsigned 32-bit number; null for anything else */
function ipv4ToNumber(address: string): number | null {
  const parts = address.split('.');
  if (parts.length !== 4) return null;
  let value = 0;
  for (const part of parts) {
    if (!/^\d{1,3}$/.test(part) || Number(part) > 255) return null;
    value = value * 256 + Number(part);
  }
  return value;
}

/**
 * Third octets of every `<prefix>.X.0/24` block that some network overlaps.
 * A wider network (e.g. a compose default `172.18.0.0/16`) takes every block
 * it covers; IPv6 and malformed subnets are ignored.
 */
export function usedOctets(networks: readonly NetworkSummary[], prefix: string = SUBNET_PREFIX): number[] {
  const base = ipv4ToNumber(`${prefix}.0.0`);
  if (base === null) return [];
  const last = base + 0xffff;

  const octets = new Set<number>();
  for (const n of networks) {
    const m = n.subnet ? /^([\d.]+)\/(\d{1,2})$/.exec(n.subnet) : null;
    if (!m) continue;
    const address = ipv4ToNumber(m[1]);
    const bits = Number(m[2]);
    if (address === null || bits > 32) continue;

    const size = 2 ** (32 - bits);
    const start = Math.floor(address / size) * size;
    const end = start + size - 1;
    const lo = Math.max(start, base);
    const hi = Math.min(end, last);
    if (lo > hi) continue;
    for (let x = Math.floor((lo - base) / 256); x <= Math.floor((hi - base) / 256); x++) octets.add(x);
  }
  return [...octets].sort((a, b) => a - b);
}

export class ResourceAllocator {
  private readonly mutex = new Mutex();
  private readonly claimedOctets = new Set<number>();
  private readonly claimedPorts = new Set<number>();
  private readonly prefix: string;
  private readonly octets: number;
  private readonly basePort: number;
  private readonly blockSize: number;
  private readonly maxBlocks: number;
  private readonly probe?: PortProbe;
  private readonly logger: Logger;

  constructor(
    private readonly containers: ContainerRuntime,
    options: AllocatorOptions = {},
  ) {
    this.prefix = options.subnetPrefix ?? SUBNET_PREFIX;
    this.octets = options.subnetOctets ?? SUBNET_OCTETS;
    this.basePort = options.basePort ?? BASE_PORT;
    this.blockSize = options.blockSize ?? PORT_BLOCK_SIZE;
    this.maxBlocks = options.maxBlocks ?? MAX_PORT_BLOCKS;
    this.probe = options.probe;
    this.logger = options.logger ?? noopLogger;
  }

  async allocate(slotId: SlotId): Promise<Allocation> {
    const release = await this.mutex.acquire();
    try {
      const [networks, containers] = await Promise.all([
        this.containers.listNetworks(),
        this.containers.listContainers({ all: true }),
      ]);

      const takenOctets = new Set([...usedOctets(networks, this.prefix), ...this.claimedOctets]);
      let octet = -1;
      for (let x = 0; x < this.octets; x++) {
        if (!takenOctets.has(x)) {
          octet = x;
          break;
        }
      }
      if (octet < 0) throw new ResourceAllocationExhaustedError('subnet', slotId);

      const takenPorts = new Set(this.claimedPorts);
      for (const c of containers) {
        for (const p of c.ports) takenPorts.add(p);
      }
      const ports = await this.pickPortBlock(takenPorts);
      if (!ports) throw new ResourceAllocationExhaustedError('ports', slotId);

      this.claimedOctets.add(octet);
      for (const p of ports) this.claimedPorts.add(p);

      const allocation = { slotId, octet, subnet: `${this.prefix}.${octet}.0/24`, ports };
      this.logger.debug('Allocated resources', { ...allocation });
      return allocation;
    } finally {
      release();
    }
  }

  /** Drop the in-process claim; the runtime now reports the resources itself */
  release(allocation: Allocation): void {
    this.claimedOctets.delete(allocation.octet);
    for (const p of allocation.ports) this.claimedPorts.delete(p);
  }

  private async pickPortBlock(taken: ReadonlySet<number>): Promise<number[] | null> {
    for (let k = 0; k < this.maxBlocks; k++) {
      const start = this.basePort + k * this.blockSize;
      const block = Array.from({ length: this.blockSize }, (_, j) => start + j);
      if (block.some((p) => taken.has(p))) continue;
      if (!(await this.allFree(block))) continue;
      return block;
    }
    return null;
  }

  private async allFree(block: number[]): Promise<boolean> {
    const probe = this.probe;
    if (!probe) return true;
    for (const port of block) {
      if (!(await probe(port))) return false;
    }
    return true;
  }
}
