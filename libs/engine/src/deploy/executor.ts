/**
 * Deployment Executor
 *
 * Brings one slot to a running state: inventory check, allocation,
 * workspace, network, container and an optional log-tailing session. Calls
 * for the same (slot, chain, market) are serialized, so a second call sees
 * the first one's instance and returns it without starting anything.
 */

import * as path from 'node:path';
import {
  CONCURRENCY,
  CONTAINER_PORTS,
  LABELS,
  ResourceAllocationExhaustedError,
  StartFailureError,
  describeError,
  noopLogger,
} from '@slotwarden/ipc';
import type {
  ChainConfig,
  ConfigBundle,
  Logger,
  MarketConfig,
  RuntimeInstance,
  SessionRef,
  SlotId,
  SlotRef,
} from '@slotwarden/ipc';
import type { Allocation, ResourceAllocator } from '../allocator';
import type { RuntimeInventory } from '../inventory';
import { KeyedMutex } from '../mutex';
import { runPool } from '../pool';
import type { ContainerRuntime, PortMapping, SessionRuntime, WorkspaceStore } from '../runtime/types';
import { buildWorkloadEnv, renderEnvFile } from './env-file';

export type DeployResult =
  | { ok: true; instance: RuntimeInstance; started: boolean }
  | { ok: false; slotId: SlotId; error: ResourceAllocationExhaustedError | StartFailureError };

export interface DeployContext {
  profile: string;
  bundle: ConfigBundle;
  chainConfig: ChainConfig;
  marketConfig: MarketConfig;
  /** Attach a detached session trailing the container logs */
  attachSession?: boolean;
}

export interface DeployManyOptions {
  concurrency?: number;
  signal?: AbortSignal;
  /** Called as each slot settles */
  onResult?: (result: DeployResult) => void;
}

export interface DeployFailure {
  slotId: SlotId;
  error: ResourceAllocationExhaustedError | StartFailureError;
}

export interface DeployBatchResult {
  started: RuntimeInstance[];
  alreadyRunning: RuntimeInstance[];
  failed: DeployFailure[];
  skipped: SlotId[];
}

export interface ExecutorDeps {
  containers: ContainerRuntime;
  sessions?: SessionRuntime;
  workspaces: WorkspaceStore;
  inventory: RuntimeInventory;
  allocator: ResourceAllocator;
  logger?: Logger;
}

const ENV_FILE = '.env';

function slotKey(slot: SlotRef): string {
  return `${slot.chain}/${slot.market}/${slot.slotId}`;
}

export class DeploymentExecutor {
  private readonly locks = new KeyedMutex();
  private readonly logger: Logger;

  constructor(private readonly deps: ExecutorDeps) {
    this.logger = deps.logger ?? noopLogger;
  }

  async ensureRunning(slot: SlotRef, context: DeployContext): Promise<DeployResult> {
    const release = await this.locks.acquire(slotKey(slot));
    try {
      return await this.ensureRunningLocked(slot, context);
    } catch (err) {
      return { ok: false, slotId: slot.slotId, error: this.toStartFailure(slot, err) };
    } finally {
      release();
    }
  }

  async deployMany(
    slots: readonly SlotRef[],
    context: DeployContext,
    options: DeployManyOptions = {},
  ): Promise<DeployBatchResult> {
    const results = await runPool(
      slots,
      async (slot) => {
        const result = await this.ensureRunning(slot, context);
        options.onResult?.(result);
        return result;
      },
      { concurrency: options.concurrency ?? CONCURRENCY.DEPLOY, signal: options.signal },
    );

    const batch: DeployBatchResult = { started: [], alreadyRunning: [], failed: [], skipped: [] };
    results.forEach((r, i) => {
      const slot = slots[i];
      if (r.status === 'skipped') {
        batch.skipped.push(slot.slotId);
      } else if (r.status === 'rejected') {
        batch.failed.push({ slotId: slot.slotId, error: this.toStartFailure(slot, r.reason) });
      } else if (!r.value.ok) {
        batch.failed.push({ slotId: r.value.slotId, error: r.value.error });
      } else if (r.value.started) {
        batch.started.push(r.value.instance);
      } else {
        batch.alreadyRunning.push(r.value.instance);
      }
    });
    return batch;
  }

  private async ensureRunningLocked(slot: SlotRef, context: DeployContext): Promise<DeployResult> {
    const { containers, inventory, allocator } = this.deps;

    const existing = await inventory.find(slot);
    if (existing) {
      this.logger.debug('Slot already running', { slotId: slot.slotId, name: existing.name });
      return { ok: true, instance: existing, started: false };
    }

    const name = inventory.naming.format(slot);
    await this.clearStale(name);

    let allocation: Allocation;
    try {
      allocation = await allocator.allocate(slot.slotId);
    } catch (err) {
      if (err instanceof ResourceAllocationExhaustedError) {
        this.logger.warn('Allocation exhausted', { slotId: slot.slotId, resource: err.resource });
        return { ok: false, slotId: slot.slotId, error: err };
      }
      throw err;
    }

    try {
      const env = buildWorkloadEnv({
        slot,
        name,
        bundle: context.bundle,
        chain: context.chainConfig,
        market: context.marketConfig,
        allocation,
      });
      const workspaceDir = await this.deps.workspaces.materialize(name, { [ENV_FILE]: renderEnvFile(env) });

      await containers.createNetwork(name, allocation.subnet);
      let containerId: string;
      try {
        containerId = await containers.startContainer({
          name,
          image: context.marketConfig.image,
          envFile: path.join(workspaceDir, ENV_FILE),
          network: name,
          ports: portMap(allocation.ports),
          labels: {
            [LABELS.PROFILE]: context.profile,
            [LABELS.WALLET]: context.bundle.walletAddress.toLowerCase(),
            [LABELS.SLOT]: String(slot.slotId),
          },
        });
      } catch (err) {
        await this.removeNetworkQuietly(name);
        throw err;
      }

      const instance: RuntimeInstance = {
        ...slot,
        name,
        containerId,
        state: 'running',
        network: name,
        subnet: allocation.subnet,
        ports: [...allocation.ports],
        workspaceDir,
        binding: { profile: context.profile, wallet: context.bundle.walletAddress.toLowerCase() },
      };

      if (context.attachSession) {
        const session = await this.attachSession(name);
        if (session) instance.session = session;
      }

      this.logger.info('Slot started', { slotId: slot.slotId, name, subnet: allocation.subnet, ports: allocation.ports });
      return { ok: true, instance, started: true };
    } finally {
      allocator.release(allocation);
    }
  }

  /** Remove a stopped container or a network left behind under this name */
  private async clearStale(name: string): Promise<void> {
    const { containers } = this.deps;
    const [all, networks] = await Promise.all([containers.listContainers({ all: true }), containers.listNetworks()]);

    const stale = all.find((c) => c.name === name);
    if (stale) {
      this.logger.info('Removing stale container', { name, state: stale.state });
      await containers.removeContainer(stale.id);
    }
    if (networks.some((n) => n.name === name)) {
      this.logger.info('Removing stale network', { name });
      await containers.removeNetwork(name);
    }
  }

  private async removeNetworkQuietly(name: string): Promise<void> {
    try {
      await this.deps.containers.removeNetwork(name);
    } catch (err) {
      this.logger.warn('Could not remove network after failed start', { name, error: describeError(err) });
    }
  }

  private async attachSession(name: string): Promise<SessionRef | undefined> {
    const sessions = this.deps.sessions;
    if (!sessions) return undefined;
    try {
      return await sessions.startSession(name, ['docker', 'logs', '-f', name]);
    } catch (err) {
      this.logger.warn('Could not attach log session', { name, error: describeError(err) });
      return undefined;
    }
  }

  private toStartFailure(slot: SlotRef, err: unknown): StartFailureError {
    if (err instanceof StartFailureError) return err;
    this.logger.error('Slot failed to start', { slotId: slot.slotId, error: describeError(err) });
    return new StartFailureError(slot.slotId, describeError(err), { cause: err });
  }
}

function portMap(ports: readonly number[]): PortMapping[] {
  const containerPorts = [CONTAINER_PORTS.CORE_API, CONTAINER_PORTS.LOCAL_COLLECTOR_P2P];
  return ports.slice(0, containerPorts.length).map((host, i) => ({ host, container: containerPorts[i] }));
}
