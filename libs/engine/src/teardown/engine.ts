/**
 * Teardown Engine
 *
 * Escalating shutdown over a list of resource handles:
 *
 * 1. graceful stop of containers and sessions, bounded per call
 * 2. force kill of whatever got stuck
 * 3. forced removal of containers, with one re-resolve and retry
 * 4. networks, once every container and session is done
 * 5. workspace directories
 *
 * Every handle yields exactly one outcome, in input order, whatever happens
 * to the others.
 */

import {
  CommandFailedError,
  CONCURRENCY,
  TIMEOUTS,
  TeardownForceFailedError,
  TeardownTimeoutError,
  describeError,
  noopLogger,
} from '@slotwarden/ipc';
import type { Logger, ResourceHandle, TeardownOutcome, TeardownStep } from '@slotwarden/ipc';
import { runPool } from '../pool';
import type { PoolResult } from '../pool';
import type { ContainerRuntime, SessionRuntime, WorkspaceStore } from '../runtime/types';

export const NETWORK_ADVISORY =
  'Network still has attached endpoints; a system-wide runtime cleanup is recommended';
export const CANCELLED = 'cancelled';

export interface TeardownOptions {
  concurrency?: number;
  stopTimeoutSec?: number;
  dryRun?: boolean;
  signal?: AbortSignal;
  /** Called once per handle as it reaches its final status */
  onOutcome?: (outcome: TeardownOutcome) => void;
}

export interface TeardownDeps {
  containers: ContainerRuntime;
  sessions?: SessionRuntime;
  workspaces: WorkspaceStore;
  logger?: Logger;
}

type InstanceHandle = Extract<ResourceHandle, { kind: 'container' | 'session' }>;

interface Unit {
  index: number;
  outcome: TeardownOutcome;
  stuckReason?: string;
  killError?: TeardownForceFailedError;
}

export class TeardownEngine {
  private readonly logger: Logger;

  constructor(private readonly deps: TeardownDeps) {
    this.logger = deps.logger ?? noopLogger;
  }

  async teardown(handles: readonly ResourceHandle[], options: TeardownOptions = {}): Promise<TeardownOutcome[]> {
    const units: Unit[] = handles.map((handle, index) => ({
      index,
      outcome: { handle, status: 'planned', steps: [] },
    }));
    if (options.dryRun) {
      for (const unit of units) options.onOutcome?.(unit.outcome);
      return units.map((u) => u.outcome);
    }

    const concurrency = options.concurrency ?? CONCURRENCY.TEARDOWN;
    const stopTimeoutSec = options.stopTimeoutSec ?? TIMEOUTS.STOP_GRACE_SEC;
    const pool = { concurrency, signal: options.signal };

    const instances = units.filter((u) => isInstanceHandle(u.outcome.handle));
    const networks = units.filter((u) => u.outcome.handle.kind === 'network');
    const workspaces = units.filter((u) => u.outcome.handle.kind === 'workspace');

    // 1. graceful
    this.settle(await runPool(instances, (u) => this.stop(u, stopTimeoutSec), pool), instances);

    // 2. forceful
    const stuck = instances.filter((u) => u.stuckReason !== undefined && u.outcome.status === 'planned');
    this.settle(await runPool(stuck, (u) => this.kill(u), pool), stuck);

    // 3. removal
    const removable = instances.filter((u) => u.outcome.handle.kind === 'container' && u.outcome.status === 'planned');
    this.settle(await runPool(removable, (u) => this.removeContainer(u), pool), removable);

    // Sessions have no removal step: their last step is final
    for (const u of instances) {
      if (u.outcome.status !== 'planned') continue;
      u.outcome.status = u.outcome.steps.includes('force_killed') ? 'force_killed' : 'stopped';
    }

    // 4. networks
    this.settle(await runPool(networks, (u) => this.removeNetwork(u), pool), networks);

    // 5. workspaces
    this.settle(await runPool(workspaces, (u) => this.removeWorkspace(u), pool), workspaces);

    for (const unit of units) options.onOutcome?.(unit.outcome);
    return units.map((u) => u.outcome);
  }

  /**
   * Fold pool results back: unexpected throws become failures, and skipped
   * units are cancelled but keep the last step they completed.
   */
  private settle(results: PoolResult<void>[], batch: Unit[]): void {
    results.forEach((r, i) => {
      const outcome = batch[i].outcome;
      if (r.status === 'skipped') {
        outcome.status = lastCompleted(outcome.steps) ?? 'skipped';
        outcome.advisory = CANCELLED;
      } else if (r.status === 'rejected') {
        outcome.status = 'failed';
        outcome.failure = { step: 'remove', reason: describeError(r.reason) };
      }
    });
  }

  private async stop(unit: Unit, timeoutSec: number): Promise<void> {
    const handle = unit.outcome.handle;
    try {
      if (handle.kind === 'container') {
        await this.deps.containers.stopContainer(handle.id ?? handle.name, timeoutSec);
      } else if (handle.kind === 'session') {
        await this.requireSessions().quitSession({ name: handle.name, pid: handle.pid });
      }
      unit.outcome.steps.push('stopped');
    } catch (err) {
      unit.stuckReason =
        err instanceof CommandFailedError && err.timedOut
          ? new TeardownTimeoutError(handle.name, timeoutSec).message
          : describeError(err);
      unit.outcome.steps.push('stuck');
      this.logger.warn('Graceful stop failed', { name: handle.name, kind: handle.kind, reason: unit.stuckReason });
    }
  }

  private async kill(unit: Unit): Promise<void> {
    const handle = unit.outcome.handle;
    try {
      if (handle.kind === 'container') {
        await this.deps.containers.killContainer(handle.id ?? handle.name);
      } else if (handle.kind === 'session') {
        await this.requireSessions().killSession({ name: handle.name, pid: handle.pid });
      }
      unit.outcome.steps.push('force_killed');
    } catch (err) {
      unit.killError = new TeardownForceFailedError(handle.name, describeError(err), { cause: err });
      this.logger.warn('Force kill failed', { name: handle.name, kind: handle.kind, reason: unit.killError.message });
      if (handle.kind === 'session') {
        unit.outcome.status = 'failed';
        unit.outcome.failure = { step: 'kill', reason: unit.killError.message };
      }
      // Containers still go through forced removal
    }
  }

  private async removeContainer(unit: Unit): Promise<void> {
    const handle = unit.outcome.handle;
    if (handle.kind !== 'container') return;
    const { containers } = this.deps;

    try {
      await containers.removeContainer(handle.id ?? handle.name);
      unit.outcome.steps.push('removed');
      unit.outcome.status = 'removed';
      return;
    } catch (err) {
      this.logger.debug('Container removal failed, re-resolving', { name: handle.name, error: describeError(err) });
    }

    try {
      const current = (await containers.listContainers({ all: true })).find((c) => c.name === handle.name);
      if (current) {
        unit.outcome.steps.push('retried');
        await containers.removeContainer(current.id);
      }
      unit.outcome.steps.push('removed');
      unit.outcome.status = 'removed';
    } catch (err) {
      const reasons = [unit.killError?.message, describeError(err)].filter((r): r is string => r !== undefined);
      unit.outcome.status = 'failed';
      unit.outcome.failure = { step: 'remove', reason: reasons.join('; ') };
      this.logger.error('Container removal failed', { name: handle.name, reason: unit.outcome.failure.reason });
    }
  }

  private async removeNetwork(unit: Unit): Promise<void> {
    const handle = unit.outcome.handle;
    try {
      await this.deps.containers.removeNetwork(handle.name);
      unit.outcome.steps.push('removed');
      unit.outcome.status = 'removed';
    } catch (err) {
      unit.outcome.status = 'failed';
      unit.outcome.failure = { step: 'remove', reason: describeError(err) };
      unit.outcome.advisory = NETWORK_ADVISORY;
      this.logger.warn('Network removal failed', { name: handle.name, reason: unit.outcome.failure.reason });
    }
  }

  private async removeWorkspace(unit: Unit): Promise<void> {
    const handle = unit.outcome.handle;
    if (handle.kind !== 'workspace') return;
    try {
      await this.deps.workspaces.remove(handle.path);
      unit.outcome.steps.push('removed');
      unit.outcome.status = 'removed';
    } catch (err) {
      unit.outcome.status = 'failed';
      unit.outcome.failure = { step: 'remove', reason: describeError(err) };
      this.logger.warn('Workspace removal failed', { path: handle.path, reason: unit.outcome.failure.reason });
    }
  }

  private requireSessions(): SessionRuntime {
    const sessions = this.deps.sessions;
    if (!sessions) throw new Error('No session runtime configured');
    return sessions;
  }
}

function lastCompleted(steps: readonly TeardownStep[]): 'stopped' | 'force_killed' | 'removed' | undefined {
  for (let i = steps.length - 1; i >= 0; i--) {
    const step = steps[i];
    if (step === 'stopped' || step === 'force_killed' || step === 'removed') return step;
  }
  return undefined;
}

export function isInstanceHandle(handle: ResourceHandle): handle is InstanceHandle {
  return handle.kind === 'container' || handle.kind === 'session';
}
