/**
 * Runtime domain types
 *
 * A RuntimeInstance is never stored: it is rebuilt on every inventory scan
 * from the names the host runtime reports.
 */

import type { SlotId, SlotRef } from '../slots/slots.types';

/** Parsed form of `<workload>-<slot>-<chain>-<market>[-<role>]` */
export interface ParsedName extends SlotRef {
  workload: string;
  role?: string;
}

export type ContainerState =
  | 'created'
  | 'running'
  | 'paused'
  | 'restarting'
  | 'removing'
  | 'exited'
  | 'dead'
  | 'unknown';

/** Which profile/wallet an instance was started for (from container labels) */
export interface InstanceBinding {
  profile?: string;
  wallet?: string;
}

export interface SessionRef {
  name: string;
  pid: number;
}

export interface RuntimeInstance extends SlotRef {
  /** Container name, exactly `formatName(slot, chain, market)` */
  name: string;
  containerId: string;
  state: ContainerState;
  network?: string;
  subnet?: string;
  /** Host ports published by the container, ascending */
  ports: number[];
  session?: SessionRef;
  workspaceDir: string;
  binding?: InstanceBinding;
}

export interface InventoryFilter {
  chain?: string;
  market?: string;
  slotId?: SlotId;
}

export interface InventorySnapshot {
  instances: RuntimeInstance[];
  /** Names carrying the workload prefix that failed to parse */
  unparsed: string[];
  /** Running sessions, including those without a container */
  sessions: Array<SessionRef & ParsedName>;
}

// ---- Teardown ----

export type ResourceHandle =
  | { kind: 'container'; name: string; id?: string }
  | { kind: 'network'; name: string }
  | { kind: 'session'; name: string; pid: number }
  | { kind: 'workspace'; name: string; path: string };

export type ResourceKind = ResourceHandle['kind'];

export type TeardownStep = 'stopped' | 'stuck' | 'force_killed' | 'removed' | 'retried';

export type TeardownStatus =
  | 'stopped'
  | 'force_killed'
  | 'removed'
  | 'failed'
  | 'skipped'
  | 'planned';

export interface TeardownFailure {
  step: 'stop' | 'kill' | 'remove';
  reason: string;
}

export interface TeardownOutcome {
  handle: ResourceHandle;
  status: TeardownStatus;
  /** Escalation steps taken, in order */
  steps: TeardownStep[];
  failure?: TeardownFailure;
  advisory?: string;
}
