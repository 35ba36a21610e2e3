/**
 * Runtime Inventory
 *
 * Rebuilds the set of live slot instances from the host runtime on every
 * call. Nothing is cached: slot, chain and market come only from names.
 */

import { LABELS, noopLogger } from '@slotwarden/ipc';
import type {
  ContainerState,
  InstanceBinding,
  InventoryFilter,
  InventorySnapshot,
  Logger,
  ParsedName,
  RuntimeInstance,
  SessionRef,
  SlotRef,
} from '@slotwarden/ipc';
import type { SlotNaming } from './naming';
import type { ContainerRuntime, ContainerSummary, SessionRuntime, WorkspaceStore } from './runtime/types';

const LIVE_STATES: ReadonlySet<ContainerState> = new Set(['running', 'restarting', 'paused']);

export interface InventoryDeps {
  containers: ContainerRuntime;
  sessions?: SessionRuntime;
  workspaces: WorkspaceStore;
  naming: SlotNaming;
  logger?: Logger;
}

export function matchesFilter(ref: SlotRef, filter: InventoryFilter = {}): boolean {
  if (filter.chain !== undefined && ref.chain !== filter.chain) return false;
  if (filter.market !== undefined && ref.market !== filter.market) return false;
  if (filter.slotId !== undefined && ref.slotId !== filter.slotId) return false;
  return true;
}

function bindingOf(container: ContainerSummary): InstanceBinding | undefined {
  const profile = container.labels[LABELS.PROFILE];
  const wallet = container.labels[LABELS.WALLET];
  if (profile === undefined && wallet === undefined) return undefined;
  const binding: InstanceBinding = {};
  if (profile !== undefined) binding.profile = profile;
  if (wallet !== undefined) binding.wallet = wallet.toLowerCase();
  return binding;
}

function compareRefs(a: SlotRef, b: SlotRef): number {
  return a.chain.localeCompare(b.chain) || a.market.localeCompare(b.market) || a.slotId - b.slotId;
}

export class RuntimeInventory {
  private readonly logger: Logger;

  constructor(private readonly deps: InventoryDeps) {
    this.logger = deps.logger ?? noopLogger;
  }

  get naming(): SlotNaming {
    return this.deps.naming;
  }

  async listRunningInstances(filter: InventoryFilter = {}): Promise<InventorySnapshot> {
    const { containers, sessions, workspaces, naming } = this.deps;
    const [running, networks, liveSessions] = await Promise.all([
      containers.listContainers(),
      containers.listNetworks(),
      sessions ? sessions.listSessions() : Promise.resolve<SessionRef[]>([]),
    ]);

    const networkByName = new Map(networks.map((n) => [n.name, n]));
    const sessionByName = new Map<string, SessionRef>();
    const parsedSessions: Array<SessionRef & ParsedName> = [];
    const unparsed: string[] = [];

    for (const session of liveSessions) {
      const parsed = naming.parse(session.name);
      if (!parsed) {
        if (naming.owns(session.name)) unparsed.push(session.name);
        continue;
      }
      if (parsed.role !== undefined) continue;
      sessionByName.set(session.name, session);
      if (matchesFilter(parsed, filter)) parsedSessions.push({ ...parsed, ...session });
    }

    const instances: RuntimeInstance[] = [];
    for (const container of running) {
      if (!LIVE_STATES.has(container.state)) continue;
      const parsed = naming.parse(container.name);
      if (!parsed) {
        if (naming.owns(container.name)) unparsed.push(container.name);
        continue;
      }
      // Auxiliary containers belong to their slot's main instance
      if (parsed.role !== undefined) continue;
      if (!matchesFilter(parsed, filter)) continue;

      const instance: RuntimeInstance = {
        slotId: parsed.slotId,
        chain: parsed.chain,
        market: parsed.market,
        name: container.name,
        containerId: container.id,
        state: container.state,
        ports: [...container.ports].sort((a, b) => a - b),
        workspaceDir: workspaces.pathFor(container.name),
      };
      const network = networkByName.get(container.name);
      if (network) {
        instance.network = network.name;
        if (network.subnet) instance.subnet = network.subnet;
      }
      const session = sessionByName.get(container.name);
      if (session) instance.session = { name: session.name, pid: session.pid };
      const binding = bindingOf(container);
      if (binding) instance.binding = binding;
      instances.push(instance);
    }

    if (unparsed.length > 0) {
      this.logger.warn('Found resources with the workload prefix that do not parse', { names: unparsed });
    }

    instances.sort(compareRefs);
    parsedSessions.sort(compareRefs);
    return { instances, unparsed: unparsed.sort(), sessions: parsedSessions };
  }

  /** The live instance for one slot, if any */
  async find(ref: SlotRef): Promise<RuntimeInstance | null> {
    const { instances } = await this.listRunningInstances({
      chain: ref.chain,
      market: ref.market,
      slotId: ref.slotId,
    });
    return instances[0] ?? null;
  }
}
