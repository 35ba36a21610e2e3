/**
 * Resource discovery for `diagnose`
 *
 * Finds every container (any state), network, session and workspace whose
 * name parses under the naming grammar, optionally narrowed to one slot,
 * chain or market, plus the subnet usage of the whole host.
 */

import { SUBNET_OCTETS, SUBNET_PREFIX } from '@slotwarden/ipc';
import type { InventoryFilter, ParsedName, ResourceHandle, ResourceKind, SessionRef } from '@slotwarden/ipc';
import { usedOctets } from '../allocator';
import { matchesFilter } from '../inventory';
import type { SlotNaming } from '../naming';
import type { ContainerRuntime, ContainerSummary, NetworkSummary, SessionRuntime, WorkspaceEntry, WorkspaceStore } from '../runtime/types';

export const FREE_SUBNETS_SHOWN = 5;

export interface SubnetUsage {
  used: number[];
  /** First few free `<prefix>.X.0/24` blocks */
  available: string[];
}

export interface DiscoveredResources {
  containers: Array<ContainerSummary & { parsed: ParsedName }>;
  networks: Array<NetworkSummary & { parsed: ParsedName }>;
  sessions: Array<SessionRef & { parsed: ParsedName }>;
  workspaces: Array<WorkspaceEntry & { parsed: ParsedName }>;
  unparsed: string[];
  subnets: SubnetUsage;
}

export interface DiscoveryDeps {
  containers: ContainerRuntime;
  sessions?: SessionRuntime;
  workspaces: WorkspaceStore;
  naming: SlotNaming;
}

export function subnetUsage(networks: readonly NetworkSummary[], prefix = SUBNET_PREFIX, octets = SUBNET_OCTETS): SubnetUsage {
  const used = usedOctets(networks, prefix);
  const taken = new Set(used);
  const available: string[] = [];
  for (let x = 0; x < octets && available.length < FREE_SUBNETS_SHOWN; x++) {
    if (!taken.has(x)) available.push(`${prefix}.${x}.0/24`);
  }
  return { used, available };
}

export async function discoverResources(deps: DiscoveryDeps, filter: InventoryFilter = {}): Promise<DiscoveredResources> {
  const { naming } = deps;
  const [containers, networks, sessions, workspaces] = await Promise.all([
    deps.containers.listContainers({ all: true }),
    deps.containers.listNetworks(),
    deps.sessions ? deps.sessions.listSessions() : Promise.resolve<SessionRef[]>([]),
    deps.workspaces.list(),
  ]);

  const unparsed = new Set<string>();
  const pick = <T extends { name: string }>(items: readonly T[]): Array<T & { parsed: ParsedName }> => {
    const matched: Array<T & { parsed: ParsedName }> = [];
    for (const item of items) {
      const parsed = naming.parse(item.name);
      if (!parsed) {
        if (naming.owns(item.name)) unparsed.add(item.name);
        continue;
      }
      if (matchesFilter(parsed, filter)) matched.push({ ...item, parsed });
    }
    return matched.sort((a, b) => a.name.localeCompare(b.name));
  };

  return {
    containers: pick(containers),
    networks: pick(networks),
    sessions: pick(sessions),
    workspaces: pick(workspaces),
    unparsed: [...unparsed].sort(),
    subnets: subnetUsage(networks),
  };
}

/** Handles for the confirmed categories, in teardown-friendly order */
export function handlesFor(resources: DiscoveredResources, kinds: readonly ResourceKind[]): ResourceHandle[] {
  const wanted = new Set(kinds);
  const handles: ResourceHandle[] = [];
  if (wanted.has('container')) {
    for (const c of resources.containers) handles.push({ kind: 'container', name: c.name, id: c.id });
  }
  if (wanted.has('session')) {
    for (const s of resources.sessions) handles.push({ kind: 'session', name: s.name, pid: s.pid });
  }
  if (wanted.has('network')) {
    for (const n of resources.networks) handles.push({ kind: 'network', name: n.name });
  }
  if (wanted.has('workspace')) {
    for (const w of resources.workspaces) handles.push({ kind: 'workspace', name: w.name, path: w.path });
  }
  return handles;
}

export function isEmpty(resources: DiscoveredResources): boolean {
  return (
    resources.containers.length === 0 &&
    resources.networks.length === 0 &&
    resources.sessions.length === 0 &&
    resources.workspaces.length === 0
  );
}
