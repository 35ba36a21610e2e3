/**
 * Docker CLI adapter
 *
 * Implements ContainerRuntime by shelling out to the `docker` binary. Listing
 * uses `--format '{{json .}}'` so each line is one JSON record.
 */

import { z } from 'zod';
import { TIMEOUTS } from '@slotwarden/ipc';
import type { ContainerState } from '@slotwarden/ipc';
import { runCommand } from './exec';
import type { CommandRunner } from './exec';
import type {
  ContainerRuntime,
  ContainerStartSpec,
  ContainerSummary,
  ListContainersOptions,
  NetworkSummary,
} from './types';

const PsLineSchema = z.object({
  ID: z.string(),
  Names: z.string(),
  State: z.string(),
  Ports: z.string().default(''),
  Labels: z.string().default(''),
  Networks: z.string().default(''),
});

const CONTAINER_STATES: readonly ContainerState[] = [
  'created',
  'running',
  'paused',
  'restarting',
  'removing',
  'exited',
  'dead',
];

function toState(raw: string): ContainerState {
  const state = CONTAINER_STATES.find((s) => s === raw.toLowerCase());
  return state ?? 'unknown';
}

/**
 * Host ports from the `Ports` column: `0.0.0.0:8002->8002/tcp` → [8002];
 * collapsed ranges such as `0.0.0.0:8000-8003->8000-8003/tcp` are expanded.
 */
export function parsePublishedPorts(raw: string): number[] {
  const ports = new Set<number>();
  for (const m of raw.matchAll(/:(\d+)(?:-(\d+))?->/g)) {
    const first = Number(m[1]);
    const last = m[2] === undefined ? first : Number(m[2]);
    if (last < first || last > 65535) continue;
    for (let p = first; p <= last; p++) ports.add(p);
  }
  return [...ports].sort((a, b) => a - b);
}

/** `a=1,b=2` → { a: '1', b: '2' } */
export function parseLabels(raw: string): Record<string, string> {
  const labels: Record<string, string> = {};
  for (const pair of raw.split(',')) {
    const eq = pair.indexOf('=');
    if (eq <= 0) continue;
    labels[pair.slice(0, eq)] = pair.slice(eq + 1);
  }
  return labels;
}

export function parsePsOutput(stdout: string): ContainerSummary[] {
  const containers: ContainerSummary[] = [];
  for (const line of stdout.split('\n')) {
    if (!line.trim()) continue;
    const row = PsLineSchema.parse(JSON.parse(line));
    containers.push({
      id: row.ID,
      name: row.Names.split(',')[0],
      state: toState(row.State),
      ports: parsePublishedPorts(row.Ports),
      labels: parseLabels(row.Labels),
      networks: row.Networks ? row.Networks.split(',') : [],
    });
  }
  return containers;
}

export interface DockerCliOptions {
  binary?: string;
  timeoutMs?: number;
  run?: CommandRunner;
}

export class DockerCliRuntime implements ContainerRuntime {
  private readonly binary: string;
  private readonly timeoutMs: number;
  private readonly run: CommandRunner;

  constructor(options: DockerCliOptions = {}) {
    this.binary = options.binary ?? 'docker';
    this.timeoutMs = options.timeoutMs ?? TIMEOUTS.RUNTIME_CALL_MS;
    this.run = options.run ?? runCommand;
  }

  private docker(args: string[], timeoutMs = this.timeoutMs) {
    return this.run(this.binary, args, { timeoutMs });
  }

  async ping(): Promise<void> {
    await this.docker(['info', '--format', '{{.ServerVersion}}']);
  }

  async listContainers(options: ListContainersOptions = {}): Promise<ContainerSummary[]> {
    const args = ['ps', '--no-trunc', '--format', '{{json .}}'];
    if (options.all) args.splice(1, 0, '-a');
    const { stdout } = await this.docker(args);
    return parsePsOutput(stdout);
  }

  async startContainer(spec: ContainerStartSpec): Promise<string> {
    const args = ['run', '-d', '--name', spec.name, '--env-file', spec.envFile, '--network', spec.network];
    for (const p of spec.ports) {
      args.push('-p', `${p.host}:${p.container}`);
    }
    for (const [key, value] of Object.entries(spec.labels)) {
      args.push('--label', `${key}=${value}`);
    }
    args.push('--restart', 'unless-stopped', spec.image);
    const { stdout } = await this.docker(args);
    return stdout.trim();
  }

  async stopContainer(ref: string, timeoutSec: number): Promise<void> {
    await this.docker(['stop', '--time', String(timeoutSec), ref], timeoutSec * 1000 + TIMEOUTS.STOP_SLACK_MS);
  }

  async killContainer(ref: string): Promise<void> {
    await this.docker(['kill', ref]);
  }

  async removeContainer(ref: string): Promise<void> {
    await this.docker(['rm', '-f', ref]);
  }

  async listNetworks(): Promise<NetworkSummary[]> {
    const { stdout } = await this.docker(['network', 'ls', '--format', '{{.Name}}']);
    const names = stdout.split('\n').map((l) => l.trim()).filter(Boolean);
    if (names.length === 0) return [];

    const inspected = await this.docker([
      'network',
      'inspect',
      '--format',
      '{{.Name}}|{{range .IPAM.Config}}{{.Subnet}} {{end}}',
      ...names,
    ]);
    return parseNetworkInspect(inspected.stdout);
  }

  async createNetwork(name: string, subnet: string): Promise<void> {
    await this.docker(['network', 'create', '--subnet', subnet, name]);
  }

  async removeNetwork(name: string): Promise<void> {
    await this.docker(['network', 'rm', name]);
  }
}

/** `name|172.18.3.0/24 ` lines → summaries */
export function parseNetworkInspect(stdout: string): NetworkSummary[] {
  const networks: NetworkSummary[] = [];
  for (const line of stdout.split('\n')) {
    if (!line.trim()) continue;
    const [name, subnets = ''] = line.split('|');
    const subnet = subnets.trim().split(/\s+/).find(Boolean);
    networks.push(subnet ? { name: name.trim(), subnet } : { name: name.trim() });
  }
  return networks;
}
