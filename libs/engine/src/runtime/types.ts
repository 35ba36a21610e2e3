/**
 * Host runtime contracts
 *
 * The engine talks to containers, detached sessions and workspace
 * directories only through these interfaces. Production adapters shell out
 * to `docker` and `screen`; tests plug in in-process fakes.
 */

import type { ContainerState, SessionRef } from '@slotwarden/ipc';

export interface ContainerSummary {
  id: string;
  name: string;
  state: ContainerState;
  /** Published host ports */
  ports: number[];
  labels: Record<string, string>;
  networks: string[];
}

export interface NetworkSummary {
  name: string;
  /** First IPAM subnet, when the network has one */
  subnet?: string;
}

export interface PortMapping {
  host: number;
  container: number;
}

export interface ContainerStartSpec {
  name: string;
  image: string;
  envFile: string;
  network: string;
  ports: PortMapping[];
  labels: Record<string, string>;
}

export interface ListContainersOptions {
  /** Include stopped containers */
  all?: boolean;
}

export interface ContainerRuntime {
  /** Fails when the runtime daemon is not reachable */
  ping(): Promise<void>;
  listContainers(options?: ListContainersOptions): Promise<ContainerSummary[]>;
  /** Start a detached container and return its id */
  startContainer(spec: ContainerStartSpec): Promise<string>;
  stopContainer(ref: string, timeoutSec: number): Promise<void>;
  killContainer(ref: string): Promise<void>;
  removeContainer(ref: string): Promise<void>;
  listNetworks(): Promise<NetworkSummary[]>;
  createNetwork(name: string, subnet: string): Promise<void>;
  removeNetwork(name: string): Promise<void>;
}

export interface SessionRuntime {
  listSessions(): Promise<SessionRef[]>;
  /** Start a detached session running `command` */
  startSession(name: string, command: string[]): Promise<SessionRef>;
  /** Ask the session to exit */
  quitSession(session: SessionRef): Promise<void>;
  killSession(session: SessionRef): Promise<void>;
}

export interface WorkspaceEntry {
  name: string;
  path: string;
}

export interface WorkspaceStore {
  readonly root: string;
  pathFor(name: string): string;
  /** Write `files` into the named workspace and return its directory */
  materialize(name: string, files: Record<string, string>): Promise<string>;
  list(): Promise<WorkspaceEntry[]>;
  remove(path: string): Promise<void>;
}
