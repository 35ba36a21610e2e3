/**
 * Command context
 *
 * Opens the profile database, loads the chain catalog and builds the
 * runtime adapters a command needs. Commands receive a factory so tests can
 * swap in fakes.
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { CONFIG_DIR, DB_FILENAME, ENV_KEYS, WORKSPACES_DIR } from '@slotwarden/ipc';
import type { ChainCatalog, Logger } from '@slotwarden/ipc';
import { ProfileStore, Storage } from '@slotwarden/storage';
import {
  DeploymentExecutor,
  DockerCliRuntime,
  EthersSlotLedger,
  FsWorkspaceStore,
  OwnershipResolver,
  ResourceAllocator,
  RuntimeInventory,
  ScreenSessionRuntime,
  SlotNaming,
  tcpPortProbe,
} from '@slotwarden/engine';
import type { ContainerRuntime, PortProbe, SessionRuntime, SlotLedger, WorkspaceStore } from '@slotwarden/engine';
import { catalogPath, lookupChain, loadChainCatalog } from './catalog';
import { createCliLogger, resolveLogLevel } from './logger';

export interface CliPaths {
  home: string;
  dbPath: string;
  workspaceRoot: string;
  chainsFile: string;
}

export function resolvePaths(env: NodeJS.ProcessEnv = process.env): CliPaths {
  const home = env[ENV_KEYS.HOME] || path.join(os.homedir(), CONFIG_DIR);
  return {
    home,
    dbPath: path.join(home, DB_FILENAME),
    workspaceRoot: env[ENV_KEYS.WORKSPACE_ROOT] || path.join(home, WORKSPACES_DIR),
    chainsFile: catalogPath(env),
  };
}

export interface AppContext {
  logger: Logger;
  profiles: ProfileStore;
  catalog: ChainCatalog;
  containers: ContainerRuntime;
  sessions: SessionRuntime;
  workspaces: WorkspaceStore;
  /** Host port check used during allocation */
  portProbe?: PortProbe;
  /** Ledger client, optionally pointed at a profile's own RPC endpoint */
  ledgerFor(rpcUrl?: string): SlotLedger;
  close(): void;
}

export type ContextFactory = () => AppContext;

/** Program-wide flags that shape the context */
export interface ContextOptions {
  verbose?: boolean;
}

export type ContextOpener = (options: ContextOptions) => AppContext;

export function openContext(env: NodeJS.ProcessEnv = process.env, options: ContextOptions = {}): AppContext {
  const paths = resolvePaths(env);
  const logger = createCliLogger(resolveLogLevel(env, options.verbose === true));
  const catalog = loadChainCatalog(paths.chainsFile);

  fs.mkdirSync(paths.home, { recursive: true, mode: 0o700 });
  const storage = Storage.open(paths.dbPath);
  const profiles = new ProfileStore(storage, env);
  profiles.ensureDefault();

  logger.debug('Context opened', { home: paths.home, chainsFile: paths.chainsFile });
  return {
    logger,
    profiles,
    catalog,
    containers: new DockerCliRuntime(),
    sessions: new ScreenSessionRuntime(),
    workspaces: new FsWorkspaceStore(paths.workspaceRoot),
    portProbe: tcpPortProbe,
    ledgerFor: (rpcUrl) =>
      new EthersSlotLedger((chain) => {
        const config = catalog.chains[chain];
        if (!config) return undefined;
        return { rpcUrl: rpcUrl ?? config.rpcUrl, protocolStateContract: config.protocolStateContract };
      }),
    close: () => storage.close(),
  };
}

/**
 * Engine components for one chain. The workload literal (and so the naming
 * convention) is per chain.
 */
export function engineFor(ctx: AppContext, chain: string, ledgerRpcUrl?: string) {
  const naming = new SlotNaming(lookupChain(ctx.catalog, chain).workload);
  const { containers, sessions, workspaces, logger } = ctx;
  const inventory = new RuntimeInventory({ containers, sessions, workspaces, naming, logger });
  const allocator = new ResourceAllocator(containers, { probe: ctx.portProbe, logger });
  return {
    inventory,
    resolver: new OwnershipResolver(ctx.ledgerFor(ledgerRpcUrl), { logger }),
    executor: new DeploymentExecutor({ containers, sessions, workspaces, inventory, allocator, logger }),
  };
}

/** Open a context, run `fn`, always close. */
export async function withContext<T>(factory: ContextFactory, fn: (ctx: AppContext) => Promise<T>): Promise<T> {
  const ctx = factory();
  try {
    return await fn(ctx);
  } finally {
    ctx.close();
  }
}
