/**
 * Slotwarden Engine
 *
 * Ownership resolution, runtime inventory, reconciliation, deployment and
 * teardown of slot instances.
 *
 * @packageDocumentation
 */

export { SlotNaming } from './naming';
export { Mutex, KeyedMutex } from './mutex';
export { runPool } from './pool';
export type { PoolResult, PoolOptions } from './pool';
export { withTimeout } from './timeout';

// Runtime adapters
export type {
  ContainerRuntime,
  ContainerSummary,
  ContainerStartSpec,
  ListContainersOptions,
  NetworkSummary,
  PortMapping,
  SessionRuntime,
  WorkspaceEntry,
  WorkspaceStore,
} from './runtime/types';
export { runCommand } from './runtime/exec';
export type { CommandRunner, RunOptions, RunResult } from './runtime/exec';
export { DockerCliRuntime } from './runtime/docker';
export type { DockerCliOptions } from './runtime/docker';
export { ScreenSessionRuntime } from './runtime/screen';
export type { ScreenOptions } from './runtime/screen';
export { FsWorkspaceStore } from './runtime/workspace';

// Ownership
export { EthersSlotLedger } from './ledger/ledger';
export type { SlotLedger, LedgerEndpoint } from './ledger/ledger';
export { OwnershipResolver } from './ledger/resolver';
export type { OwnershipResolution, OwnershipResolverOptions } from './ledger/resolver';

// Inventory & planning
export { RuntimeInventory, matchesFilter } from './inventory';
export type { InventoryDeps } from './inventory';
export { plan, bindingMatches } from './reconciler';
export type { PlanInput } from './reconciler';

// Deployment
export { ResourceAllocator, tcpPortProbe, usedOctets } from './allocator';
export type { Allocation, AllocatorOptions, PortProbe } from './allocator';
export { buildWorkloadEnv, renderEnvFile } from './deploy/env-file';
export type { EnvEntries, WorkloadEnvInput } from './deploy/env-file';
export { DeploymentExecutor } from './deploy/executor';
export type {
  DeployResult,
  DeployContext,
  DeployManyOptions,
  DeployFailure,
  DeployBatchResult,
  ExecutorDeps,
} from './deploy/executor';

// Teardown
export { TeardownEngine, NETWORK_ADVISORY, CANCELLED, isInstanceHandle } from './teardown/engine';
export type { TeardownOptions, TeardownDeps } from './teardown/engine';
export { discoverResources, handlesFor, subnetUsage, isEmpty, FREE_SUBNETS_SHOWN } from './teardown/discovery';
export type { DiscoveredResources, DiscoveryDeps, SubnetUsage } from './teardown/discovery';

// Reporting
export { check, buildCheckReport, buildDeployHint } from './check';
export type { CheckReport, CheckReportInput, CheckResult, CheckDeps, CheckArgs } from './check';
