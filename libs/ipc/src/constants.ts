/**
 * Constants for Slotwarden
 */

// Paths relative to user home directory
/** Configuration directory name */
export const CONFIG_DIR = '.slotwarden';

/** SQLite database file name */
export const DB_FILENAME = 'slotwarden.db';

/** Directory (under the config dir) holding per-slot workspaces */
export const WORKSPACES_DIR = 'workspaces';

/** Environment variable overrides */
export const ENV_KEYS = {
  HOME: 'SLOTWARDEN_HOME',
  PROFILE: 'SLOTWARDEN_PROFILE',
  CHAINS_FILE: 'SLOTWARDEN_CHAINS_FILE',
  WORKSPACE_ROOT: 'SLOTWARDEN_WORKSPACE_ROOT',
  LOG_LEVEL: 'LOG_LEVEL',
} as const;

/** Profile used when nothing else selects one */
export const DEFAULT_PROFILE = 'default';

/** Workload prefix embedded in every container, network, session and workspace name */
export const DEFAULT_WORKLOAD = 'snapshotter-lite-v2';

/** Container labels recording which profile/wallet started an instance */
export const LABELS = {
  PROFILE: 'slotwarden.profile',
  WALLET: 'slotwarden.wallet',
  SLOT: 'slotwarden.slot',
} as const;

/**
 * Subnet allocation: one /24 per slot inside `${SUBNET_PREFIX}.X.0/24`,
 * X in [0, SUBNET_OCTETS).
 */
export const SUBNET_PREFIX = '172.18';
export const SUBNET_OCTETS = 256;

/** Host port allocation: blocks of PORT_BLOCK_SIZE ports from BASE_PORT */
export const BASE_PORT = 8002;
export const PORT_BLOCK_SIZE = 2;
export const MAX_PORT_BLOCKS = 256;

/** Container-side ports the workload listens on, in port-block order */
export const CONTAINER_PORTS = {
  CORE_API: 8002,
  LOCAL_COLLECTOR_P2P: 8001,
} as const;

/** Timeouts (milliseconds unless stated otherwise) */
export const TIMEOUTS = {
  LEDGER_CALL_MS: 15_000,
  RUNTIME_CALL_MS: 30_000,
  /** Graceful stop window handed to the runtime, in seconds */
  STOP_GRACE_SEC: 10,
  /** Slack added on top of the stop window before the exec call is abandoned */
  STOP_SLACK_MS: 5_000,
} as const;

/** Default worker budgets for batch operations */
export const CONCURRENCY = {
  DEPLOY: 4,
  TEARDOWN: 8,
} as const;
