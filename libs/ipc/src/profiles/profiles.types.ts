/**
 * Profile domain types
 *
 * A Profile is a named, isolated set of credentials. It holds at most one
 * ConfigBundle per (chain, market), so several wallet/market combinations
 * can coexist on one host.
 */

export interface Profile {
  name: string;
  description?: string;
  createdAt: string;
  updatedAt: string;
}

export interface ProfileSummary extends Profile {
  isDefault: boolean;
  isLastUsed: boolean;
  bundleCount: number;
}

export interface ConfigBundle {
  walletAddress: string;
  signerAddress: string;
  signerPrivateKey: string;
  sourceRpcUrl: string;
  ledgerRpcUrl?: string;
  telegramChatId?: string;
  telegramReportingUrl?: string;
  maxStreamPoolSize?: number;
  connectionRefreshInterval?: number;
  /** Extra variables passed through to the workload verbatim */
  extraEnv: Record<string, string>;
}

export interface StoredBundle {
  profile: string;
  chain: string;
  market: string;
  bundle: ConfigBundle;
  updatedAt: string;
}

/** Where the active profile came from */
export type ProfileSource = 'explicit' | 'env' | 'default' | 'last-used' | 'fallback';

export interface ActiveProfile {
  name: string;
  source: ProfileSource;
}
