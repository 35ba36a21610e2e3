/**
 * Chain catalog schema
 *
 * The catalog lists the chains a wallet can hold slots on, where to query
 * ownership, and which workload image each market runs.
 */

import { z } from 'zod';
import { DEFAULT_WORKLOAD } from '../constants';

const IdentifierKey = z.string().regex(/^[a-z0-9]+$/, 'Lowercase letters and digits only');

export const MarketConfigSchema = z.object({
  sourceChain: z.string().min(1),
  image: z.string().min(1),
});

export const ChainConfigSchema = z.object({
  rpcUrl: z.string().url(),
  protocolStateContract: z.string().regex(/^0x[0-9a-fA-F]{40}$/),
  workload: z.string().regex(/^[a-z][a-z0-9-]*[a-z0-9]$/).default(DEFAULT_WORKLOAD),
  markets: z.record(IdentifierKey, MarketConfigSchema),
});

export const ChainCatalogSchema = z.object({
  chains: z.record(IdentifierKey, ChainConfigSchema),
});

export type MarketConfig = z.output<typeof MarketConfigSchema>;
export type ChainConfig = z.output<typeof ChainConfigSchema>;
export type ChainCatalog = z.output<typeof ChainCatalogSchema>;
