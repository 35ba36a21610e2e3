/**
 * Chain catalog loader
 *
 * Reads the YAML catalog (bundled `config/chains.yaml`, or the file named
 * by SLOTWARDEN_CHAINS_FILE) and validates it with zod.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { parse as parseYaml } from 'yaml';
import { ChainCatalogSchema, ENV_KEYS, InvalidInputError, describeError } from '@slotwarden/ipc';
import type { ChainCatalog, ChainConfig, MarketConfig } from '@slotwarden/ipc';

export const BUNDLED_CATALOG = path.resolve(__dirname, '..', '..', 'config', 'chains.yaml');

export function catalogPath(env: NodeJS.ProcessEnv = process.env): string {
  return env[ENV_KEYS.CHAINS_FILE] || BUNDLED_CATALOG;
}

export function parseChainCatalog(source: string, origin = 'chain catalog'): ChainCatalog {
  let raw: unknown;
  try {
    raw = parseYaml(source);
  } catch (err) {
    throw new InvalidInputError(`${origin} is not valid YAML: ${describeError(err)}`, 'catalog');
  }

  const result = ChainCatalogSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.map(String).join('.') || '(root)'}: ${i.message}`);
    throw new InvalidInputError(`${origin} is invalid: ${issues.join('; ')}`, 'catalog');
  }
  return result.data;
}

export function loadChainCatalog(file: string): ChainCatalog {
  let source: string;
  try {
    source = fs.readFileSync(file, 'utf-8');
  } catch (err) {
    throw new InvalidInputError(`Cannot read chain catalog ${file}: ${describeError(err)}`, 'catalog');
  }
  return parseChainCatalog(source, file);
}

export function lookupChain(catalog: ChainCatalog, chain: string): ChainConfig {
  const config = catalog.chains[chain];
  if (!config) {
    const known = Object.keys(catalog.chains).sort().join(', ');
    throw new InvalidInputError(`Unknown chain "${chain}" (known: ${known})`, 'chain');
  }
  return config;
}

export function lookupMarket(
  catalog: ChainCatalog,
  chain: string,
  market: string,
): { chainConfig: ChainConfig; marketConfig: MarketConfig } {
  const chainConfig = lookupChain(catalog, chain);
  const marketConfig = chainConfig.markets[market];
  if (!marketConfig) {
    const known = Object.keys(chainConfig.markets).sort().join(', ');
    throw new InvalidInputError(`Unknown market "${market}" on ${chain} (known: ${known})`, 'market');
  }
  return { chainConfig, marketConfig };
}
