import type { ChainConfig, ConfigBundle, MarketConfig } from '@slotwarden/ipc';
import type { DeployContext } from '../../deploy/executor';

export const WALLET = '0x1111111111111111111111111111111111111111';
export const SIGNER = '0x2222222222222222222222222222222222222222';
export const SIGNER_KEY = '0x' + 'ab'.repeat(32);

export const market: MarketConfig = { sourceChain: 'ETH-MAINNET', image: 'example/snapshotter-lite:latest' };

export const chainConfig: ChainConfig = {
  rpcUrl: 'https://ledger.invalid/rpc',
  protocolStateContract: '0x3333333333333333333333333333333333333333',
  workload: 'snapshotter-lite-v2',
  markets: { uniswapv2: market },
};

export function bundle(overrides: Partial<ConfigBundle> = {}): ConfigBundle {
  return {
    walletAddress: WALLET,
    signerAddress: SIGNER,
    signerPrivateKey: SIGNER_KEY,
    sourceRpcUrl: 'https://source.invalid/rpc',
    extraEnv: {},
    ...overrides,
  };
}

export function deployContext(overrides: Partial<DeployContext> = {}): DeployContext {
  return { profile: 'default', bundle: bundle(), chainConfig, marketConfig: market, ...overrides };
}
