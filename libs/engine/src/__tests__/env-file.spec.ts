import { InvalidInputError } from '@slotwarden/ipc';
import { buildWorkloadEnv, renderEnvFile } from '../deploy/env-file';
import { SIGNER, SIGNER_KEY, WALLET, bundle, chainConfig, market } from './helpers/context';

const slot = { slotId: 12, chain: 'mainnet', market: 'uniswapv2' };
const name = 'snapshotter-lite-v2-12-mainnet-uniswapv2';
const allocation = { slotId: 12, octet: 3, subnet: '172.18.3.0/24', ports: [8008, 8009] };

describe('buildWorkloadEnv', () => {
  it('renders credentials, placement, then sorted extras', () => {
    const env = buildWorkloadEnv({
      slot,
      name,
      bundle: bundle({ telegramChatId: '42', extraEnv: { ZED: 'z', ALPHA: 'a', SLOT_ID: '999' } }),
      chain: chainConfig,
      market,
      allocation,
    });

    expect(renderEnvFile(env)).toBe(
      [
        `WALLET_HOLDER_ADDRESS=${WALLET}`,
        `SIGNER_ACCOUNT_ADDRESS=${SIGNER}`,
        `SIGNER_ACCOUNT_PRIVATE_KEY=${SIGNER_KEY}`,
        'SOURCE_RPC_URL=https://source.invalid/rpc',
        'POWERLOOM_RPC_URL=https://ledger.invalid/rpc',
        'TELEGRAM_CHAT_ID=42',
        'SLOT_ID=12',
        'POWERLOOM_CHAIN=MAINNET',
        'DATA_MARKET=UNISWAPV2',
        'SOURCE_CHAIN=ETH-MAINNET',
        'CORE_API_PORT=8008',
        'LOCAL_COLLECTOR_P2P_PORT=8009',
        `DOCKER_NETWORK_NAME=${name}`,
        'DOCKER_NETWORK_SUBNET=172.18.3.0/24',
        'ALPHA=a',
        'ZED=z',
        '',
      ].join('\n'),
    );
  });

  it('prefers the bundle ledger endpoint over the catalog one', () => {
    const env = buildWorkloadEnv({
      slot,
      name,
      bundle: bundle({ ledgerRpcUrl: 'https://own-node.invalid' }),
      chain: chainConfig,
      market,
      allocation,
    });
    expect(env).toContainEqual(['POWERLOOM_RPC_URL', 'https://own-node.invalid']);
  });
});

describe('renderEnvFile', () => {
  it('rejects multi-line values', () => {
    expect(() => renderEnvFile([['A', 'x\ny']])).toThrow(InvalidInputError);
  });
});
