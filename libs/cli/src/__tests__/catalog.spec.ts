import { DEFAULT_WORKLOAD, InvalidInputError } from '@slotwarden/ipc';
import { BUNDLED_CATALOG, catalogPath, loadChainCatalog, lookupMarket, parseChainCatalog } from '../utils/catalog';

const YAML = `
chains:
  devnet:
    rpcUrl: https://ledger.invalid/rpc
    protocolStateContract: "0x3333333333333333333333333333333333333333"
    markets:
      uniswapv2:
        sourceChain: ETH
        image: example/snapshotter:1
`;

describe('chain catalog', () => {
  it('loads the bundled catalog', () => {
    const catalog = loadChainCatalog(BUNDLED_CATALOG);
    expect(catalog.chains.mainnet.workload).toBe('snapshotter-lite-v2');
    expect(Object.keys(catalog.chains.mainnet.markets).sort()).toEqual(['aavev3', 'uniswapv2']);
  });

  it('fills in the default workload', () => {
    expect(parseChainCatalog(YAML).chains.devnet.workload).toBe(DEFAULT_WORKLOAD);
  });

  it('reports schema problems with their path', () => {
    const broken = YAML.replace('https://ledger.invalid/rpc', 'not a url');
    expect(() => parseChainCatalog(broken, 'test.yaml')).toThrow(/^test\.yaml is invalid: chains\.devnet\.rpcUrl: /);
  });

  it('rejects malformed YAML', () => {
    expect(() => parseChainCatalog('chains: [')).toThrow(InvalidInputError);
  });

  it('rejects a missing file', () => {
    expect(() => loadChainCatalog('/nonexistent/chains.yaml')).toThrow(/Cannot read chain catalog/);
  });

  it('looks up markets and names the known ones on a miss', () => {
    const catalog = parseChainCatalog(YAML);
    expect(lookupMarket(catalog, 'devnet', 'uniswapv2').marketConfig.image).toBe('example/snapshotter:1');
    expect(() => lookupMarket(catalog, 'devnet', 'aavev3')).toThrow('Unknown market "aavev3" on devnet (known: uniswapv2)');
    expect(() => lookupMarket(catalog, 'mainnet', 'aavev3')).toThrow('Unknown chain "mainnet" (known: devnet)');
  });

  it('honors the catalog override variable', () => {
    expect(catalogPath({ SLOTWARDEN_CHAINS_FILE: '/etc/chains.yaml' })).toBe('/etc/chains.yaml');
    expect(catalogPath({})).toBe(BUNDLED_CATALOG);
  });
});
