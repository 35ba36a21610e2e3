import type { ProfileScope, RuntimeInstance, SlotRef } from '@slotwarden/ipc';
import { plan } from '../reconciler';

const WALLET = '0x1111111111111111111111111111111111111111';
const scope: ProfileScope = { profile: 'default', wallet: WALLET, chain: 'mainnet', market: 'uniswapv2' };

function instance(slotId: number, overrides: Partial<RuntimeInstance> = {}): RuntimeInstance {
  const ref: SlotRef = { slotId, chain: 'mainnet', market: 'uniswapv2' };
  return {
    ...ref,
    name: `snapshotter-lite-v2-${slotId}-${ref.chain}-${ref.market}`,
    containerId: `c${slotId}`,
    state: 'running',
    ports: [],
    workspaceDir: `/ws/${slotId}`,
    ...overrides,
  };
}

describe('plan', () => {
  it('starts owned slots that are not running when all are requested', () => {
    expect(plan({ owned: [1, 2, 3], requested: 'all', running: [instance(2)], scope })).toEqual({
      toStart: [1, 3],
      alreadyRunning: [2],
      orphaned: [],
      unownedRequested: [],
    });
  });

  it('separates unowned requests from every other bucket', () => {
    const result = plan({ owned: [1, 2], requested: [2, 5], running: [instance(5)], scope });
    expect(result).toEqual({ toStart: [2], alreadyRunning: [], orphaned: [], unownedRequested: [5] });
  });

  it('reports running slots no longer owned as orphaned', () => {
    const result = plan({ owned: [1], requested: 'all', running: [instance(1), instance(9)], scope });
    expect(result.orphaned).toEqual([9]);
    expect(result.alreadyRunning).toEqual([1]);
  });

  it('counts owned running slots outside the request as already running', () => {
    const result = plan({ owned: [1, 2, 3], requested: [1], running: [instance(3)], scope });
    expect(result).toEqual({ toStart: [1], alreadyRunning: [3], orphaned: [], unownedRequested: [] });
  });

  it('ignores instances on other chains and markets', () => {
    const result = plan({
      owned: [1],
      requested: 'all',
      running: [instance(1, { market: 'aavev3' }), instance(7, { chain: 'devnet' })],
      scope,
    });
    expect(result).toEqual({ toStart: [1], alreadyRunning: [], orphaned: [], unownedRequested: [] });
  });

  it('looks across markets when the scope names none', () => {
    const chainWide: ProfileScope = { profile: 'default', wallet: WALLET, chain: 'mainnet' };
    const result = plan({ owned: [1], requested: 'all', running: [instance(1, { market: 'aavev3' })], scope: chainWide });
    expect(result.alreadyRunning).toEqual([1]);
  });

  describe('foreign bindings', () => {
    const foreign = instance(4, { binding: { profile: 'work', wallet: WALLET } });

    it('orphans an owned slot bound to another profile by default', () => {
      const result = plan({ owned: [4], requested: 'all', running: [foreign], scope });
      expect(result).toEqual({ toStart: [], alreadyRunning: [], orphaned: [4], unownedRequested: [] });
    });

    it('adopts it under the adopt policy', () => {
      const result = plan({ owned: [4], requested: 'all', running: [foreign], scope, foreignBinding: 'adopt' });
      expect(result.alreadyRunning).toEqual([4]);
      expect(result.orphaned).toEqual([]);
    });

    it('matches wallets case-insensitively', () => {
      const upper = instance(4, { binding: { profile: 'default', wallet: WALLET.toUpperCase().replace('0X', '0x') } });
      expect(plan({ owned: [4], requested: 'all', running: [upper], scope }).alreadyRunning).toEqual([4]);
    });
  });

  it('produces disjoint, sorted buckets', () => {
    const result = plan({
      owned: [9, 3, 1, 7],
      requested: [9, 1, 1, 12, 7],
      running: [instance(7), instance(15), instance(3)],
      scope,
    });
    expect(result).toEqual({ toStart: [1, 9], alreadyRunning: [3, 7], orphaned: [15], unownedRequested: [12] });
    const all = [...result.toStart, ...result.alreadyRunning, ...result.orphaned, ...result.unownedRequested];
    expect(new Set(all).size).toBe(all.length);
  });
});
