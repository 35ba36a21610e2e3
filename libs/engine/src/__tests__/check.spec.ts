import { LedgerUnreachableError } from '@slotwarden/ipc';
import type { ProfileScope } from '@slotwarden/ipc';
import { buildCheckReport, buildDeployHint, check } from '../check';
import { RuntimeInventory } from '../inventory';
import { OwnershipResolver } from '../ledger/resolver';
import { SlotNaming } from '../naming';
import { WALLET } from './helpers/context';
import { FakeContainerRuntime, FakeLedger, FakeSessionRuntime, FakeWorkspaceStore, labelsFor } from './helpers/fakes';

const n = (slotId: number, market = 'uniswapv2') => `snapshotter-lite-v2-${slotId}-mainnet-${market}`;

describe('check', () => {
  let containers: FakeContainerRuntime;
  let sessions: FakeSessionRuntime;
  let ledger: FakeLedger;
  let inventory: RuntimeInventory;
  let resolver: OwnershipResolver;

  beforeEach(() => {
    containers = new FakeContainerRuntime();
    sessions = new FakeSessionRuntime();
    ledger = new FakeLedger();
    inventory = new RuntimeInventory({
      containers,
      sessions,
      workspaces: new FakeWorkspaceStore(),
      naming: new SlotNaming(),
    });
    resolver = new OwnershipResolver(ledger, { timeoutMs: 50 });
  });

  it('reports running, missing and orphaned slots with session drift', async () => {
    ledger.owned.set(WALLET, [1n, 2n, 3n, 7n]);
    containers.addContainer(n(2), { labels: labelsFor('default', WALLET, 2) });
    containers.addContainer(n(9));
    sessions.add(n(2));
    sessions.add(n(3));

    const result = await check({ resolver, inventory }, { profile: 'default', wallet: WALLET, chain: 'mainnet', market: 'uniswapv2' });

    expect(result).toEqual({
      ok: true,
      report: {
        profile: 'default',
        wallet: WALLET,
        chain: 'mainnet',
        market: 'uniswapv2',
        ownedCount: 4,
        runningCount: 1,
        running: [2],
        notRunning: [1, 3, 7],
        orphaned: [9],
        coverage: 25,
        deployHint: 'slotwarden deploy --chain mainnet --market uniswapv2 --slot 1,3,7 --profile default',
        containersWithoutSessions: [9],
        sessionsWithoutContainers: [3],
        unparsed: [],
      },
    });
  });

  it('passes an unreachable ledger through instead of reporting zero slots', async () => {
    ledger.error = new Error('timeout');
    const result = await check({ resolver, inventory }, { profile: 'default', wallet: WALLET, chain: 'mainnet' });
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error).toBeInstanceOf(LedgerUnreachableError);
  });

  it('reports full coverage without a deploy hint', async () => {
    ledger.owned.set(WALLET, [4n]);
    containers.addContainer(n(4, 'aavev3'));

    const result = await check({ resolver, inventory }, { profile: 'default', wallet: WALLET, chain: 'mainnet' });
    expect(result.ok && result.report.coverage).toBe(100);
    expect(result.ok && result.report.deployHint).toBeUndefined();
    expect(result.ok && result.report.market).toBeUndefined();
  });
});

describe('buildCheckReport', () => {
  const scope: ProfileScope = { profile: 'work', wallet: WALLET, chain: 'mainnet', market: 'uniswapv2' };

  it('has no coverage figure when nothing is owned', () => {
    const report = buildCheckReport({ scope, owned: [], snapshot: { instances: [], unparsed: [], sessions: [] } });
    expect(report.coverage).toBeNull();
    expect(report.ownedCount).toBe(0);
  });

  it('never truncates the not-running list', () => {
    const owned = Array.from({ length: 300 }, (_, i) => i);
    const report = buildCheckReport({ scope, owned, snapshot: { instances: [], unparsed: [], sessions: [] } });
    expect(report.notRunning).toHaveLength(300);
    expect(report.deployHint).toBe('slotwarden deploy --chain mainnet --market uniswapv2 --slot 0-299 --profile work');
  });
});

describe('buildDeployHint', () => {
  it('uses a placeholder market for chain-wide reports', () => {
    expect(buildDeployHint({ profile: 'default', wallet: WALLET, chain: 'mainnet' }, [5, 6])).toBe(
      'slotwarden deploy --chain mainnet --market <market> --slot 5-6 --profile default',
    );
  });
});
