import { SlotNaming } from '../naming';
import { discoverResources, handlesFor, isEmpty, subnetUsage } from '../teardown/discovery';
import { FakeContainerRuntime, FakeSessionRuntime, FakeWorkspaceStore } from './helpers/fakes';

const n = (slotId: number, market = 'uniswapv2') => `snapshotter-lite-v2-${slotId}-mainnet-${market}`;

describe('subnetUsage', () => {
  it('lists used octets and the first five free blocks', () => {
    expect(
      subnetUsage([
        { name: 'a', subnet: '172.18.0.0/24' },
        { name: 'b', subnet: '172.18.2.0/24' },
      ]),
    ).toEqual({
      used: [0, 2],
      available: ['172.18.1.0/24', '172.18.3.0/24', '172.18.4.0/24', '172.18.5.0/24', '172.18.6.0/24'],
    });
  });

  it('counts the blocks a /23 covers', () => {
    expect(subnetUsage([{ name: 'pair', subnet: '172.18.0.0/23' }])).toEqual({
      used: [0, 1],
      available: ['172.18.2.0/24', '172.18.3.0/24', '172.18.4.0/24', '172.18.5.0/24', '172.18.6.0/24'],
    });
  });

  it('has nothing available under a /16', () => {
    const usage = subnetUsage([{ name: 'compose_default', subnet: '172.18.0.0/16' }]);
    expect(usage.used).toHaveLength(256);
    expect(usage.available).toEqual([]);
  });
});

describe('discoverResources', () => {
  let containers: FakeContainerRuntime;
  let sessions: FakeSessionRuntime;
  let workspaces: FakeWorkspaceStore;

  beforeEach(async () => {
    containers = new FakeContainerRuntime();
    sessions = new FakeSessionRuntime();
    workspaces = new FakeWorkspaceStore();

    containers.addContainer(n(1), { id: 'one' });
    containers.addContainer(n(2), { id: 'two', state: 'exited' });
    containers.addContainer(n(3, 'aavev3'), { id: 'three' });
    containers.addContainer('redis');
    containers.addNetwork(n(1), '172.18.0.0/24');
    containers.addNetwork('snapshotter-lite-v2-broken', '172.18.1.0/24');
    sessions.add(n(2));
    await workspaces.materialize(n(1), {});
  });

  const deps = () => ({ containers, sessions, workspaces, naming: new SlotNaming() });

  it('finds containers in any state, networks, sessions and workspaces by name', async () => {
    const found = await discoverResources(deps(), { market: 'uniswapv2' });

    expect(found.containers.map((c) => c.name)).toEqual([n(1), n(2)]);
    expect(found.networks.map((x) => x.name)).toEqual([n(1)]);
    expect(found.sessions.map((s) => s.name)).toEqual([n(2)]);
    expect(found.workspaces.map((w) => w.path)).toEqual([`/ws/${n(1)}`]);
    expect(found.unparsed).toEqual(['snapshotter-lite-v2-broken']);
    expect(found.subnets.used).toEqual([0, 1]);
  });

  it('narrows to one slot', async () => {
    const found = await discoverResources(deps(), { slotId: 3 });
    expect(found.containers.map((c) => c.id)).toEqual(['three']);
    expect(found.networks).toEqual([]);
  });

  it('turns the confirmed categories into handles', async () => {
    const found = await discoverResources(deps(), { market: 'uniswapv2' });

    expect(handlesFor(found, ['network', 'container'])).toEqual([
      { kind: 'container', name: n(1), id: 'one' },
      { kind: 'container', name: n(2), id: 'two' },
      { kind: 'network', name: n(1) },
    ]);
    expect(handlesFor(found, ['session', 'workspace'])).toEqual([
      { kind: 'session', name: n(2), pid: 1000 },
      { kind: 'workspace', name: n(1), path: `/ws/${n(1)}` },
    ]);
  });

  it('reports nothing to clean for an unknown slot', async () => {
    expect(isEmpty(await discoverResources(deps(), { slotId: 99 }))).toBe(true);
  });
});
