import { LABELS, ResourceAllocationExhaustedError, StartFailureError } from '@slotwarden/ipc';
import type { SlotRef } from '@slotwarden/ipc';
import { ResourceAllocator } from '../allocator';
import { DeploymentExecutor } from '../deploy/executor';
import { RuntimeInventory } from '../inventory';
import { SlotNaming } from '../naming';
import { deployContext, WALLET } from './helpers/context';
import { FakeContainerRuntime, FakeSessionRuntime, FakeWorkspaceStore } from './helpers/fakes';

const ref = (slotId: number): SlotRef => ({ slotId, chain: 'mainnet', market: 'uniswapv2' });
const nameOf = (slotId: number) => `snapshotter-lite-v2-${slotId}-mainnet-uniswapv2`;

describe('DeploymentExecutor', () => {
  let containers: FakeContainerRuntime;
  let sessions: FakeSessionRuntime;
  let workspaces: FakeWorkspaceStore;
  let executor: DeploymentExecutor;

  function build(allocatorOptions = {}) {
    const naming = new SlotNaming();
    const inventory = new RuntimeInventory({ containers, sessions, workspaces, naming });
    const allocator = new ResourceAllocator(containers, allocatorOptions);
    executor = new DeploymentExecutor({ containers, sessions, workspaces, inventory, allocator });
  }

  beforeEach(() => {
    containers = new FakeContainerRuntime();
    sessions = new FakeSessionRuntime();
    workspaces = new FakeWorkspaceStore();
    build();
  });

  describe('ensureRunning', () => {
    it('creates the network, workspace and container for a new slot', async () => {
      const result = await executor.ensureRunning(ref(3), deployContext());

      expect(result).toEqual({
        ok: true,
        started: true,
        instance: {
          slotId: 3,
          chain: 'mainnet',
          market: 'uniswapv2',
          name: nameOf(3),
          containerId: 'c1',
          state: 'running',
          network: nameOf(3),
          subnet: '172.18.0.0/24',
          ports: [8002, 8003],
          workspaceDir: `/ws/${nameOf(3)}`,
          binding: { profile: 'default', wallet: WALLET },
        },
      });
      expect(containers.calls).toEqual([`network-create:${nameOf(3)}`, `start:${nameOf(3)}`]);
      expect(containers.containers.get(nameOf(3))?.labels).toEqual({
        [LABELS.PROFILE]: 'default',
        [LABELS.WALLET]: WALLET,
        [LABELS.SLOT]: '3',
      });
      expect(workspaces.files.get(nameOf(3))?.['.env']).toContain('SLOT_ID=3\n');
    });

    it('returns the existing instance without starting anything', async () => {
      await executor.ensureRunning(ref(3), deployContext());
      const again = await executor.ensureRunning(ref(3), deployContext());

      expect(again.ok && again.started).toBe(false);
      expect(again.ok && again.instance.name).toBe(nameOf(3));
      expect(containers.calls.filter((c) => c.startsWith('start:'))).toHaveLength(1);
    });

    it('starts a slot once when called concurrently', async () => {
      const results = await Promise.all([
        executor.ensureRunning(ref(5), deployContext()),
        executor.ensureRunning(ref(5), deployContext()),
      ]);

      expect(results.map((r) => r.ok && r.started)).toEqual([true, false]);
      expect(containers.calls.filter((c) => c.startsWith('start:'))).toEqual([`start:${nameOf(5)}`]);
    });

    it('removes the fresh network when the container fails to start', async () => {
      containers.startFailures.add(nameOf(4));
      const result = await executor.ensureRunning(ref(4), deployContext());

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.slotId).toBe(4);
        expect(result.error).toBeInstanceOf(StartFailureError);
        expect(result.error.message).toContain('image not found');
        expect(result.error.cause).toBeDefined();
      }
      expect(containers.networks.has(nameOf(4))).toBe(false);
      expect(containers.calls).toContain(`network-rm:${nameOf(4)}`);
    });

    it('clears a stopped container and network left under the same name', async () => {
      containers.addContainer(nameOf(6), { id: 'old', state: 'exited' });
      containers.addNetwork(nameOf(6), '172.18.9.0/24');

      const result = await executor.ensureRunning(ref(6), deployContext());

      expect(result.ok && result.started).toBe(true);
      expect(containers.calls.slice(0, 2)).toEqual(['rm:old', `network-rm:${nameOf(6)}`]);
      expect(result.ok && result.instance.subnet).toBe('172.18.0.0/24');
    });

    it('reports allocation exhaustion as a typed failure', async () => {
      build({ subnetOctets: 1 });
      containers.addNetwork('other', '172.18.0.0/24');

      const result = await executor.ensureRunning(ref(1), deployContext());
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error).toBeInstanceOf(ResourceAllocationExhaustedError);
      expect(containers.calls).toEqual([]);
    });

    it('attaches a log session when asked', async () => {
      const result = await executor.ensureRunning(ref(2), deployContext({ attachSession: true }));
      expect(result.ok && result.instance.session).toEqual({ name: nameOf(2), pid: 1000 });
    });

    it('still succeeds when the session cannot be attached', async () => {
      sessions.startFailures.add(nameOf(2));
      const result = await executor.ensureRunning(ref(2), deployContext({ attachSession: true }));
      expect(result.ok).toBe(true);
      expect(result.ok && result.instance.session).toBeUndefined();
    });
  });

  describe('deployMany', () => {
    it('reports every failure and keeps going', async () => {
      containers.startFailures.add(nameOf(2));
      containers.startFailures.add(nameOf(4));
      await executor.ensureRunning(ref(5), deployContext());

      const batch = await executor.deployMany([1, 2, 3, 4, 5].map(ref), deployContext(), { concurrency: 3 });

      expect(batch.started.map((i) => i.slotId).sort()).toEqual([1, 3]);
      expect(batch.alreadyRunning.map((i) => i.slotId)).toEqual([5]);
      expect(batch.failed.map((f) => f.slotId)).toEqual([2, 4]);
      expect(batch.skipped).toEqual([]);
    });

    it('gives every started slot its own subnet and ports', async () => {
      const batch = await executor.deployMany([1, 2, 3, 4, 5, 6].map(ref), deployContext(), { concurrency: 6 });

      expect(batch.started).toHaveLength(6);
      const subnets = batch.started.map((i) => i.subnet);
      const ports = batch.started.flatMap((i) => i.ports);
      expect(new Set(subnets).size).toBe(6);
      expect(new Set(ports).size).toBe(12);
    });

    it('skips slots not yet started after cancellation', async () => {
      const controller = new AbortController();
      const batch = await executor.deployMany([1, 2, 3].map(ref), deployContext(), {
        concurrency: 1,
        signal: controller.signal,
        onResult: () => controller.abort(),
      });

      expect(batch.started.map((i) => i.slotId)).toEqual([1]);
      expect(batch.skipped).toEqual([2, 3]);
    });
  });
});
