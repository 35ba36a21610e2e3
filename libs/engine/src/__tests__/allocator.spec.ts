import { ResourceAllocationExhaustedError } from '@slotwarden/ipc';
import { ResourceAllocator, usedOctets } from '../allocator';
import { FakeContainerRuntime } from './helpers/fakes';

describe('usedOctets', () => {
  it('collects third octets inside the prefix only', () => {
    expect(
      usedOctets([
        { name: 'a', subnet: '172.18.4.0/24' },
        { name: 'b', subnet: '172.18.0.0/24' },
        { name: 'bridge', subnet: '172.17.0.0/16' },
        { name: 'host' },
      ]),
    ).toEqual([0, 4]);
  });

  it('marks every /24 block a wider network covers', () => {
    expect(usedOctets([{ name: 'pair', subnet: '172.18.6.0/23' }])).toEqual([6, 7]);
    expect(usedOctets([{ name: 'unaligned', subnet: '172.18.9.1/23' }])).toEqual([8, 9]);
    expect(usedOctets([{ name: 'compose_default', subnet: '172.18.0.0/16' }])).toHaveLength(256);
    expect(usedOctets([{ name: 'private', subnet: '172.16.0.0/12' }])).toHaveLength(256);
  });

  it('marks the enclosing block of a narrower network', () => {
    expect(usedOctets([{ name: 'half', subnet: '172.18.5.128/25' }])).toEqual([5]);
  });

  it('ignores IPv6 and malformed subnets', () => {
    expect(
      usedOctets([
        { name: 'v6', subnet: 'fd00:dead::/64' },
        { name: 'junk', subnet: '172.18.300.0/24' },
        { name: 'nomask', subnet: '172.18.3.0' },
      ]),
    ).toEqual([]);
  });
});

describe('ResourceAllocator', () => {
  let containers: FakeContainerRuntime;

  beforeEach(() => {
    containers = new FakeContainerRuntime();
  });

  it('picks the lowest free octet and port block', async () => {
    containers.addNetwork('n0', '172.18.0.0/24');
    containers.addContainer('x', { ports: [8002] });
    const allocator = new ResourceAllocator(containers);

    expect(await allocator.allocate(1)).toEqual({ slotId: 1, octet: 1, subnet: '172.18.1.0/24', ports: [8004, 8005] });
  });

  it('skips blocks inside a wider network', async () => {
    containers.addNetwork('shared', '172.18.0.0/23');
    const allocation = await new ResourceAllocator(containers).allocate(1);
    expect(allocation.subnet).toBe('172.18.2.0/24');
  });

  it('reports exhaustion when a /16 covers the whole prefix', async () => {
    containers.addNetwork('compose_default', '172.18.0.0/16');
    await expect(new ResourceAllocator(containers).allocate(1)).rejects.toMatchObject({
      resource: 'subnet',
      slotId: 1,
    });
  });

  it('counts ports of stopped containers as used', async () => {
    containers.addContainer('x', { state: 'exited', ports: [8003] });
    const allocation = await new ResourceAllocator(containers).allocate(1);
    expect(allocation.ports).toEqual([8004, 8005]);
  });

  it('never hands out the same octet or ports to concurrent callers', async () => {
    const allocator = new ResourceAllocator(containers);
    const allocations = await Promise.all(Array.from({ length: 20 }, (_, i) => allocator.allocate(i)));

    const octets = allocations.map((a) => a.octet);
    const ports = allocations.flatMap((a) => a.ports);
    expect(new Set(octets).size).toBe(20);
    expect(new Set(ports).size).toBe(40);
  });

  it('reuses resources once released', async () => {
    const allocator = new ResourceAllocator(containers);
    const first = await allocator.allocate(1);
    allocator.release(first);
    expect(await allocator.allocate(2)).toEqual({ ...first, slotId: 2 });
  });

  it('skips blocks the probe reports busy', async () => {
    const busy = new Set([8002, 8005]);
    const allocator = new ResourceAllocator(containers, { probe: async (port) => !busy.has(port) });
    expect((await allocator.allocate(1)).ports).toEqual([8006, 8007]);
  });

  it('fails with a typed error when subnets run out', async () => {
    const allocator = new ResourceAllocator(containers, { subnetOctets: 2 });
    await allocator.allocate(1);
    await allocator.allocate(2);
    const exhausted = allocator.allocate(3);
    await expect(exhausted).rejects.toBeInstanceOf(ResourceAllocationExhaustedError);
    await expect(exhausted).rejects.toMatchObject({ resource: 'subnet', slotId: 3 });
  });

  it('fails with a typed error when port blocks run out', async () => {
    const allocator = new ResourceAllocator(containers, { maxBlocks: 1 });
    await allocator.allocate(1);
    await expect(allocator.allocate(2)).rejects.toMatchObject({ resource: 'ports', slotId: 2 });
  });
});
