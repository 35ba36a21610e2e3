import { InvalidInputError } from '@slotwarden/ipc';
import { SlotNaming } from '../naming';

describe('SlotNaming', () => {
  const naming = new SlotNaming();

  it('formats the base name', () => {
    expect(naming.format({ slotId: 42, chain: 'mainnet', market: 'uniswapv2' })).toBe(
      'snapshotter-lite-v2-42-mainnet-uniswapv2',
    );
  });

  it('appends a role', () => {
    expect(naming.format({ slotId: 0, chain: 'mainnet', market: 'aavev3' }, 'collector')).toBe(
      'snapshotter-lite-v2-0-mainnet-aavev3-collector',
    );
  });

  it.each([
    [{ slotId: 0, chain: 'a', market: 'b' }, undefined],
    [{ slotId: 7, chain: 'devnet', market: 'uniswapv2' }, undefined],
    [{ slotId: 123456, chain: 'mainnet', market: 'aavev3' }, 'collector'],
  ])('round-trips %p with role %p', (ref, role) => {
    const parsed = naming.parse(naming.format(ref, role));
    expect(parsed).toEqual(role === undefined ? { workload: naming.workload, ...ref } : { workload: naming.workload, ...ref, role });
  });

  it.each([
    'snapshotter-lite-v2-01-mainnet-uniswapv2',
    'snapshotter-lite-v2-x-mainnet-uniswapv2',
    'snapshotter-lite-v2-1-mainnet',
    'snapshotter-lite-v2-1-Mainnet-uniswapv2',
    'snapshotter-lite-v2-1-mainnet-uniswapv2-',
    'snapshotter-lite-v2-1-mainnet-uniswapv2-9role',
    'snapshotter-lite-v2-99999999999999999999-mainnet-uniswapv2',
    'other-1-mainnet-uniswapv2',
  ])('does not parse %p', (name) => {
    expect(naming.parse(name)).toBeNull();
  });

  it('recognizes its own prefix even when the rest does not parse', () => {
    expect(naming.owns('snapshotter-lite-v2-bogus')).toBe(true);
    expect(naming.owns('postgres')).toBe(false);
  });

  it('escapes the workload literal', () => {
    const custom = new SlotNaming('node-v1');
    expect(custom.parse('node-v1-3-mainnet-abc')).toEqual({ workload: 'node-v1', slotId: 3, chain: 'mainnet', market: 'abc' });
    expect(custom.parse('nodexv1-3-mainnet-abc')).toBeNull();
  });

  it('rejects components that would not round-trip', () => {
    expect(() => naming.format({ slotId: -1, chain: 'mainnet', market: 'x' })).toThrow(InvalidInputError);
    expect(() => naming.format({ slotId: 1.5, chain: 'mainnet', market: 'x' })).toThrow(InvalidInputError);
    expect(() => naming.format({ slotId: 1, chain: 'main-net', market: 'x' })).toThrow(InvalidInputError);
    expect(() => naming.format({ slotId: 1, chain: 'mainnet', market: 'X' })).toThrow(InvalidInputError);
    expect(() => naming.format({ slotId: 1, chain: 'mainnet', market: 'x' }, '1a')).toThrow(InvalidInputError);
    expect(() => new SlotNaming('Bad Workload')).toThrow(InvalidInputError);
  });
});
