import { InvalidInputError, LedgerUnreachableError } from '@slotwarden/ipc';
import { OwnershipResolver } from '../ledger/resolver';
import { FakeLedger } from './helpers/fakes';

const WALLET = '0xAbCdEf0123456789aBcDeF0123456789AbCdEf01';
const LOWER = WALLET.toLowerCase();

describe('OwnershipResolver', () => {
  let ledger: FakeLedger;
  let resolver: OwnershipResolver;

  beforeEach(() => {
    ledger = new FakeLedger();
    resolver = new OwnershipResolver(ledger, { timeoutMs: 50 });
  });

  it('returns owned ids sorted and de-duplicated', async () => {
    ledger.owned.set(LOWER, [7n, 2n, 7n, 0n]);
    expect(await resolver.resolveOwnedSlots(WALLET, 'mainnet')).toEqual({
      ok: true,
      wallet: LOWER,
      chain: 'mainnet',
      slots: [0, 2, 7],
    });
    expect(ledger.calls).toEqual([`mainnet:${LOWER}`]);
  });

  it('distinguishes empty ownership from an unreachable ledger', async () => {
    const empty = await resolver.resolveOwnedSlots(WALLET, 'mainnet');
    expect(empty).toEqual({ ok: true, wallet: LOWER, chain: 'mainnet', slots: [] });

    ledger.error = new Error('ECONNREFUSED');
    const down = await resolver.resolveOwnedSlots(WALLET, 'mainnet');
    expect(down.ok).toBe(false);
    if (!down.ok) {
      expect(down.error).toBeInstanceOf(LedgerUnreachableError);
      expect(down.error.message).toBe('Ledger for chain "mainnet" unreachable: ECONNREFUSED');
    }
  });

  it('rejects a malformed address without calling the ledger', async () => {
    const result = await resolver.resolveOwnedSlots('0x1234', 'mainnet');
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error).toBeInstanceOf(InvalidInputError);
    expect(ledger.calls).toEqual([]);
  });

  it('times out a ledger that never answers', async () => {
    ledger.hang = true;
    const result = await resolver.resolveOwnedSlots(WALLET, 'mainnet');
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(LedgerUnreachableError);
      expect(result.error.message).toContain('no response within 50ms');
    }
  });

  it('treats an id beyond the safe integer range as a malformed response', async () => {
    ledger.owned.set(LOWER, [1n, 2n ** 60n]);
    const result = await resolver.resolveOwnedSlots(WALLET, 'mainnet');
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.message).toContain('malformed slot id 1152921504606846976');
  });

  it('passes through an unreachable error raised by the ledger', async () => {
    const original = new LedgerUnreachableError('mainnet', 'chain is not in the catalog');
    ledger.error = original;
    const result = await resolver.resolveOwnedSlots(WALLET, 'mainnet');
    expect(result).toEqual({ ok: false, error: original });
  });
});
