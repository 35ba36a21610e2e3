/**
 * Slot ownership ledger
 *
 * `SlotLedger` is the only seam between the engine and the chain. The
 * production implementation reads the slot registry through ethers: the
 * protocol-state contract names the registry, the registry lists the ids a
 * wallet holds.
 */

import { ethers } from 'ethers';
import { LedgerUnreachableError } from '@slotwarden/ipc';

export interface SlotLedger {
  /** Raw slot ids owned by `wallet` on `chain` */
  getOwnedSlotIds(wallet: string, chain: string, signal: AbortSignal): Promise<readonly bigint[]>;
}

export interface LedgerEndpoint {
  rpcUrl: string;
  protocolStateContract: string;
}

const PROTOCOL_STATE_ABI = ['function snapshotterState() view returns (address)'];
const SLOT_REGISTRY_ABI = ['function getUserOwnedNodeIds(address owner) view returns (uint256[])'];

export class EthersSlotLedger implements SlotLedger {
  /**
   * @param endpointFor - RPC endpoint and protocol-state address per chain
   */
  constructor(private readonly endpointFor: (chain: string) => LedgerEndpoint | undefined) {}

  async getOwnedSlotIds(wallet: string, chain: string, signal: AbortSignal): Promise<readonly bigint[]> {
    const endpoint = this.endpointFor(chain);
    if (!endpoint) {
      throw new LedgerUnreachableError(chain, 'chain is not in the catalog');
    }

    const provider = new ethers.JsonRpcProvider(endpoint.rpcUrl, undefined, { staticNetwork: true });
    const onAbort = () => provider.destroy();
    signal.addEventListener('abort', onAbort, { once: true });

    try {
      const protocolState = new ethers.Contract(endpoint.protocolStateContract, PROTOCOL_STATE_ABI, provider);
      const registryAddress: unknown = await protocolState.getFunction('snapshotterState').staticCall();
      if (typeof registryAddress !== 'string' || !ethers.isAddress(registryAddress)) {
        throw new LedgerUnreachableError(chain, `malformed registry address ${String(registryAddress)}`);
      }

      const registry = new ethers.Contract(registryAddress, SLOT_REGISTRY_ABI, provider);
      const ids: unknown = await registry.getFunction('getUserOwnedNodeIds').staticCall(ethers.getAddress(wallet));
      if (!Array.isArray(ids) || !ids.every((id): id is bigint => typeof id === 'bigint')) {
        throw new LedgerUnreachableError(chain, 'malformed owned-slot response');
      }
      return [...ids];
    } finally {
      signal.removeEventListener('abort', onAbort);
      provider.destroy();
    }
  }
}
