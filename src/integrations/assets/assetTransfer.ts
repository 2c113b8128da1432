import { Address } from '../../domain/ledger/ledgerTypes.js';

/**
 * Token movement between external holders and ledger custody.
 * Implementations reject on any failure; a short transfer is never reported as success.
 */
export interface AssetTransfer {
  /** Move `amount` of `asset` from `from` into custody. Requires balance and allowance. */
  pull(asset: Address, from: Address, amount: bigint): Promise<void>;
  /** Move `amount` of `asset` out of custody to `to`. */
  push(asset: Address, to: Address, amount: bigint): Promise<void>;
}
