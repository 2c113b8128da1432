import { checkedAdd, checkedSub } from '../../domain/ledger/checkedMath.js';
import { Address } from '../../domain/ledger/ledgerTypes.js';
import { DomainError, ErrorCode } from '../../errors/taxonomy.js';
import { AssetTransfer } from './assetTransfer.js';

const transferFailed = (reason: string, details: Record<string, unknown>): DomainError => new DomainError(
  ErrorCode.TransferFailed,
  502,
  `Asset transfer failed: ${reason}.`,
  details,
);

/**
 * Process-local fungible-token book with ERC-20 style balances and allowances.
 * `pull` behaves like `transferFrom(payer, custody, amount)` and spends the payer's allowance
 * for the custody address; `push` behaves like `transfer(recipient, amount)` from custody.
 */
export class InMemoryTokenLedger implements AssetTransfer {
  private readonly balances = new Map<Address, Map<Address, bigint>>();
  private readonly allowances = new Map<string, bigint>();

  constructor(readonly custody: Address) {}

  balanceOf(asset: Address, holder: Address): bigint {
    return this.balances.get(asset)?.get(holder) ?? 0n;
  }

  allowance(asset: Address, owner: Address, spender: Address): bigint {
    return this.allowances.get(this.allowanceKey(asset, owner, spender)) ?? 0n;
  }

  mint(asset: Address, to: Address, amount: bigint): void {
    this.setBalance(asset, to, checkedAdd(this.balanceOf(asset, to), amount));
  }

  approve(asset: Address, owner: Address, spender: Address, amount: bigint): void {
    this.allowances.set(this.allowanceKey(asset, owner, spender), amount);
  }

  async pull(asset: Address, from: Address, amount: bigint): Promise<void> {
    const allowed = this.allowance(asset, from, this.custody);
    if (allowed < amount) {
      throw transferFailed('insufficient allowance', {
        asset,
        from,
        allowance: allowed.toString(),
        amount: amount.toString(),
      });
    }

    this.move(asset, from, this.custody, amount);
    this.allowances.set(this.allowanceKey(asset, from, this.custody), checkedSub(allowed, amount));
  }

  async push(asset: Address, to: Address, amount: bigint): Promise<void> {
    this.move(asset, this.custody, to, amount);
  }

  private move(asset: Address, from: Address, to: Address, amount: bigint): void {
    const available = this.balanceOf(asset, from);
    if (available < amount) {
      throw transferFailed('insufficient balance', {
        asset,
        from,
        balance: available.toString(),
        amount: amount.toString(),
      });
    }

    this.setBalance(asset, from, checkedSub(available, amount));
    this.setBalance(asset, to, checkedAdd(this.balanceOf(asset, to), amount));
  }

  private setBalance(asset: Address, holder: Address, amount: bigint): void {
    let holders = this.balances.get(asset);
    if (!holders) {
      holders = new Map();
      this.balances.set(asset, holders);
    }
    holders.set(holder, amount);
  }

  private allowanceKey(asset: Address, owner: Address, spender: Address): string {
    return `${asset}:${owner}:${spender}`;
  }
}
