import { Address } from '../domain/ledger/ledgerTypes.js';
import { AccessPolicy } from '../domain/ledger/policies.js';
import { DomainError, ErrorCode } from '../errors/taxonomy.js';
import { EventLogger } from '../infra/logger.js';
import { InMemoryTokenLedger } from '../integrations/assets/tokenLedger.js';
import { toAddress } from './lendingPoolService.js';

export interface TokenBalance {
  asset: Address;
  holder: Address;
  balance: bigint;
  allowance: bigint;
}

/**
 * Operator desk for the in-process token ledger: minting for local runs and
 * allowances that let the pool pull from an account.
 */
export class TokenDeskService {
  constructor(
    private readonly tokens: InMemoryTokenLedger,
    private readonly access: AccessPolicy,
    private readonly logger: EventLogger,
  ) {}

  async mint(caller: string, asset: string, to: string, amount: bigint): Promise<TokenBalance> {
    const callerAddress = toAddress(caller, 'caller');
    const assetAddress = toAddress(asset, 'asset', ErrorCode.InvalidAsset);
    const recipient = toAddress(to, 'to');

    this.access.requireOwner(callerAddress);
    if (amount <= 0n) {
      throw new DomainError(ErrorCode.InvalidAmount, 400, 'Amount must be greater than zero.');
    }

    this.tokens.mint(assetAddress, recipient, amount);
    await this.logger.log('info', 'tokens.mint', { asset: assetAddress, to: recipient, amount });
    return this.balanceOf(assetAddress, recipient);
  }

  /** Sets the allowance `caller` grants to ledger custody. */
  async approve(caller: string, asset: string, amount: bigint): Promise<TokenBalance> {
    const owner = toAddress(caller, 'caller');
    const assetAddress = toAddress(asset, 'asset', ErrorCode.InvalidAsset);

    this.tokens.approve(assetAddress, owner, this.tokens.custody, amount);
    await this.logger.log('info', 'tokens.approve', { asset: assetAddress, owner, amount });
    return this.balanceOf(assetAddress, owner);
  }

  balanceOf(asset: string, holder: string): TokenBalance {
    const assetAddress = toAddress(asset, 'asset', ErrorCode.InvalidAsset);
    const holderAddress = toAddress(holder, 'holder');

    return {
      asset: assetAddress,
      holder: holderAddress,
      balance: this.tokens.balanceOf(assetAddress, holderAddress),
      allowance: this.tokens.allowance(assetAddress, holderAddress, this.tokens.custody),
    };
  }
}
