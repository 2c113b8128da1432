/**
 * Liquidation engine.
 *
 * A liquidator repays part of an unsafe account's borrow and receives the repaid amount plus a
 * 5% penalty, seized from exactly one collateral asset: the one with the highest weighted value.
 * Seizing never spans several assets; if the best asset cannot cover the full seize amount the
 * liquidation is rejected even when the account's total collateral would suffice.
 */

import { DomainError, ErrorCode } from '../../errors/taxonomy.js';
import { mulDiv } from './checkedMath.js';
import { isLiquidatable } from './collateralization.js';
import { Address, BPS, LedgerState, LIQUIDATION_PENALTY_BPS } from './ledgerTypes.js';
import { listActiveMarkets } from './marketRegistry.js';
import { debitBorrow, debitDeposit, getBorrow, getDeposit } from './positionLedger.js';

export interface LiquidationPlan {
  account: Address;
  /** Borrowed asset being repaid. */
  asset: Address;
  amount: bigint;
  collateralAsset: Address;
  seizeAmount: bigint;
}

export const computeSeizeAmount = (amount: bigint): bigint => mulDiv(amount, BPS + LIQUIDATION_PENALTY_BPS, BPS);

/**
 * Highest `deposit * collateralFactor` among active markets the account holds a deposit in.
 * Registry order breaks ties: the first market seen keeps its place.
 */
export const selectBestCollateral = (ledger: LedgerState, account: Address): Address | null => {
  let best: Address | null = null;
  let bestValue = 0n;

  for (const market of listActiveMarkets(ledger)) {
    const deposit = getDeposit(ledger, account, market.asset);
    if (deposit === 0n) continue;

    const value = mulDiv(deposit, market.collateralFactor, BPS);
    if (best === null || value > bestValue) {
      best = market.asset;
      bestValue = value;
    }
  }

  return best;
};

export const planLiquidation = (
  ledger: LedgerState,
  account: Address,
  asset: Address,
  amount: bigint,
): LiquidationPlan => {
  if (amount <= 0n) {
    throw new DomainError(ErrorCode.InvalidAmount, 400, 'Amount must be greater than zero.');
  }

  const borrowed = getBorrow(ledger, account, asset);
  if (borrowed < amount) {
    throw new DomainError(
      ErrorCode.InsufficientBorrowToLiquidate,
      422,
      'Account borrow is smaller than the liquidation amount.',
      { account, asset, borrowed: borrowed.toString(), amount: amount.toString() },
    );
  }

  if (!isLiquidatable(ledger, account)) {
    throw new DomainError(ErrorCode.NotLiquidatable, 422, 'Account is not liquidatable.', { account });
  }

  const seizeAmount = computeSeizeAmount(amount);
  const collateralAsset = selectBestCollateral(ledger, account);
  if (collateralAsset === null) {
    throw new DomainError(ErrorCode.NoCollateral, 422, 'Account holds no collateral.', { account });
  }

  const available = getDeposit(ledger, account, collateralAsset);
  if (available < seizeAmount) {
    throw new DomainError(
      ErrorCode.InsufficientCollateral,
      422,
      'Best collateral asset cannot cover the seize amount.',
      {
        account,
        collateralAsset,
        available: available.toString(),
        seizeAmount: seizeAmount.toString(),
      },
    );
  }

  return { account, asset, amount, collateralAsset, seizeAmount };
};

export const applyLiquidation = (ledger: LedgerState, plan: LiquidationPlan, now: number): void => {
  debitBorrow(ledger, plan.account, plan.asset, plan.amount, now);
  debitDeposit(ledger, plan.account, plan.collateralAsset, plan.seizeAmount, now);
};
