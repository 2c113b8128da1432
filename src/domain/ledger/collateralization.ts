import { checkedAdd, flooredSub, mulDiv } from './checkedMath.js';
import {
  Address,
  BPS,
  INFINITE_RATIO,
  LedgerState,
  LIQUIDATION_THRESHOLD_BPS,
} from './ledgerTypes.js';
import { listActiveMarkets } from './marketRegistry.js';
import { getBorrow, getDeposit } from './positionLedger.js';

export interface AccountValues {
  /** Deposits weighted by each market's collateral factor. */
  collateralValue: bigint;
  /** Raw, unweighted borrow sum. */
  borrowValue: bigint;
}

/** Hypothetical change applied to one asset leg before weighting. */
export interface SimulatedChange {
  asset: Address;
  depositReduction?: bigint;
  borrowAddition?: bigint;
}

/**
 * Single accumulation routine shared by the live ratio and every simulated ratio,
 * so the gates and the reported ratio can never disagree.
 */
export const computeAccountValues = (
  ledger: LedgerState,
  account: Address,
  change?: SimulatedChange,
): AccountValues => {
  let collateralValue = 0n;
  let borrowValue = 0n;

  for (const market of listActiveMarkets(ledger)) {
    let deposit = getDeposit(ledger, account, market.asset);
    let borrow = getBorrow(ledger, account, market.asset);

    if (change && change.asset === market.asset) {
      deposit = flooredSub(deposit, change.depositReduction ?? 0n);
      borrow = checkedAdd(borrow, change.borrowAddition ?? 0n);
    }

    collateralValue = checkedAdd(collateralValue, mulDiv(deposit, market.collateralFactor, BPS));
    borrowValue = checkedAdd(borrowValue, borrow);
  }

  return { collateralValue, borrowValue };
};

export const ratioFromValues = ({ collateralValue, borrowValue }: AccountValues): bigint => (
  borrowValue === 0n ? INFINITE_RATIO : mulDiv(collateralValue, BPS, borrowValue)
);

const isSafeRatio = (ratio: bigint): boolean => ratio === INFINITE_RATIO || ratio >= LIQUIDATION_THRESHOLD_BPS;

/** Weighted collateral over raw borrow, in basis points. */
export const collateralizationRatio = (ledger: LedgerState, account: Address): bigint => (
  ratioFromValues(computeAccountValues(ledger, account))
);

export const canWithdraw = (
  ledger: LedgerState,
  account: Address,
  asset: Address,
  amount: bigint,
): boolean => {
  if (collateralizationRatio(ledger, account) === INFINITE_RATIO) return true;

  const simulated = computeAccountValues(ledger, account, { asset, depositReduction: amount });
  return isSafeRatio(ratioFromValues(simulated));
};

/**
 * An account with no outstanding borrow is approved without simulating the new borrow.
 */
export const canBorrow = (
  ledger: LedgerState,
  account: Address,
  asset: Address,
  amount: bigint,
): boolean => {
  if (collateralizationRatio(ledger, account) === INFINITE_RATIO) return true;

  const simulated = computeAccountValues(ledger, account, { asset, borrowAddition: amount });
  return isSafeRatio(ratioFromValues(simulated));
};

export const isLiquidatable = (ledger: LedgerState, account: Address): boolean => (
  collateralizationRatio(ledger, account) < LIQUIDATION_THRESHOLD_BPS
);
