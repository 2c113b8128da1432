/** Checksummed 20-byte hex identifier of an account or an asset. */
export type Address = string;

export const BPS = 10_000n;
export const MAX_COLLATERAL_FACTOR_BPS = BPS;
export const LIQUIDATION_THRESHOLD_BPS = 8_000n;
export const LIQUIDATION_PENALTY_BPS = 500n;

export const MAX_UINT256 = (1n << 256n) - 1n;

/** Ratio reported for an account with nothing borrowed. Never liquidatable. */
export const INFINITE_RATIO = MAX_UINT256;

export interface Market {
  asset: Address;
  totalSupply: bigint;
  totalBorrow: bigint;
  /** APY in basis points, informational only. */
  supplyRate: bigint;
  /** APY in basis points, informational only. */
  borrowRate: bigint;
  collateralFactor: bigint;
  isActive: boolean;
  createdAt: string;
  updatedAt: string;
}

export interface UserPosition {
  totalDeposited: bigint;
  totalBorrowed: bigint;
  /** Unix seconds of the last position change. */
  lastUpdateTime: number;
  isActive: boolean;
}

export type BalanceBook = Record<Address, Record<Address, bigint>>;

export interface LedgerState {
  markets: Record<Address, Market>;
  /** Registry order; append-only and duplicate-free. */
  supportedAssets: Address[];
  users: Record<Address, UserPosition>;
  deposits: BalanceBook;
  borrows: BalanceBook;
  nonces: Record<Address, bigint>;
  paused: boolean;
}

export interface NotificationPayloads {
  MarketAdded: { asset: Address; collateralFactor: bigint; supplyRate: bigint; borrowRate: bigint };
  MarketUpdated: { asset: Address; collateralFactor: bigint };
  RatesUpdated: { asset: Address; supplyRate: bigint; borrowRate: bigint };
  Deposit: { account: Address; asset: Address; amount: bigint };
  Withdraw: { account: Address; asset: Address; amount: bigint };
  Borrow: { account: Address; asset: Address; amount: bigint };
  Repay: { account: Address; asset: Address; amount: bigint };
  Liquidate: {
    liquidator: Address;
    account: Address;
    asset: Address;
    amount: bigint;
    collateralAsset: Address;
    seizeAmount: bigint;
  };
  Paused: { account: Address };
  Unpaused: { account: Address };
  AssetsRecovered: { asset: Address; to: Address; amount: bigint };
}

export type NotificationType = keyof NotificationPayloads;

export type LedgerNotification = {
  [K in NotificationType]: {
    id: string;
    type: K;
    payload: NotificationPayloads[K];
    createdAt: string;
  };
}[NotificationType];

export interface AccountSnapshot {
  account: Address;
  position: UserPosition;
  deposits: Record<Address, bigint>;
  borrows: Record<Address, bigint>;
  nonce: bigint;
  collateralizationRatio: bigint;
  liquidatable: boolean;
}

export const createEmptyLedger = (): LedgerState => ({
  markets: {},
  supportedAssets: [],
  users: {},
  deposits: {},
  borrows: {},
  nonces: {},
  paused: false,
});
