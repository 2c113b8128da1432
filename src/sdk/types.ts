// ─── SDK Types ─────────────────────────────────────────────────────────────
// Wire shapes of the collateral ledger API, decoupled from the server's internal types.
// Every amount, rate, nonce and ratio travels as a decimal string.
// ────────────────────────────────────────────────────────────────────────────

export type Uint = string;

// ─── Markets ───────────────────────────────────────────────────────────────

export interface Market {
  asset: string;
  totalSupply: Uint;
  totalBorrow: Uint;
  supplyRate: Uint;
  borrowRate: Uint;
  /** Basis points, at most 10000. */
  collateralFactor: Uint;
  isActive: boolean;
  createdAt: string;
  updatedAt: string;
}

export interface MarketParamsInput {
  collateralFactor: Uint;
  supplyRate: Uint;
  borrowRate: Uint;
}

export interface AddMarketInput extends MarketParamsInput {
  asset: string;
}

export interface MarketsResponse {
  supportedAssets: string[];
  markets: Market[];
}

// ─── Accounts ──────────────────────────────────────────────────────────────

export interface UserPosition {
  totalDeposited: Uint;
  totalBorrowed: Uint;
  lastUpdateTime: number;
  isActive: boolean;
}

export interface AccountSnapshot {
  account: string;
  position: UserPosition;
  deposits: Record<string, Uint>;
  borrows: Record<string, Uint>;
  nonce: Uint;
  collateralizationRatio: Uint;
  liquidatable: boolean;
}

export interface AccountBalances {
  account: string;
  asset: string;
  deposit: Uint;
  borrow: Uint;
}

// ─── Operations ────────────────────────────────────────────────────────────

export interface AmountInput {
  asset: string;
  amount: Uint;
}

export interface SignedDepositInput extends AmountInput {
  nonce: Uint;
  deadline: Uint;
  signature: string;
}

export interface LiquidateInput extends AmountInput {
  account: string;
}

export interface TransferOutInput extends AmountInput {
  to: string;
}

export interface Liquidation {
  account: string;
  asset: string;
  amount: Uint;
  collateralAsset: string;
  seizeAmount: Uint;
}

export interface TokenBalance {
  asset: string;
  holder: string;
  balance: Uint;
  allowance: Uint;
}

// ─── Notifications ─────────────────────────────────────────────────────────

export type NotificationType =
  | 'MarketAdded'
  | 'MarketUpdated'
  | 'RatesUpdated'
  | 'Deposit'
  | 'Withdraw'
  | 'Borrow'
  | 'Repay'
  | 'Liquidate'
  | 'Paused'
  | 'Unpaused'
  | 'AssetsRecovered';

export interface LedgerNotification {
  id: string;
  type: NotificationType;
  payload: Record<string, string>;
  createdAt: string;
}

// ─── System ────────────────────────────────────────────────────────────────

export interface RuntimeMetrics {
  uptimeSeconds: number;
  processPid: number;
  markets: number;
  accounts: number;
  notifications: number;
  paused: boolean;
  feedListenerFailures: number;
}

export interface HealthResponse extends RuntimeMetrics {
  status: string;
  env: string;
}

export interface MetricsResponse {
  operations: {
    committed: Record<string, number>;
    rejected: Record<string, number>;
    rejectionsByCode: Record<string, number>;
    logFailures: number;
    compensationFailures: number;
  };
  rateLimit: {
    totalChecks: number;
    totalAllowed: number;
    totalDenied: number;
    deniedByAccount: Record<string, number>;
    trackedAccounts: number;
  };
  runtime: RuntimeMetrics;
}

// ─── Errors ────────────────────────────────────────────────────────────────

export interface APIErrorEnvelope {
  error: {
    code: string;
    message: string;
    details?: unknown;
  };
}
