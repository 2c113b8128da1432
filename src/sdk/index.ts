export { LedgerAPIError, LedgerClient } from './client.js';
export type { LedgerClientOptions } from './client.js';
export type {
  Uint,

  // Markets
  Market,
  MarketParamsInput,
  AddMarketInput,
  MarketsResponse,

  // Accounts
  UserPosition,
  AccountSnapshot,
  AccountBalances,

  // Operations
  AmountInput,
  SignedDepositInput,
  LiquidateInput,
  TransferOutInput,
  Liquidation,
  TokenBalance,

  // Notifications
  NotificationType,
  LedgerNotification,

  // System
  RuntimeMetrics,
  HealthResponse,
  MetricsResponse,

  // Errors
  APIErrorEnvelope,
} from './types.js';
