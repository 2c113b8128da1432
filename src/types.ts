import { LedgerNotification, LedgerState } from './domain/ledger/ledgerTypes.js';

export interface AppState {
  ledger: LedgerState;
  /** Append-only; committed in the same transaction as the mutation it describes. */
  notifications: LedgerNotification[];
  startedAt: string;
}

export interface OperationMetrics {
  committed: Record<string, number>;
  rejected: Record<string, number>;
  rejectionsByCode: Record<string, number>;
  /** Log writes that failed; they never change an operation's outcome. */
  logFailures: number;
  /** Token legs that could not be reversed after a failed operation. */
  compensationFailures: number;
}

export interface RuntimeMetrics {
  uptimeSeconds: number;
  processPid: number;
  markets: number;
  accounts: number;
  notifications: number;
  paused: boolean;
  feedListenerFailures: number;
}
