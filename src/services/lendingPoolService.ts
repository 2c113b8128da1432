/**
 * Lending pool operation handlers.
 *
 * Every entry point runs as one store transaction: preconditions, ledger mutation on the draft,
 * token legs through the transfer collaborator, notification append. Only a fully successful
 * run is committed; if the commit itself fails, the token legs are reversed. Notifications are
 * published on the event bus after the commit.
 */

import { getAddress, ZeroAddress } from 'ethers';
import { v4 as uuid } from 'uuid';
import {
  canBorrow,
  canWithdraw,
  collateralizationRatio,
  isLiquidatable,
} from '../domain/ledger/collateralization.js';
import {
  AccountSnapshot,
  Address,
  LedgerNotification,
  LedgerState,
  Market,
  MAX_UINT256,
  NotificationPayloads,
  NotificationType,
  UserPosition,
} from '../domain/ledger/ledgerTypes.js';
import { applyLiquidation, LiquidationPlan, planLiquidation } from '../domain/ledger/liquidation.js';
import {
  addMarket,
  getMarket,
  listMarkets,
  MarketParams,
  requireActiveMarket,
  updateMarket,
} from '../domain/ledger/marketRegistry.js';
import { AccessPolicy, PausePolicy } from '../domain/ledger/policies.js';
import {
  accountBalances,
  creditBorrow,
  creditDeposit,
  debitBorrow,
  debitDeposit,
  getBorrow,
  getDeposit,
  getNonce,
  getUser,
  incrementNonce,
} from '../domain/ledger/positionLedger.js';
import { DepositAuthorization, verifyDepositAuthorization } from '../domain/ledger/signedAuthorization.js';
import { DomainError, ErrorCode } from '../errors/taxonomy.js';
import { eventBus } from '../infra/eventBus.js';
import { EventLogger, LogLevel } from '../infra/logger.js';
import { StateStore } from '../infra/storage/stateStore.js';
import { AssetTransfer } from '../integrations/assets/assetTransfer.js';
import { AppState, OperationMetrics } from '../types.js';
import { Clock, isoNow, unixNow } from '../utils/time.js';

export interface LendingPoolDeps {
  store: StateStore;
  transfers: AssetTransfer;
  access: AccessPolicy;
  pause: PausePolicy;
  logger: EventLogger;
  /** Unix seconds. */
  clock?: Clock;
}

export interface AccountBalances {
  account: Address;
  asset: Address;
  deposit: bigint;
  borrow: bigint;
}

type NotificationInput = {
  [K in NotificationType]: { type: K; payload: NotificationPayloads[K] };
}[NotificationType];

type TransferLeg =
  | { kind: 'pull'; asset: Address; account: Address; amount: bigint }
  | { kind: 'push'; asset: Address; account: Address; amount: bigint };

/** The leg that moves the same amount back the other way. */
const reverseLeg = (leg: TransferLeg): TransferLeg => (
  leg.kind === 'pull' ? { ...leg, kind: 'push' } : { ...leg, kind: 'pull' }
);

/** Checksummed address, or a `fallbackCode` error for malformed input. */
export const toAddress = (value: string, field: string, fallbackCode: ErrorCode = ErrorCode.InvalidPayload): Address => {
  try {
    return getAddress(value);
  } catch {
    throw new DomainError(fallbackCode, 400, `${field} is not a valid address.`, { [field]: value });
  }
};

const requirePositiveAmount = (amount: bigint): void => {
  if (amount <= 0n || amount > MAX_UINT256) {
    throw new DomainError(ErrorCode.InvalidAmount, 400, 'Amount must be greater than zero.', {
      amount: amount.toString(),
    });
  }
};

interface OperationScope {
  state: AppState;
  now: number;
  record(notification: NotificationInput): void;
  /** Settled token legs, in order; reversed if the commit fails. */
  settled: TransferLeg[];
}

export class LendingPoolService {
  private readonly clock: Clock;
  private readonly metrics: OperationMetrics = {
    committed: {},
    rejected: {},
    rejectionsByCode: {},
    logFailures: 0,
    compensationFailures: 0,
  };

  constructor(private readonly deps: LendingPoolDeps) {
    this.clock = deps.clock ?? unixNow;
  }

  // ─── Administration ─────────────────────────────────────────────────────────

  async addMarket(caller: string, asset: string, params: MarketParams): Promise<Market> {
    const callerAddress = toAddress(caller, 'caller');
    const assetAddress = toAddress(asset, 'asset', ErrorCode.InvalidAsset);

    return this.execute('addMarket', { caller: callerAddress, asset: assetAddress, ...params }, ({ state, record }) => {
      this.deps.access.requireOwner(callerAddress);
      const market = addMarket(state.ledger, assetAddress, params, isoNow());
      record({
        type: 'MarketAdded',
        payload: {
          asset: assetAddress,
          collateralFactor: market.collateralFactor,
          supplyRate: market.supplyRate,
          borrowRate: market.borrowRate,
        },
      });
      return structuredClone(market);
    });
  }

  async updateMarket(caller: string, asset: string, params: MarketParams): Promise<Market> {
    const callerAddress = toAddress(caller, 'caller');
    const assetAddress = toAddress(asset, 'asset', ErrorCode.InvalidAsset);

    return this.execute('updateMarket', { caller: callerAddress, asset: assetAddress, ...params }, ({ state, record }) => {
      this.deps.access.requireOwner(callerAddress);
      const market = updateMarket(state.ledger, assetAddress, params, isoNow());
      record({ type: 'MarketUpdated', payload: { asset: assetAddress, collateralFactor: market.collateralFactor } });
      record({
        type: 'RatesUpdated',
        payload: { asset: assetAddress, supplyRate: market.supplyRate, borrowRate: market.borrowRate },
      });
      return structuredClone(market);
    });
  }

  async pause(caller: string): Promise<void> {
    const callerAddress = toAddress(caller, 'caller');

    await this.execute('pause', { caller: callerAddress }, ({ state, record }) => {
      this.deps.access.requireOwner(callerAddress);
      this.deps.pause.requireUnpaused(state.ledger);
      this.deps.pause.setPaused(state.ledger, true);
      record({ type: 'Paused', payload: { account: callerAddress } });
    });
  }

  async unpause(caller: string): Promise<void> {
    const callerAddress = toAddress(caller, 'caller');

    await this.execute('unpause', { caller: callerAddress }, ({ state, record }) => {
      this.deps.access.requireOwner(callerAddress);
      if (!this.deps.pause.isPaused(state.ledger)) {
        throw new DomainError(ErrorCode.ProtocolNotPaused, 409, 'Protocol is not paused.');
      }
      this.deps.pause.setPaused(state.ledger, false);
      record({ type: 'Unpaused', payload: { account: callerAddress } });
    });
  }

  /** Owner-only push of any asset out of custody. Leaves the ledger untouched. */
  async recoverAssets(caller: string, asset: string, to: string, amount: bigint): Promise<void> {
    const callerAddress = toAddress(caller, 'caller');
    const assetAddress = toAddress(asset, 'asset', ErrorCode.InvalidAsset);
    const recipient = toAddress(to, 'to');

    await this.execute('recoverAssets', { caller: callerAddress, asset: assetAddress, to: recipient, amount }, async (scope) => {
      this.deps.access.requireOwner(callerAddress);
      requirePositiveAmount(amount);
      if (recipient === ZeroAddress) {
        throw new DomainError(ErrorCode.InvalidPayload, 400, 'Recipient must not be the zero address.');
      }
      await this.settle(scope, [{ kind: 'push', asset: assetAddress, account: recipient, amount }]);
      scope.record({ type: 'AssetsRecovered', payload: { asset: assetAddress, to: recipient, amount } });
    });
  }

  // ─── Position handlers ──────────────────────────────────────────────────────

  async deposit(caller: string, asset: string, amount: bigint): Promise<UserPosition> {
    const account = toAddress(caller, 'caller');
    const assetAddress = toAddress(asset, 'asset', ErrorCode.InvalidAsset);

    return this.execute('deposit', { account, asset: assetAddress, amount }, async (scope) => {
      this.deps.pause.requireUnpaused(scope.state.ledger);
      await this.depositBody(scope, account, assetAddress, amount);
      return structuredClone(getUser(scope.state.ledger, account));
    });
  }

  /**
   * Deposit authorised by a signature from the caller over (asset, amount, nonce, deadline).
   * The nonce advances only when the whole deposit commits.
   */
  async depositWithSignature(
    caller: string,
    asset: string,
    amount: bigint,
    authorization: DepositAuthorization,
  ): Promise<UserPosition> {
    const account = toAddress(caller, 'caller');
    const assetAddress = toAddress(asset, 'asset', ErrorCode.InvalidAsset);

    return this.execute(
      'depositWithSignature',
      { account, asset: assetAddress, amount, nonce: authorization.nonce, deadline: authorization.deadline },
      async (scope) => {
        this.deps.pause.requireUnpaused(scope.state.ledger);
        verifyDepositAuthorization(scope.state.ledger, account, assetAddress, amount, authorization, scope.now);
        await this.depositBody(scope, account, assetAddress, amount);
        incrementNonce(scope.state.ledger, account);
        return structuredClone(getUser(scope.state.ledger, account));
      },
    );
  }

  async withdraw(caller: string, asset: string, amount: bigint): Promise<UserPosition> {
    const account = toAddress(caller, 'caller');
    const assetAddress = toAddress(asset, 'asset', ErrorCode.InvalidAsset);

    return this.execute('withdraw', { account, asset: assetAddress, amount }, async (scope) => {
      const { state, now, record } = scope;
      const ledger = state.ledger;
      this.deps.pause.requireUnpaused(ledger);
      requireActiveMarket(ledger, assetAddress);
      requirePositiveAmount(amount);

      const deposited = getDeposit(ledger, account, assetAddress);
      if (deposited < amount) {
        throw new DomainError(ErrorCode.InsufficientDeposit, 422, 'Deposit is smaller than the withdrawal.', {
          deposited: deposited.toString(),
          amount: amount.toString(),
        });
      }

      if (!canWithdraw(ledger, account, assetAddress, amount)) {
        throw new DomainError(ErrorCode.UnsafeWithdrawal, 422, 'Withdrawal would leave the position undercollateralized.', {
          ratio: collateralizationRatio(ledger, account).toString(),
        });
      }

      debitDeposit(ledger, account, assetAddress, amount, now);
      await this.settle(scope, [{ kind: 'push', asset: assetAddress, account, amount }]);
      record({ type: 'Withdraw', payload: { account, asset: assetAddress, amount } });
      return structuredClone(getUser(ledger, account));
    });
  }

  async borrow(caller: string, asset: string, amount: bigint): Promise<UserPosition> {
    const account = toAddress(caller, 'caller');
    const assetAddress = toAddress(asset, 'asset', ErrorCode.InvalidAsset);

    return this.execute('borrow', { account, asset: assetAddress, amount }, async (scope) => {
      const { state, now, record } = scope;
      const ledger = state.ledger;
      this.deps.pause.requireUnpaused(ledger);
      const market = requireActiveMarket(ledger, assetAddress);
      requirePositiveAmount(amount);

      // Bounded by everything ever supplied, not by what is currently unborrowed.
      if (market.totalSupply < amount) {
        throw new DomainError(ErrorCode.InsufficientLiquidity, 422, 'Market supply is smaller than the borrow.', {
          totalSupply: market.totalSupply.toString(),
          amount: amount.toString(),
        });
      }

      if (!canBorrow(ledger, account, assetAddress, amount)) {
        throw new DomainError(ErrorCode.UnsafeBorrow, 422, 'Borrow would leave the position undercollateralized.', {
          ratio: collateralizationRatio(ledger, account).toString(),
        });
      }

      creditBorrow(ledger, account, assetAddress, amount, now);
      await this.settle(scope, [{ kind: 'push', asset: assetAddress, account, amount }]);
      record({ type: 'Borrow', payload: { account, asset: assetAddress, amount } });
      return structuredClone(getUser(ledger, account));
    });
  }

  async repay(caller: string, asset: string, amount: bigint): Promise<UserPosition> {
    const account = toAddress(caller, 'caller');
    const assetAddress = toAddress(asset, 'asset', ErrorCode.InvalidAsset);

    return this.execute('repay', { account, asset: assetAddress, amount }, async (scope) => {
      const { state, now, record } = scope;
      const ledger = state.ledger;
      this.deps.pause.requireUnpaused(ledger);
      requireActiveMarket(ledger, assetAddress);
      requirePositiveAmount(amount);

      const borrowed = getBorrow(ledger, account, assetAddress);
      if (borrowed < amount) {
        throw new DomainError(ErrorCode.InsufficientBorrow, 422, 'Borrow is smaller than the repayment.', {
          borrowed: borrowed.toString(),
          amount: amount.toString(),
        });
      }

      debitBorrow(ledger, account, assetAddress, amount, now);
      await this.settle(scope, [{ kind: 'pull', asset: assetAddress, account, amount }]);
      record({ type: 'Repay', payload: { account, asset: assetAddress, amount } });
      return structuredClone(getUser(ledger, account));
    });
  }

  async liquidate(caller: string, account: string, asset: string, amount: bigint): Promise<LiquidationPlan> {
    const liquidator = toAddress(caller, 'caller');
    const target = toAddress(account, 'account');
    const assetAddress = toAddress(asset, 'asset', ErrorCode.InvalidAsset);

    return this.execute('liquidate', { liquidator, account: target, asset: assetAddress, amount }, async (scope) => {
      const { state, now, record } = scope;
      this.deps.pause.requireUnpaused(state.ledger);
      const plan = planLiquidation(state.ledger, target, assetAddress, amount);

      applyLiquidation(state.ledger, plan, now);
      await this.settle(scope, [
        { kind: 'pull', asset: plan.asset, account: liquidator, amount: plan.amount },
        { kind: 'push', asset: plan.collateralAsset, account: liquidator, amount: plan.seizeAmount },
      ]);
      record({
        type: 'Liquidate',
        payload: {
          liquidator,
          account: target,
          asset: plan.asset,
          amount: plan.amount,
          collateralAsset: plan.collateralAsset,
          seizeAmount: plan.seizeAmount,
        },
      });
      return plan;
    });
  }

  // ─── Read-only queries ──────────────────────────────────────────────────────

  getMarket(asset: string): Market | null {
    return getMarket(this.ledger(), toAddress(asset, 'asset', ErrorCode.InvalidAsset));
  }

  listMarkets(): Market[] {
    return listMarkets(this.ledger());
  }

  getSupportedAssets(): Address[] {
    return this.ledger().supportedAssets;
  }

  getAccount(account: string): AccountSnapshot {
    const address = toAddress(account, 'account');
    const ledger = this.ledger();
    const ratio = collateralizationRatio(ledger, address);

    return {
      account: address,
      position: getUser(ledger, address),
      ...accountBalances(ledger, address),
      nonce: getNonce(ledger, address),
      collateralizationRatio: ratio,
      liquidatable: isLiquidatable(ledger, address),
    };
  }

  getBalances(account: string, asset: string): AccountBalances {
    const address = toAddress(account, 'account');
    const assetAddress = toAddress(asset, 'asset', ErrorCode.InvalidAsset);
    const ledger = this.ledger();

    return {
      account: address,
      asset: assetAddress,
      deposit: getDeposit(ledger, address, assetAddress),
      borrow: getBorrow(ledger, address, assetAddress),
    };
  }

  getNonce(account: string): bigint {
    return getNonce(this.ledger(), toAddress(account, 'account'));
  }

  collateralizationRatio(account: string): bigint {
    return collateralizationRatio(this.ledger(), toAddress(account, 'account'));
  }

  canWithdraw(account: string, asset: string, amount: bigint): boolean {
    return canWithdraw(
      this.ledger(),
      toAddress(account, 'account'),
      toAddress(asset, 'asset', ErrorCode.InvalidAsset),
      amount,
    );
  }

  canBorrow(account: string, asset: string, amount: bigint): boolean {
    return canBorrow(
      this.ledger(),
      toAddress(account, 'account'),
      toAddress(asset, 'asset', ErrorCode.InvalidAsset),
      amount,
    );
  }

  isLiquidatable(account: string): boolean {
    return isLiquidatable(this.ledger(), toAddress(account, 'account'));
  }

  isPaused(): boolean {
    return this.deps.pause.isPaused(this.ledger());
  }

  /** Most recent notifications, oldest first. */
  listNotifications(limit: number): LedgerNotification[] {
    return limit <= 0 ? [] : this.deps.store.read((state) => state.notifications.slice(-limit));
  }

  getMetrics(): OperationMetrics {
    return structuredClone(this.metrics);
  }

  // ─── Internals ──────────────────────────────────────────────────────────────

  private ledger(): LedgerState {
    return this.deps.store.read((state) => state.ledger);
  }

  private async depositBody(scope: OperationScope, account: Address, asset: Address, amount: bigint): Promise<void> {
    const ledger = scope.state.ledger;
    requireActiveMarket(ledger, asset);
    requirePositiveAmount(amount);

    creditDeposit(ledger, account, asset, amount, scope.now);
    await this.settle(scope, [{ kind: 'pull', asset, account, amount }]);
    scope.record({ type: 'Deposit', payload: { account, asset, amount } });
  }

  /**
   * Runs token legs in order and records them on the scope. If a leg fails, the legs already
   * completed are reversed before the original failure propagates.
   */
  private async settle(scope: OperationScope, legs: TransferLeg[]): Promise<void> {
    const completed: TransferLeg[] = [];

    try {
      for (const leg of legs) {
        await this.move(leg);
        completed.push(leg);
      }
    } catch (error) {
      await this.compensate(completed);
      throw error;
    }
    scope.settled.push(...completed);
  }

  private async move(leg: TransferLeg): Promise<void> {
    if (leg.kind === 'pull') {
      await this.deps.transfers.pull(leg.asset, leg.account, leg.amount);
    } else {
      await this.deps.transfers.push(leg.asset, leg.account, leg.amount);
    }
  }

  /**
   * Reverses legs newest first. A pull is returned from custody; a push is pulled back from its
   * recipient, which needs the recipient's allowance. Legs that cannot be reversed are counted
   * and logged for reconciliation.
   */
  private async compensate(legs: TransferLeg[]): Promise<void> {
    for (const leg of [...legs].reverse()) {
      try {
        await this.move(reverseLeg(leg));
      } catch (error) {
        this.metrics.compensationFailures += 1;
        await this.safeLog('error', 'ledger.transfer.compensation_failed', {
          ...leg,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
  }

  /** Log writes never decide an operation's outcome; a failed one is counted instead. */
  private async safeLog(level: LogLevel, event: string, data: Record<string, unknown>): Promise<void> {
    try {
      await this.deps.logger.log(level, event, data);
    } catch {
      this.metrics.logFailures += 1;
    }
  }

  private async execute<T>(
    operation: string,
    context: Record<string, unknown>,
    work: (scope: OperationScope) => Promise<T> | T,
  ): Promise<T> {
    const pending: LedgerNotification[] = [];
    const settled: TransferLeg[] = [];
    let result: T;

    try {
      result = await this.deps.store.transaction(
        (state) => work({
          state,
          now: this.clock(),
          settled,
          record: (input) => {
            const notification: LedgerNotification = { ...input, id: uuid(), createdAt: isoNow() };
            state.notifications.push(notification);
            pending.push(notification);
          },
        }),
        { onCommitFailure: () => this.compensate(settled) },
      );
    } catch (error) {
      const code = error instanceof DomainError ? error.code : ErrorCode.InternalError;
      this.metrics.rejected[operation] = (this.metrics.rejected[operation] ?? 0) + 1;
      this.metrics.rejectionsByCode[code] = (this.metrics.rejectionsByCode[code] ?? 0) + 1;
      await this.safeLog('warn', `ledger.${operation}.rejected`, {
        ...context,
        code,
        message: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }

    this.metrics.committed[operation] = (this.metrics.committed[operation] ?? 0) + 1;
    for (const notification of pending) {
      eventBus.publish(notification);
    }
    await this.safeLog('info', `ledger.${operation}`, context);
    return result;
  }
}
