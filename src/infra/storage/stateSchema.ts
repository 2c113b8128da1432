import { z } from 'zod';
import { LedgerNotification, LedgerState, Market, UserPosition } from '../../domain/ledger/ledgerTypes.js';
import { AppState } from '../../types.js';
import { jsonReplacer } from '../../utils/json.js';

// On disk every bigint is a decimal string.

const uint = z.string().regex(/^\d+$/, 'expected an unsigned integer string').transform((value) => BigInt(value));
const address = z.string().min(1);

const marketSchema: z.ZodType<Market, z.ZodTypeDef, unknown> = z.object({
  asset: address,
  totalSupply: uint,
  totalBorrow: uint,
  supplyRate: uint,
  borrowRate: uint,
  collateralFactor: uint,
  isActive: z.boolean(),
  createdAt: z.string(),
  updatedAt: z.string(),
});

const userSchema: z.ZodType<UserPosition, z.ZodTypeDef, unknown> = z.object({
  totalDeposited: uint,
  totalBorrowed: uint,
  lastUpdateTime: z.number().int().nonnegative(),
  isActive: z.boolean(),
});

const balanceBookSchema = z.record(address, z.record(address, uint)).default({});

const ledgerSchema: z.ZodType<LedgerState, z.ZodTypeDef, unknown> = z.object({
  markets: z.record(address, marketSchema).default({}),
  supportedAssets: z.array(address).default([]),
  users: z.record(address, userSchema).default({}),
  deposits: balanceBookSchema,
  borrows: balanceBookSchema,
  nonces: z.record(address, uint).default({}),
  paused: z.boolean().default(false),
});

const flow = z.object({ account: address, asset: address, amount: uint });

const notification = <T extends string, P extends z.ZodTypeAny>(type: T, payload: P) => z.object({
  id: z.string(),
  type: z.literal(type),
  payload,
  createdAt: z.string(),
});

const notificationSchema: z.ZodType<LedgerNotification, z.ZodTypeDef, unknown> = z.discriminatedUnion('type', [
  notification('MarketAdded', z.object({
    asset: address,
    collateralFactor: uint,
    supplyRate: uint,
    borrowRate: uint,
  })),
  notification('MarketUpdated', z.object({ asset: address, collateralFactor: uint })),
  notification('RatesUpdated', z.object({ asset: address, supplyRate: uint, borrowRate: uint })),
  notification('Deposit', flow),
  notification('Withdraw', flow),
  notification('Borrow', flow),
  notification('Repay', flow),
  notification('Liquidate', z.object({
    liquidator: address,
    account: address,
    asset: address,
    amount: uint,
    collateralAsset: address,
    seizeAmount: uint,
  })),
  notification('Paused', z.object({ account: address })),
  notification('Unpaused', z.object({ account: address })),
  notification('AssetsRecovered', z.object({ asset: address, to: address, amount: uint })),
]);

export const persistedStateSchema: z.ZodType<AppState, z.ZodTypeDef, unknown> = z.object({
  ledger: ledgerSchema,
  notifications: z.array(notificationSchema).default([]),
  startedAt: z.string(),
});

export const serializeState = (state: AppState): string => JSON.stringify(state, jsonReplacer, 2);
