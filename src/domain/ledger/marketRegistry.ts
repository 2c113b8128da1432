import { ZeroAddress } from 'ethers';
import { DomainError, ErrorCode } from '../../errors/taxonomy.js';
import { Address, LedgerState, Market, MAX_COLLATERAL_FACTOR_BPS } from './ledgerTypes.js';

export interface MarketParams {
  collateralFactor: bigint;
  supplyRate: bigint;
  borrowRate: bigint;
}

const validateParams = (params: MarketParams): void => {
  if (params.collateralFactor < 0n || params.collateralFactor > MAX_COLLATERAL_FACTOR_BPS) {
    throw new DomainError(
      ErrorCode.InvalidCollateralFactor,
      400,
      `Collateral factor must be between 0 and ${MAX_COLLATERAL_FACTOR_BPS} basis points.`,
      { collateralFactor: params.collateralFactor.toString() },
    );
  }

  if (params.supplyRate < 0n || params.borrowRate < 0n) {
    throw new DomainError(ErrorCode.InvalidPayload, 400, 'Rates must be non-negative basis points.');
  }
};

export const getMarket = (ledger: LedgerState, asset: Address): Market | null => ledger.markets[asset] ?? null;

export const requireActiveMarket = (ledger: LedgerState, asset: Address): Market => {
  const market = ledger.markets[asset];
  if (!market || !market.isActive) {
    throw new DomainError(ErrorCode.MarketInactive, 409, `Market for ${asset} is not active.`, { asset });
  }
  return market;
};

/** Every market in registry order. */
export const listMarkets = (ledger: LedgerState): Market[] => ledger.supportedAssets
  .map((asset) => ledger.markets[asset])
  .filter((market): market is Market => market !== undefined);

export const listActiveMarkets = (ledger: LedgerState): Market[] => listMarkets(ledger)
  .filter((market) => market.isActive);

export const addMarket = (
  ledger: LedgerState,
  asset: Address,
  params: MarketParams,
  now: string,
): Market => {
  if (asset === ZeroAddress) {
    throw new DomainError(ErrorCode.InvalidAsset, 400, 'Asset must not be the zero address.');
  }

  validateParams(params);

  if (ledger.markets[asset]?.isActive) {
    throw new DomainError(ErrorCode.MarketExists, 409, `Market for ${asset} already exists.`, { asset });
  }

  const market: Market = {
    asset,
    totalSupply: 0n,
    totalBorrow: 0n,
    supplyRate: params.supplyRate,
    borrowRate: params.borrowRate,
    collateralFactor: params.collateralFactor,
    isActive: true,
    createdAt: now,
    updatedAt: now,
  };

  ledger.markets[asset] = market;
  if (!ledger.supportedAssets.includes(asset)) {
    ledger.supportedAssets.push(asset);
  }

  return market;
};

/** Overwrites the risk and rate parameters. Totals are untouched. */
export const updateMarket = (
  ledger: LedgerState,
  asset: Address,
  params: MarketParams,
  now: string,
): Market => {
  const market = requireActiveMarket(ledger, asset);
  validateParams(params);

  market.collateralFactor = params.collateralFactor;
  market.supplyRate = params.supplyRate;
  market.borrowRate = params.borrowRate;
  market.updatedAt = now;

  return market;
};
