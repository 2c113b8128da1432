import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { getAddress, HDNodeWallet, Wallet } from 'ethers';
import { AppConfig, config as baseConfig } from '../src/config.js';
import { MarketParams } from '../src/domain/ledger/marketRegistry.js';
import { LedgerPausePolicy, OwnerAccessPolicy } from '../src/domain/ledger/policies.js';
import { EventLogger } from '../src/infra/logger.js';
import { StateStore } from '../src/infra/storage/stateStore.js';
import { AssetTransfer } from '../src/integrations/assets/assetTransfer.js';
import { InMemoryTokenLedger } from '../src/integrations/assets/tokenLedger.js';
import { LendingPoolService } from '../src/services/lendingPoolService.js';

export const ASSET_A = getAddress(`0x${'a1'.repeat(20)}`);
export const ASSET_B = getAddress(`0x${'b2'.repeat(20)}`);
export const ASSET_C = getAddress(`0x${'c3'.repeat(20)}`);
export const CUSTODY = getAddress(`0x${'cc'.repeat(20)}`);

/** Fixed unix-seconds clock for pool fixtures. */
export const NOW = 1_700_000_000;

export const DEFAULT_MARKET: MarketParams = {
  collateralFactor: 8_000n,
  supplyRate: 300n,
  borrowRate: 500n,
};

export async function createTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'collateral-ledger-test-'));
}

export function buildTestConfig(
  dir: string,
  overrides: { ownerAddress?: string; opsPerMinute?: number; startPaused?: boolean } = {},
): AppConfig {
  return {
    ...baseConfig,
    app: { ...baseConfig.app, env: 'test', port: 0 },
    paths: {
      dataDir: dir,
      stateFile: path.join(dir, 'ledger.json'),
      logFile: path.join(dir, 'events.ndjson'),
    },
    ledger: {
      ...baseConfig.ledger,
      ownerAddress: overrides.ownerAddress ?? baseConfig.ledger.ownerAddress,
      custodyAddress: CUSTODY,
      startPaused: overrides.startPaused ?? false,
    },
    rateLimit: { opsPerMinute: overrides.opsPerMinute ?? 1_000 },
  };
}

export interface PoolFixture {
  dir: string;
  store: StateStore;
  logger: EventLogger;
  tokens: InMemoryTokenLedger;
  pool: LendingPoolService;
  owner: HDNodeWallet;
  clock: { now: number };
  /** Mints `amount` to `account` and approves custody for all of it. */
  fund(account: string, asset: string, amount: bigint): void;
  cleanup(): Promise<void>;
}

export async function createPoolFixture(options: {
  transfers?: (tokens: InMemoryTokenLedger) => AssetTransfer;
  startPaused?: boolean;
} = {}): Promise<PoolFixture> {
  const dir = await createTempDir();
  const store = new StateStore(path.join(dir, 'ledger.json'), { startPaused: options.startPaused });
  await store.init();
  const logger = new EventLogger(path.join(dir, 'events.ndjson'));
  await logger.init();

  const owner = Wallet.createRandom();
  const tokens = new InMemoryTokenLedger(CUSTODY);
  const clock = { now: NOW };

  const pool = new LendingPoolService({
    store,
    transfers: options.transfers ? options.transfers(tokens) : tokens,
    access: new OwnerAccessPolicy(owner.address),
    pause: new LedgerPausePolicy(),
    logger,
    clock: () => clock.now,
  });

  return {
    dir,
    store,
    logger,
    tokens,
    pool,
    owner,
    clock,
    fund(account, asset, amount) {
      const holder = getAddress(account);
      const token = getAddress(asset);
      tokens.mint(token, holder, amount);
      tokens.approve(token, holder, CUSTODY, tokens.allowance(token, holder, CUSTODY) + amount);
    },
    async cleanup() {
      await store.flush();
      await logger.flush();
      await fs.rm(dir, { recursive: true, force: true });
    },
  };
}
