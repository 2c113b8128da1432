// ─── Collateral Ledger: SDK Quick-Start ───────────────────────────────────
// Full flow: add market → mint + approve → deposit → borrow → inspect account
//
// Usage (server started with LEDGER_OWNER_ADDRESS set to OWNER_ADDRESS):
//   OWNER_ADDRESS=0x... npx tsx examples/quickstart.ts
//   API_URL=http://ledger.internal:8787 OWNER_ADDRESS=0x... npx tsx examples/quickstart.ts
// ────────────────────────────────────────────────────────────────────────────

import { Wallet } from 'ethers';
import { LedgerAPIError, LedgerClient } from '../src/sdk/index.js';

const API_URL = process.env.API_URL ?? 'http://localhost:8787';
const OWNER_ADDRESS = process.env.OWNER_ADDRESS ?? '0x000000000000000000000000000000000000a11c';
const ASSET = process.env.ASSET ?? '0x00000000000000000000000000000000000000A1';

async function main(): Promise<void> {
  console.log(`\nCollateral ledger quick-start against ${API_URL}\n`);

  const publicClient = new LedgerClient(API_URL);
  const health = await publicClient.health();
  console.log(`Health: ${health.status} | markets=${health.markets} | paused=${health.paused}`);

  // ── 1. Owner lists the asset ───────────────────────────────────────────
  const owner = publicClient.as(OWNER_ADDRESS);
  try {
    const market = await owner.addMarket({
      asset: ASSET,
      collateralFactor: '8000',
      supplyRate: '300',
      borrowRate: '500',
    });
    console.log(`Market added: ${market.asset} (factor ${market.collateralFactor} bp)`);
  } catch (error) {
    if (!(error instanceof LedgerAPIError && error.code === 'market_exists')) throw error;
    console.log(`Market already listed: ${ASSET}`);
  }

  // ── 2. Fund a fresh account ────────────────────────────────────────────
  const account = Wallet.createRandom().address;
  const client = publicClient.as(account);
  await owner.mint({ asset: ASSET, to: account, amount: '1000' });
  await client.approve({ asset: ASSET, amount: '1000' });
  console.log(`Funded ${account} with 1000 units`);

  // ── 3. Deposit and borrow ──────────────────────────────────────────────
  const afterDeposit = await client.deposit({ asset: ASSET, amount: '1000' });
  console.log(`Deposited: total ${afterDeposit.totalDeposited}`);

  const allowed = await client.canBorrow(account, ASSET, '700');
  console.log(`Can borrow 700: ${allowed}`);

  const afterBorrow = await client.borrow({ asset: ASSET, amount: '700' });
  console.log(`Borrowed: total ${afterBorrow.totalBorrowed}`);

  // ── 4. Inspect ─────────────────────────────────────────────────────────
  const snapshot = await client.getAccount(account);
  console.log(`Ratio: ${snapshot.collateralizationRatio} bp | liquidatable=${snapshot.liquidatable}`);

  try {
    await client.withdraw({ asset: ASSET, amount: '1000' });
  } catch (error) {
    if (!(error instanceof LedgerAPIError)) throw error;
    console.log(`Full withdrawal refused as expected: ${error.code}`);
  }

  const events = await publicClient.events(5);
  console.log(`\nLast ${events.length} notifications:`);
  for (const event of events) {
    console.log(`  ${event.createdAt} ${event.type}`);
  }
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
