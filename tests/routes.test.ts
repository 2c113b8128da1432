import fs from 'node:fs/promises';
import { Wallet } from 'ethers';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { AppContext, buildApp } from '../src/app.js';
import { MAX_UINT256 } from '../src/domain/ledger/ledgerTypes.js';
import { signDepositAuthorization } from '../src/domain/ledger/signedAuthorization.js';
import { eventBus } from '../src/infra/eventBus.js';
import { ASSET_A, ASSET_B, buildTestConfig, createTempDir, CUSTODY, NOW } from './helpers.js';

const owner = Wallet.createRandom();
const alice = Wallet.createRandom();
const bob = Wallet.createRandom();

const market = { asset: ASSET_A, collateralFactor: '8000', supplyRate: '300', borrowRate: '500' };

describe('HTTP API', () => {
  let ctx: AppContext;
  let dir: string;

  const setup = async (overrides: { opsPerMinute?: number } = {}): Promise<void> => {
    dir = await createTempDir();
    ctx = await buildApp(buildTestConfig(dir, { ownerAddress: owner.address, ...overrides }), { clock: () => NOW });
  };

  const send = (method: 'GET' | 'POST' | 'PUT', url: string, caller?: string, payload?: Record<string, unknown>) => ctx.app.inject({
    method,
    url,
    headers: caller ? { 'x-account-address': caller } : {},
    ...(payload ? { payload } : {}),
  });

  /** Mint, approve and deposit `amount` of ASSET_A for `account`. */
  const depositFor = async (account: string, amount: string) => {
    await send('POST', '/admin/mint', owner.address, { asset: ASSET_A, to: account, amount });
    await send('POST', '/tokens/approve', account, { asset: ASSET_A, amount });
    return send('POST', '/deposit', account, { asset: ASSET_A, amount });
  };

  afterEach(async () => {
    eventBus.clear();
    await ctx.app.close();
    await ctx.stateStore.flush();
    await ctx.logger.flush();
    await fs.rm(dir, { recursive: true, force: true });
  });

  describe('with the default limits', () => {
    beforeEach(async () => {
      await setup();
    });

    it('describes the service', async () => {
      const res = await send('GET', '/');

      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({ name: 'collateral-ledger', version: '0.1.0', status: 'ok' });
    });

    it('reports health with runtime counters', async () => {
      const res = await send('GET', '/health');

      expect(res.json()).toMatchObject({
        status: 'ok',
        env: 'test',
        markets: 0,
        accounts: 0,
        paused: false,
        feedListenerFailures: 0,
      });
    });

    it('lets the owner add a market and serializes amounts as strings', async () => {
      const res = await send('POST', '/markets', owner.address, market);

      expect(res.statusCode).toBe(201);
      expect(res.json().market).toMatchObject({
        asset: ASSET_A,
        totalSupply: '0',
        totalBorrow: '0',
        collateralFactor: '8000',
        isActive: true,
      });

      const listed = await send('GET', '/markets');
      expect(listed.json().supportedAssets).toEqual([ASSET_A]);
    });

    it('requires the caller header on mutations', async () => {
      const res = await send('POST', '/markets', undefined, market);

      expect(res.statusCode).toBe(401);
      expect(res.json()).toEqual({
        error: { code: 'unauthorized', message: 'Missing x-account-address header.' },
      });
    });

    it('rejects malformed bodies before anything else', async () => {
      const res = await send('POST', '/markets', owner.address, { ...market, collateralFactor: -5 });

      expect(res.statusCode).toBe(400);
      expect(res.json().error.code).toBe('invalid_payload');
    });

    it('maps domain errors to their status codes', async () => {
      const forbidden = await send('POST', '/markets', alice.address, market);
      expect(forbidden.statusCode).toBe(403);
      expect(forbidden.json().error.code).toBe('unauthorized');

      const tooHigh = await send('POST', '/markets', owner.address, { ...market, collateralFactor: '10001' });
      expect(tooHigh.statusCode).toBe(400);
      expect(tooHigh.json().error.code).toBe('invalid_collateral_factor');

      const missing = await send('GET', `/markets/${ASSET_B}`);
      expect(missing.statusCode).toBe(404);
      expect(missing.json().error.code).toBe('market_not_found');

      const inactive = await send('POST', '/deposit', alice.address, { asset: ASSET_B, amount: '1' });
      expect(inactive.statusCode).toBe(409);
      expect(inactive.json().error.code).toBe('market_inactive');
    });

    it('runs a deposit and borrow through to the account view', async () => {
      await send('POST', '/markets', owner.address, market);

      const deposited = await depositFor(alice.address, '1000');
      expect(deposited.statusCode).toBe(200);
      expect(deposited.json()).toEqual({
        position: { totalDeposited: '1000', totalBorrowed: '0', lastUpdateTime: NOW, isActive: true },
      });

      const before = await send('GET', `/accounts/${alice.address}`);
      expect(before.json().account.collateralizationRatio).toBe(MAX_UINT256.toString());

      const borrowed = await send('POST', '/borrow', alice.address, { asset: ASSET_A, amount: '1000' });
      expect(borrowed.json().position.totalBorrowed).toBe('1000');

      const account = await send('GET', `/accounts/${alice.address}`);
      expect(account.json().account).toMatchObject({
        account: alice.address,
        deposits: { [ASSET_A]: '1000' },
        borrows: { [ASSET_A]: '1000' },
        nonce: '0',
        collateralizationRatio: '8000',
        liquidatable: false,
      });

      const canBorrow = await send('GET', `/accounts/${alice.address}/can-borrow?asset=${ASSET_A}&amount=1`);
      expect(canBorrow.json()).toEqual({ allowed: false });

      const canWithdraw = await send('GET', `/accounts/${alice.address}/can-withdraw?asset=${ASSET_A}&amount=0`);
      expect(canWithdraw.json()).toEqual({ allowed: true });

      const balances = await send('GET', `/accounts/${alice.address}/balances/${ASSET_A}`);
      expect(balances.json()).toEqual({ account: alice.address, asset: ASSET_A, deposit: '1000', borrow: '1000' });

      const tokens = await send('GET', `/tokens/${ASSET_A}/balances/${alice.address}`);
      expect(tokens.json().balance).toEqual({ asset: ASSET_A, holder: alice.address, balance: '1000', allowance: '0' });
    });

    it('accepts a signed deposit once', async () => {
      await send('POST', '/markets', owner.address, market);
      await send('POST', '/admin/mint', owner.address, { asset: ASSET_A, to: alice.address, amount: '500' });
      await send('POST', '/tokens/approve', alice.address, { asset: ASSET_A, amount: '500' });

      const auth = await signDepositAuthorization(alice, ASSET_A, 200n, 0n, BigInt(NOW + 60));
      const body = {
        asset: ASSET_A,
        amount: '200',
        nonce: '0',
        deadline: String(NOW + 60),
        signature: auth.signature,
      };

      const first = await send('POST', '/deposit-with-signature', alice.address, body);
      expect(first.statusCode).toBe(200);
      expect(first.json().position.totalDeposited).toBe('200');

      const replay = await send('POST', '/deposit-with-signature', alice.address, body);
      expect(replay.statusCode).toBe(401);
      expect(replay.json().error.code).toBe('invalid_nonce');

      const nonce = await send('GET', `/accounts/${alice.address}/nonce`);
      expect(nonce.json()).toEqual({ account: alice.address, nonce: '1' });
    });

    it('liquidates through the API', async () => {
      await send('POST', '/markets', owner.address, market);
      await depositFor(alice.address, '1000');
      await send('POST', '/borrow', alice.address, { asset: ASSET_A, amount: '900' });
      await send('PUT', `/markets/${ASSET_A}`, owner.address, { collateralFactor: '3000', supplyRate: '300', borrowRate: '500' });

      await send('POST', '/admin/mint', owner.address, { asset: ASSET_A, to: bob.address, amount: '900' });
      await send('POST', '/tokens/approve', bob.address, { asset: ASSET_A, amount: '900' });
      const res = await send('POST', '/liquidate', bob.address, { account: alice.address, asset: ASSET_A, amount: '900' });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({
        liquidation: {
          account: alice.address,
          asset: ASSET_A,
          amount: '900',
          collateralAsset: ASSET_A,
          seizeAmount: '945',
        },
      });
    });

    it('pauses, blocks handlers and unpauses', async () => {
      await send('POST', '/markets', owner.address, market);

      const paused = await send('POST', '/admin/pause', owner.address);
      expect(paused.json()).toEqual({ paused: true });

      const blocked = await depositFor(alice.address, '10');
      expect(blocked.statusCode).toBe(423);
      expect(blocked.json().error.code).toBe('protocol_paused');

      const auth = await signDepositAuthorization(alice, ASSET_A, 10n, 0n, BigInt(NOW + 60));
      const refused = [
        await send('POST', '/withdraw', alice.address, { asset: ASSET_A, amount: '1' }),
        await send('POST', '/borrow', alice.address, { asset: ASSET_A, amount: '1' }),
        await send('POST', '/repay', alice.address, { asset: ASSET_A, amount: '1' }),
        await send('POST', '/liquidate', bob.address, { account: alice.address, asset: ASSET_A, amount: '1' }),
        await send('POST', '/deposit-with-signature', alice.address, {
          asset: ASSET_A,
          amount: '10',
          nonce: '0',
          deadline: String(NOW + 60),
          signature: auth.signature,
        }),
      ];
      expect(refused.map((res) => [res.statusCode, res.json().error.code])).toEqual(
        Array.from({ length: 5 }, () => [423, 'protocol_paused']),
      );

      const nonce = await send('GET', `/accounts/${alice.address}/nonce`);
      expect(nonce.json()).toEqual({ account: alice.address, nonce: '0' });

      const unpaused = await send('POST', '/admin/unpause', owner.address);
      expect(unpaused.json()).toEqual({ paused: false });

      const again = await send('POST', '/admin/unpause', owner.address);
      expect(again.statusCode).toBe(409);
      expect(again.json().error.code).toBe('protocol_not_paused');
    });

    it('recovers custody balances for the owner', async () => {
      await send('POST', '/admin/mint', owner.address, { asset: ASSET_B, to: CUSTODY, amount: '40' });

      const res = await send('POST', '/admin/recover', owner.address, { asset: ASSET_B, to: bob.address, amount: '40' });
      expect(res.json()).toEqual({ recovered: true });

      const balance = await send('GET', `/tokens/${ASSET_B}/balances/${bob.address}`);
      expect(balance.json().balance.balance).toBe('40');
    });

    it('pages recent notifications oldest first', async () => {
      await send('POST', '/markets', owner.address, market);
      await depositFor(alice.address, '10');

      const res = await send('GET', '/events?limit=1');
      const { events } = res.json();
      expect(events).toHaveLength(1);
      expect(events[0]).toMatchObject({
        type: 'Deposit',
        payload: { account: alice.address, asset: ASSET_A, amount: '10' },
      });

      const bad = await send('GET', '/events?limit=zero');
      expect(bad.statusCode).toBe(400);
    });

    it('counts operations in /metrics', async () => {
      await send('POST', '/markets', owner.address, market);
      await send('POST', '/markets', owner.address, market);

      const res = await send('GET', '/metrics');
      expect(res.json().operations).toEqual({
        committed: { addMarket: 1 },
        rejected: { addMarket: 1 },
        rejectionsByCode: { market_exists: 1 },
        logFailures: 0,
        compensationFailures: 0,
      });
    });
  });

  describe('with a tight rate limit', () => {
    beforeEach(async () => {
      await setup({ opsPerMinute: 2 });
    });

    it('answers 429 once the caller runs out of operations', async () => {
      await send('POST', '/tokens/approve', alice.address, { asset: ASSET_A, amount: '1' });
      await send('POST', '/tokens/approve', alice.address, { asset: ASSET_A, amount: '1' });
      const limited = await send('POST', '/tokens/approve', alice.address, { asset: ASSET_A, amount: '1' });

      expect(limited.statusCode).toBe(429);
      expect(limited.json().error).toMatchObject({
        code: 'rate_limited',
        details: { retryAfterSeconds: 30, limit: 2 },
      });

      const other = await send('POST', '/tokens/approve', bob.address, { asset: ASSET_A, amount: '1' });
      expect(other.statusCode).toBe(200);
    });
  });
});
