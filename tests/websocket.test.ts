import fs from 'node:fs/promises';
import { Wallet } from 'ethers';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { connectedClients, formatFeedMessage } from '../src/api/websocket.js';
import { AppContext, buildApp } from '../src/app.js';
import { eventBus } from '../src/infra/eventBus.js';
import { ASSET_A, buildTestConfig, createTempDir } from './helpers.js';

const owner = Wallet.createRandom();

let ctx: AppContext;
let dir: string;

beforeEach(async () => {
  dir = await createTempDir();
  ctx = await buildApp(buildTestConfig(dir, { ownerAddress: owner.address }));
});

afterEach(async () => {
  eventBus.clear();
  await ctx.app.close();
  await ctx.stateStore.flush();
  await fs.rm(dir, { recursive: true, force: true });
});

describe('WebSocket ledger feed', () => {
  it('writes bigint payloads as decimal strings', () => {
    const message = JSON.parse(formatFeedMessage('position.deposit', { amount: 12n }));

    expect(message.type).toBe('position.deposit');
    expect(message.data).toEqual({ amount: '12' });
    expect(typeof message.ts).toBe('string');
  });

  it('starts with no clients', () => {
    expect(connectedClients()).toBe(0);
  });

  it('publishes market.added when a market is created over HTTP', async () => {
    // A socket client is out of reach here; the bus is what the feed forwards.
    const received: Array<{ event: string; data: unknown }> = [];
    eventBus.on('market.added', (event, data) => {
      received.push({ event, data });
    });

    await ctx.app.inject({
      method: 'POST',
      url: '/markets',
      headers: { 'x-account-address': owner.address },
      payload: { asset: ASSET_A, collateralFactor: '7500', supplyRate: '0', borrowRate: '0' },
    });

    expect(received).toHaveLength(1);
    expect(received[0].event).toBe('market.added');
    expect(received[0].data).toMatchObject({
      type: 'MarketAdded',
      payload: { asset: ASSET_A, collateralFactor: 7_500n },
    });
  });
});
