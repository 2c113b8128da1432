import { describe, it, expect, vi } from 'vitest';
import { LedgerAPIError, LedgerClient } from '../src/sdk/index.js';

// ─── Mock fetch helper ─────────────────────────────────────────────────────

function mockFetch(status: number, body: unknown) {
  return vi.fn<typeof globalThis.fetch>()
    .mockResolvedValue(new Response(JSON.stringify(body), {
      status,
      headers: { 'content-type': 'application/json' },
    }));
}

const BASE = 'http://localhost:8787';
const ACCOUNT = '0x00000000000000000000000000000000000A11cE';
const ASSET = '0xa1A1a1a1A1A1A1A1A1a1a1A1a1A1a1A1A1A1A1a1';

describe('LedgerClient', () => {
  it('strips trailing slashes from baseUrl', async () => {
    const fetch = mockFetch(200, { status: 'ok' });
    const client = new LedgerClient({ baseUrl: `${BASE}///`, fetch });

    await client.health();

    expect(fetch).toHaveBeenCalledWith(`${BASE}/health`, expect.objectContaining({ method: 'GET' }));
  });

  it('sends the caller header and a JSON body on mutations', async () => {
    const position = { totalDeposited: '10', totalBorrowed: '0', lastUpdateTime: 1, isActive: true };
    const fetch = mockFetch(200, { position });
    const client = new LedgerClient({ baseUrl: BASE, account: ACCOUNT, fetch });

    const result = await client.deposit({ asset: ASSET, amount: '10' });

    expect(result).toEqual(position);
    expect(fetch).toHaveBeenCalledWith(`${BASE}/deposit`, {
      method: 'POST',
      headers: { 'content-type': 'application/json', 'x-account-address': ACCOUNT },
      body: JSON.stringify({ asset: ASSET, amount: '10' }),
    });
  });

  it('switches caller with as()', async () => {
    const fetch = mockFetch(200, { paused: true });
    const client = new LedgerClient({ baseUrl: BASE, fetch }).as(ACCOUNT);

    await client.pause();

    expect(fetch).toHaveBeenCalledWith(`${BASE}/admin/pause`, expect.objectContaining({
      headers: { 'content-type': 'application/json', 'x-account-address': ACCOUNT },
      body: '{}',
    }));
  });

  it('unwraps single-key envelopes', async () => {
    const liquidation = { account: ACCOUNT, asset: ASSET, amount: '9', collateralAsset: ASSET, seizeAmount: '9' };
    const client = new LedgerClient({ baseUrl: BASE, account: ACCOUNT, fetch: mockFetch(200, { liquidation }) });

    expect(await client.liquidate({ account: ACCOUNT, asset: ASSET, amount: '9' })).toEqual(liquidation);
  });

  it('builds safety-check query strings', async () => {
    const fetch = mockFetch(200, { allowed: true });
    const client = new LedgerClient(BASE);

    const allowed = await new LedgerClient({ baseUrl: BASE, fetch }).canBorrow(ACCOUNT, ASSET, '25');

    expect(client).toBeInstanceOf(LedgerClient);
    expect(allowed).toBe(true);
    expect(fetch).toHaveBeenCalledWith(
      `${BASE}/accounts/${ACCOUNT}/can-borrow?asset=${ASSET}&amount=25`,
      expect.anything(),
    );
  });

  it('raises LedgerAPIError with the server envelope', async () => {
    const fetch = mockFetch(422, {
      error: { code: 'unsafe_borrow', message: 'Borrow would leave the position undercollateralized.', details: { ratio: '9000' } },
    });
    const client = new LedgerClient({ baseUrl: BASE, account: ACCOUNT, fetch });

    const error = await client.borrow({ asset: ASSET, amount: '1' }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(LedgerAPIError);
    expect(error).toMatchObject({
      status: 422,
      code: 'unsafe_borrow',
      message: 'Borrow would leave the position undercollateralized.',
      details: { ratio: '9000' },
    });
  });

  it('falls back to an HTTP code when the error body is not an envelope', async () => {
    const fetch = vi.fn<typeof globalThis.fetch>()
      .mockResolvedValue(new Response('bad gateway', { status: 502 }));
    const client = new LedgerClient({ baseUrl: BASE, fetch });

    await expect(client.listMarkets()).rejects.toMatchObject({
      name: 'LedgerAPIError',
      status: 502,
      code: 'HTTP_502',
      message: 'Request failed: GET /markets → 502',
    });
  });
});
