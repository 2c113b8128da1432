// ─── LedgerClient ──────────────────────────────────────────────────────────
// Dependency-free client for the collateral ledger HTTP API.
// Uses the runtime's fetch unless one is supplied.
// ────────────────────────────────────────────────────────────────────────────

import type {
  AccountBalances,
  AccountSnapshot,
  AddMarketInput,
  AmountInput,
  APIErrorEnvelope,
  HealthResponse,
  LedgerNotification,
  LiquidateInput,
  Liquidation,
  Market,
  MarketParamsInput,
  MarketsResponse,
  MetricsResponse,
  SignedDepositInput,
  TokenBalance,
  TransferOutInput,
  Uint,
  UserPosition,
} from './types.js';

export class LedgerAPIError extends Error {
  constructor(
    public readonly status: number,
    public readonly code: string,
    message: string,
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = 'LedgerAPIError';
  }
}

export interface LedgerClientOptions {
  /** Base URL of the API server (e.g. "http://localhost:8787"). */
  baseUrl: string;
  /** Sent as `x-account-address`; required for every state-changing call. */
  account?: string;
  fetch?: typeof globalThis.fetch;
}

const isErrorEnvelope = (value: unknown): value is APIErrorEnvelope => {
  if (typeof value !== 'object' || value === null || !('error' in value)) return false;
  const { error } = value;
  return typeof error === 'object' && error !== null && 'code' in error && 'message' in error;
};

export class LedgerClient {
  private readonly baseUrl: string;
  private readonly account?: string;
  private readonly _fetch: typeof globalThis.fetch;

  constructor(baseUrl: string, account?: string);
  constructor(opts: LedgerClientOptions);
  constructor(baseUrlOrOpts: string | LedgerClientOptions, account?: string) {
    if (typeof baseUrlOrOpts === 'string') {
      this.baseUrl = baseUrlOrOpts.replace(/\/+$/, '');
      this.account = account;
      this._fetch = globalThis.fetch;
    } else {
      this.baseUrl = baseUrlOrOpts.baseUrl.replace(/\/+$/, '');
      this.account = baseUrlOrOpts.account;
      this._fetch = baseUrlOrOpts.fetch ?? globalThis.fetch;
    }
  }

  /** Same server, different caller. */
  as(account: string): LedgerClient {
    return new LedgerClient({ baseUrl: this.baseUrl, account, fetch: this._fetch });
  }

  // ─── Internal helpers ──────────────────────────────────────────────────

  private headers(): Record<string, string> {
    const h: Record<string, string> = { 'content-type': 'application/json' };
    if (this.account) h['x-account-address'] = this.account;
    return h;
  }

  private async request<T>(method: string, path: string, body?: unknown): Promise<T> {
    const res = await this._fetch(`${this.baseUrl}${path}`, {
      method,
      headers: this.headers(),
      body: body !== undefined ? JSON.stringify(body) : undefined,
    });

    if (!res.ok) {
      // Error bodies from proxies may not be JSON.
      const errorBody: unknown = await res.json().catch(() => undefined);
      const envelope = isErrorEnvelope(errorBody) ? errorBody.error : undefined;
      throw new LedgerAPIError(
        res.status,
        envelope?.code ?? `HTTP_${res.status}`,
        envelope?.message ?? `Request failed: ${method} ${path} → ${res.status}`,
        envelope?.details,
      );
    }

    return (await res.json()) as T;
  }

  private get<T>(path: string): Promise<T> {
    return this.request<T>('GET', path);
  }

  private post<T>(path: string, body: unknown = {}): Promise<T> {
    return this.request<T>('POST', path, body);
  }

  // ─── Markets ───────────────────────────────────────────────────────────

  async listMarkets(): Promise<MarketsResponse> {
    return this.get<MarketsResponse>('/markets');
  }

  async getMarket(asset: string): Promise<Market> {
    const result = await this.get<{ market: Market }>(`/markets/${encodeURIComponent(asset)}`);
    return result.market;
  }

  /** Owner only. */
  async addMarket(input: AddMarketInput): Promise<Market> {
    const result = await this.post<{ market: Market }>('/markets', input);
    return result.market;
  }

  /** Owner only. Replaces the collateral factor and both rates. */
  async updateMarket(asset: string, params: MarketParamsInput): Promise<Market> {
    const result = await this.request<{ market: Market }>('PUT', `/markets/${encodeURIComponent(asset)}`, params);
    return result.market;
  }

  // ─── Accounts ──────────────────────────────────────────────────────────

  async getAccount(account: string): Promise<AccountSnapshot> {
    const result = await this.get<{ account: AccountSnapshot }>(`/accounts/${encodeURIComponent(account)}`);
    return result.account;
  }

  async getBalances(account: string, asset: string): Promise<AccountBalances> {
    return this.get<AccountBalances>(
      `/accounts/${encodeURIComponent(account)}/balances/${encodeURIComponent(asset)}`,
    );
  }

  async getNonce(account: string): Promise<Uint> {
    const result = await this.get<{ account: string; nonce: Uint }>(`/accounts/${encodeURIComponent(account)}/nonce`);
    return result.nonce;
  }

  async canWithdraw(account: string, asset: string, amount: Uint): Promise<boolean> {
    return this.safetyCheck('can-withdraw', account, asset, amount);
  }

  async canBorrow(account: string, asset: string, amount: Uint): Promise<boolean> {
    return this.safetyCheck('can-borrow', account, asset, amount);
  }

  private async safetyCheck(kind: string, account: string, asset: string, amount: Uint): Promise<boolean> {
    const params = new URLSearchParams({ asset, amount });
    const result = await this.get<{ allowed: boolean }>(
      `/accounts/${encodeURIComponent(account)}/${kind}?${params.toString()}`,
    );
    return result.allowed;
  }

  // ─── Positions ─────────────────────────────────────────────────────────

  async deposit(input: AmountInput): Promise<UserPosition> {
    return this.position('/deposit', input);
  }

  async depositWithSignature(input: SignedDepositInput): Promise<UserPosition> {
    return this.position('/deposit-with-signature', input);
  }

  async withdraw(input: AmountInput): Promise<UserPosition> {
    return this.position('/withdraw', input);
  }

  async borrow(input: AmountInput): Promise<UserPosition> {
    return this.position('/borrow', input);
  }

  async repay(input: AmountInput): Promise<UserPosition> {
    return this.position('/repay', input);
  }

  async liquidate(input: LiquidateInput): Promise<Liquidation> {
    const result = await this.post<{ liquidation: Liquidation }>('/liquidate', input);
    return result.liquidation;
  }

  private async position(path: string, input: AmountInput): Promise<UserPosition> {
    const result = await this.post<{ position: UserPosition }>(path, input);
    return result.position;
  }

  // ─── Administration ────────────────────────────────────────────────────

  async pause(): Promise<void> {
    await this.post('/admin/pause');
  }

  async unpause(): Promise<void> {
    await this.post('/admin/unpause');
  }

  async recoverAssets(input: TransferOutInput): Promise<void> {
    await this.post('/admin/recover', input);
  }

  async mint(input: TransferOutInput): Promise<TokenBalance> {
    const result = await this.post<{ balance: TokenBalance }>('/admin/mint', input);
    return result.balance;
  }

  // ─── Tokens ────────────────────────────────────────────────────────────

  /** Lets ledger custody pull up to `amount` of `asset` from the caller. */
  async approve(input: AmountInput): Promise<TokenBalance> {
    const result = await this.post<{ balance: TokenBalance }>('/tokens/approve', input);
    return result.balance;
  }

  async tokenBalance(asset: string, holder: string): Promise<TokenBalance> {
    const result = await this.get<{ balance: TokenBalance }>(
      `/tokens/${encodeURIComponent(asset)}/balances/${encodeURIComponent(holder)}`,
    );
    return result.balance;
  }

  // ─── System ────────────────────────────────────────────────────────────

  async events(limit?: number): Promise<LedgerNotification[]> {
    const path = limit ? `/events?limit=${limit}` : '/events';
    const result = await this.get<{ events: LedgerNotification[] }>(path);
    return result.events;
  }

  async health(): Promise<HealthResponse> {
    return this.get<HealthResponse>('/health');
  }

  async metrics(): Promise<MetricsResponse> {
    return this.get<MetricsResponse>('/metrics');
  }
}
