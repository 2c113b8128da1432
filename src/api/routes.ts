import { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';
import { AppConfig } from '../config.js';
import { DomainError, ErrorCode, toErrorEnvelope } from '../errors/taxonomy.js';
import { LendingPoolService } from '../services/lendingPoolService.js';
import { TokenDeskService } from '../services/tokenDeskService.js';
import { RuntimeMetrics } from '../types.js';
import { resolveCaller } from './caller.js';
import { RateLimiter } from './rateLimiter.js';

interface RouteDeps {
  config: AppConfig;
  pool: LendingPoolService;
  tokenDesk: TokenDeskService;
  rateLimiter: RateLimiter;
  getRuntimeMetrics: () => RuntimeMetrics;
}

const uint = z.string().regex(/^\d+$/, 'must be an unsigned integer string').transform((value) => BigInt(value));
const address = z.string().min(1).max(64);

const assetParamsSchema = z.object({ asset: address });
const accountParamsSchema = z.object({ account: address });

const marketParamsSchema = z.object({
  collateralFactor: uint,
  supplyRate: uint,
  borrowRate: uint,
});

const addMarketSchema = marketParamsSchema.extend({ asset: address });

const amountSchema = z.object({
  asset: address,
  amount: uint,
});

const signedDepositSchema = amountSchema.extend({
  nonce: uint,
  deadline: uint,
  signature: z.string().regex(/^0x[0-9a-fA-F]+$/, 'must be a 0x-prefixed hex string'),
});

const liquidateSchema = amountSchema.extend({ account: address });

const transferOutSchema = amountSchema.extend({ to: address });

const approveSchema = z.object({
  asset: address,
  amount: uint,
});

const safetyQuerySchema = z.object({
  asset: address,
  amount: uint,
});

const eventsQuerySchema = z.object({
  limit: z.coerce.number().int().positive().optional(),
});

const sendDomainError = (reply: FastifyReply, error: unknown): void => {
  if (error instanceof DomainError) {
    void reply.code(error.statusCode).send(toErrorEnvelope(error.code, error.message, error.details));
    return;
  }

  void reply.code(500).send(toErrorEnvelope(
    ErrorCode.InternalError,
    'Unexpected internal error',
    { error: String(error) },
  ));
};

const invalidPayload = (reply: FastifyReply, error: z.ZodError, message = 'Invalid request payload.'): FastifyReply => reply
  .code(400)
  .send(toErrorEnvelope(ErrorCode.InvalidPayload, message, error.flatten()));

export async function registerRoutes(app: FastifyInstance, deps: RouteDeps): Promise<void> {
  /**
   * Shared path for every state-changing endpoint: validate the body, resolve the caller,
   * apply the per-account rate limit, run the operation, map failures to the error envelope.
   */
  const mutation = <S extends z.ZodTypeAny, T>(
    schema: S,
    run: (caller: string, body: z.infer<S>) => Promise<T>,
    successCode = 200,
  ) => async (request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply> => {
    const parse = schema.safeParse(request.body ?? {});
    if (!parse.success) {
      return invalidPayload(reply, parse.error);
    }

    try {
      const caller = resolveCaller(request.headers);
      const limit = deps.rateLimiter.check(caller);
      if (!limit.allowed) {
        return reply.code(429).send(toErrorEnvelope(
          ErrorCode.RateLimited,
          'Too many ledger operations for this account.',
          { retryAfterSeconds: limit.retryAfterSeconds, limit: limit.limit },
        ));
      }

      const result = await run(caller, parse.data);
      return reply.code(successCode).send(result);
    } catch (error) {
      sendDomainError(reply, error);
      return reply;
    }
  };

  const respond = <T>(reply: FastifyReply, run: () => T): FastifyReply => {
    try {
      return reply.send(run());
    } catch (error) {
      sendDomainError(reply, error);
      return reply;
    }
  };

  /* ── service ───────────────────────────────────────────────── */

  app.get('/', async () => ({
    name: deps.config.app.name,
    version: deps.config.app.version,
    status: 'ok',
  }));

  app.get('/health', async () => ({
    status: 'ok',
    env: deps.config.app.env,
    ...deps.getRuntimeMetrics(),
  }));

  app.get('/metrics', async () => ({
    operations: deps.pool.getMetrics(),
    rateLimit: deps.rateLimiter.getMetrics(),
    runtime: deps.getRuntimeMetrics(),
  }));

  /* ── markets ───────────────────────────────────────────────── */

  app.get('/markets', async () => ({
    supportedAssets: deps.pool.getSupportedAssets(),
    markets: deps.pool.listMarkets(),
  }));

  app.get('/markets/:asset', async (request, reply) => {
    const params = assetParamsSchema.safeParse(request.params);
    if (!params.success) return invalidPayload(reply, params.error, 'Invalid path params.');
    const { asset } = params.data;
    try {
      const market = deps.pool.getMarket(asset);
      if (!market) {
        return reply.code(404).send(toErrorEnvelope(ErrorCode.MarketNotFound, `No market for ${asset}.`));
      }
      return { market };
    } catch (error) {
      sendDomainError(reply, error);
      return reply;
    }
  });

  app.post('/markets', mutation(addMarketSchema, async (caller, body) => ({
    market: await deps.pool.addMarket(caller, body.asset, body),
  }), 201));

  app.put('/markets/:asset', async (request, reply) => {
    const params = assetParamsSchema.safeParse(request.params);
    if (!params.success) return invalidPayload(reply, params.error, 'Invalid path params.');
    const { asset } = params.data;
    return mutation(marketParamsSchema, async (caller, body) => ({
      market: await deps.pool.updateMarket(caller, asset, body),
    }))(request, reply);
  });

  /* ── accounts ──────────────────────────────────────────────── */

  app.get('/accounts/:account', async (request, reply) => {
    const params = accountParamsSchema.safeParse(request.params);
    if (!params.success) return invalidPayload(reply, params.error, 'Invalid path params.');
    const { account } = params.data;
    return respond(reply, () => ({ account: deps.pool.getAccount(account) }));
  });

  app.get('/accounts/:account/balances/:asset', async (request, reply) => {
    const params = accountParamsSchema.extend({ asset: address }).safeParse(request.params);
    if (!params.success) return invalidPayload(reply, params.error, 'Invalid path params.');
    const { account, asset } = params.data;
    return respond(reply, () => deps.pool.getBalances(account, asset));
  });

  app.get('/accounts/:account/nonce', async (request, reply) => {
    const params = accountParamsSchema.safeParse(request.params);
    if (!params.success) return invalidPayload(reply, params.error, 'Invalid path params.');
    const { account } = params.data;
    return respond(reply, () => ({ account, nonce: deps.pool.getNonce(account) }));
  });

  app.get('/accounts/:account/can-withdraw', async (request, reply) => {
    const params = accountParamsSchema.safeParse(request.params);
    if (!params.success) return invalidPayload(reply, params.error, 'Invalid path params.');
    const { account } = params.data;
    const parse = safetyQuerySchema.safeParse(request.query);
    if (!parse.success) return invalidPayload(reply, parse.error, 'Invalid query params.');

    return respond(reply, () => ({
      allowed: deps.pool.canWithdraw(account, parse.data.asset, parse.data.amount),
    }));
  });

  app.get('/accounts/:account/can-borrow', async (request, reply) => {
    const params = accountParamsSchema.safeParse(request.params);
    if (!params.success) return invalidPayload(reply, params.error, 'Invalid path params.');
    const { account } = params.data;
    const parse = safetyQuerySchema.safeParse(request.query);
    if (!parse.success) return invalidPayload(reply, parse.error, 'Invalid query params.');

    return respond(reply, () => ({
      allowed: deps.pool.canBorrow(account, parse.data.asset, parse.data.amount),
    }));
  });

  /* ── positions ─────────────────────────────────────────────── */

  app.post('/deposit', mutation(amountSchema, async (caller, body) => ({
    position: await deps.pool.deposit(caller, body.asset, body.amount),
  })));

  app.post('/deposit-with-signature', mutation(signedDepositSchema, async (caller, body) => ({
    position: await deps.pool.depositWithSignature(caller, body.asset, body.amount, {
      nonce: body.nonce,
      deadline: body.deadline,
      signature: body.signature,
    }),
  })));

  app.post('/withdraw', mutation(amountSchema, async (caller, body) => ({
    position: await deps.pool.withdraw(caller, body.asset, body.amount),
  })));

  app.post('/borrow', mutation(amountSchema, async (caller, body) => ({
    position: await deps.pool.borrow(caller, body.asset, body.amount),
  })));

  app.post('/repay', mutation(amountSchema, async (caller, body) => ({
    position: await deps.pool.repay(caller, body.asset, body.amount),
  })));

  app.post('/liquidate', mutation(liquidateSchema, async (caller, body) => ({
    liquidation: await deps.pool.liquidate(caller, body.account, body.asset, body.amount),
  })));

  /* ── administration ────────────────────────────────────────── */

  app.post('/admin/pause', mutation(z.object({}), async (caller) => {
    await deps.pool.pause(caller);
    return { paused: true };
  }));

  app.post('/admin/unpause', mutation(z.object({}), async (caller) => {
    await deps.pool.unpause(caller);
    return { paused: false };
  }));

  app.post('/admin/recover', mutation(transferOutSchema, async (caller, body) => {
    await deps.pool.recoverAssets(caller, body.asset, body.to, body.amount);
    return { recovered: true };
  }));

  app.post('/admin/mint', mutation(transferOutSchema, async (caller, body) => ({
    balance: await deps.tokenDesk.mint(caller, body.asset, body.to, body.amount),
  })));

  /* ── tokens ────────────────────────────────────────────────── */

  app.post('/tokens/approve', mutation(approveSchema, async (caller, body) => ({
    balance: await deps.tokenDesk.approve(caller, body.asset, body.amount),
  })));

  app.get('/tokens/:asset/balances/:holder', async (request, reply) => {
    const params = assetParamsSchema.extend({ holder: address }).safeParse(request.params);
    if (!params.success) return invalidPayload(reply, params.error, 'Invalid path params.');
    const { asset, holder } = params.data;
    return respond(reply, () => ({ balance: deps.tokenDesk.balanceOf(asset, holder) }));
  });

  /* ── notifications ─────────────────────────────────────────── */

  app.get('/events', async (request, reply) => {
    const parse = eventsQuerySchema.safeParse(request.query);
    if (!parse.success) return invalidPayload(reply, parse.error, 'Invalid query params.');

    const limit = Math.min(parse.data.limit ?? 50, deps.config.ledger.notificationPageLimit);
    return { events: deps.pool.listNotifications(limit) };
  });
}
