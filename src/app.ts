import Fastify from 'fastify';
import fastifyWebSocket from '@fastify/websocket';
import { registerRoutes } from './api/routes.js';
import { RateLimiter } from './api/rateLimiter.js';
import { registerWebSocket } from './api/websocket.js';
import { AppConfig } from './config.js';
import { LedgerPausePolicy, OwnerAccessPolicy } from './domain/ledger/policies.js';
import { ErrorCode } from './errors/taxonomy.js';
import { eventBus } from './infra/eventBus.js';
import { EventLogger } from './infra/logger.js';
import { StateStore } from './infra/storage/stateStore.js';
import { InMemoryTokenLedger } from './integrations/assets/tokenLedger.js';
import { LendingPoolService, toAddress } from './services/lendingPoolService.js';
import { TokenDeskService } from './services/tokenDeskService.js';
import { toJson } from './utils/json.js';
import { Clock } from './utils/time.js';

export interface AppContext {
  app: ReturnType<typeof Fastify>;
  stateStore: StateStore;
  logger: EventLogger;
  pool: LendingPoolService;
  tokens: InMemoryTokenLedger;
  tokenDesk: TokenDeskService;
}

export interface BuildAppOptions {
  /** Unix seconds; defaults to the wall clock. */
  clock?: Clock;
}

export async function buildApp(config: AppConfig, options: BuildAppOptions = {}): Promise<AppContext> {
  const app = Fastify({
    logger: false,
  });

  // Amounts are bigints; every reply goes out with them as decimal strings.
  app.setReplySerializer((payload) => toJson(payload));

  // Register WebSocket plugin first so routes can use { websocket: true }.
  await app.register(fastifyWebSocket);

  const stateStore = new StateStore(config.paths.stateFile, { startPaused: config.ledger.startPaused });
  await stateStore.init();

  const logger = new EventLogger(config.paths.logFile);
  await logger.init();

  const owner = toAddress(config.ledger.ownerAddress, 'ownerAddress', ErrorCode.InvalidPayload);
  const custody = toAddress(config.ledger.custodyAddress, 'custodyAddress', ErrorCode.InvalidPayload);

  const tokens = new InMemoryTokenLedger(custody);
  const access = new OwnerAccessPolicy(owner);
  const pool = new LendingPoolService({
    store: stateStore,
    transfers: tokens,
    access,
    pause: new LedgerPausePolicy(),
    logger,
    clock: options.clock,
  });
  const tokenDesk = new TokenDeskService(tokens, access, logger);
  const rateLimiter = new RateLimiter({ opsPerMinute: config.rateLimit.opsPerMinute });

  const startedAt = Date.now();
  await registerRoutes(app, {
    config,
    pool,
    tokenDesk,
    rateLimiter,
    getRuntimeMetrics: () => {
      const counts = stateStore.read((state) => ({
        markets: state.ledger.supportedAssets.length,
        accounts: Object.keys(state.ledger.users).length,
        notifications: state.notifications.length,
        paused: state.ledger.paused,
      }));
      return {
        uptimeSeconds: Math.floor((Date.now() - startedAt) / 1000),
        processPid: process.pid,
        ...counts,
        feedListenerFailures: eventBus.listenerFailures(),
      };
    },
  });

  const detachFeed = await registerWebSocket(app);
  app.addHook('onClose', async () => {
    detachFeed();
  });

  await logger.log('info', 'app.ready', { owner, custody, paused: pool.isPaused() });

  return {
    app,
    stateStore,
    logger,
    pool,
    tokens,
    tokenDesk,
  };
}
