import dotenv from 'dotenv';
import path from 'node:path';

dotenv.config();

const parseBool = (input: string | undefined, fallback = false): boolean => {
  if (input === undefined) return fallback;
  return ['1', 'true', 'yes', 'on'].includes(input.toLowerCase());
};

const parseNumber = (input: string | undefined, fallback: number): number => {
  if (input === undefined) return fallback;
  const n = Number(input);
  return Number.isFinite(n) ? n : fallback;
};

export const config = {
  app: {
    name: 'collateral-ledger',
    version: '0.1.0',
    env: process.env.NODE_ENV ?? 'development',
    port: parseNumber(process.env.PORT, 8787),
  },
  paths: {
    dataDir: process.env.DATA_DIR ?? path.resolve(process.cwd(), 'data'),
    stateFile: process.env.STATE_FILE ?? path.resolve(process.cwd(), 'data', 'ledger.json'),
    logFile: process.env.LOG_FILE ?? path.resolve(process.cwd(), 'data', 'events.ndjson'),
  },
  ledger: {
    // Placeholder identities for local runs; set both in any shared environment.
    ownerAddress: process.env.LEDGER_OWNER_ADDRESS ?? '0x000000000000000000000000000000000000a11c',
    custodyAddress: process.env.LEDGER_CUSTODY_ADDRESS ?? '0x000000000000000000000000000000000000c057',
    startPaused: parseBool(process.env.LEDGER_START_PAUSED, false),
    notificationPageLimit: parseNumber(process.env.LEDGER_NOTIFICATION_PAGE_LIMIT, 200),
  },
  rateLimit: {
    opsPerMinute: parseNumber(process.env.RATE_LIMIT_OPS_PER_MINUTE, 120),
  },
};

export type AppConfig = typeof config;
