import { createEmptyLedger } from '../../domain/ledger/ledgerTypes.js';
import { AppState } from '../../types.js';
import { isoNow } from '../../utils/time.js';

export const createDefaultState = (options: { paused?: boolean } = {}): AppState => ({
  ledger: {
    ...createEmptyLedger(),
    paused: options.paused ?? false,
  },
  notifications: [],
  startedAt: isoNow(),
});
