import { AsyncLocalStorage } from 'node:async_hooks';
import fs from 'node:fs/promises';
import path from 'node:path';
import { DomainError, ErrorCode } from '../../errors/taxonomy.js';
import { AppState } from '../../types.js';
import { createDefaultState } from './defaultState.js';
import { persistedStateSchema, serializeState } from './stateSchema.js';

const isMissingFile = (error: unknown): boolean => (
  error instanceof Error && 'code' in error && error.code === 'ENOENT'
);

export interface TransactionHooks {
  /**
   * Runs when the work resolved but its draft could not be written. Side effects the work
   * performed outside the state (token movements) are undone here; the write error is rethrown
   * afterwards.
   */
  onCommitFailure?: (error: unknown) => Promise<void>;
}

export interface StateStoreOptions {
  /** Pause flag for a freshly created ledger. Ignored when a state file already exists. */
  startPaused?: boolean;
}

/**
 * Serial, all-or-nothing store for the ledger.
 *
 * Transactions queue on a promise chain. Each one works on a clone of the committed state and
 * the clone replaces it only when the work resolves and has been written to disk; a throw
 * anywhere discards every change, and a failed write also runs the caller's `onCommitFailure`.
 * A transaction opened from inside a running one fails with `reentrant_call` rather than
 * waiting on itself.
 */
export class StateStore {
  private state: AppState;
  private lock: Promise<void> = Promise.resolve();
  private readonly running = new AsyncLocalStorage<boolean>();

  constructor(
    private readonly stateFilePath: string,
    private readonly options: StateStoreOptions = {},
  ) {
    this.state = createDefaultState({ paused: options.startPaused });
  }

  async init(): Promise<void> {
    await fs.mkdir(path.dirname(this.stateFilePath), { recursive: true });

    let raw: string;
    try {
      raw = await fs.readFile(this.stateFilePath, 'utf-8');
    } catch (error) {
      if (!isMissingFile(error)) throw error;
      this.state = createDefaultState({ paused: this.options.startPaused });
      await this.persist(this.state);
      return;
    }

    const parsed = persistedStateSchema.safeParse(JSON.parse(raw));
    if (!parsed.success) {
      throw new Error(`State file ${this.stateFilePath} is invalid: ${parsed.error.message}`);
    }
    this.state = parsed.data;
  }

  snapshot(): AppState {
    return structuredClone(this.state);
  }

  /** Copy of one slice of the committed state. */
  read<T>(select: (state: AppState) => T): T {
    return structuredClone(select(this.state));
  }

  /** True while the calling async context is inside a transaction. */
  inTransaction(): boolean {
    return this.running.getStore() === true;
  }

  async transaction<T>(work: (state: AppState) => Promise<T> | T, hooks: TransactionHooks = {}): Promise<T> {
    if (this.inTransaction()) {
      throw new DomainError(
        ErrorCode.ReentrantCall,
        409,
        'Ledger operation attempted while another operation is in progress on the same call path.',
      );
    }

    const previous = this.lock;
    let release: () => void = () => {};

    this.lock = new Promise<void>((resolve) => {
      release = resolve;
    });

    await previous;
    try {
      const draft = structuredClone(this.state);
      const result = await this.running.run(true, () => work(draft));
      try {
        await this.persist(draft);
      } catch (error) {
        await hooks.onCommitFailure?.(error);
        throw error;
      }
      this.state = draft;
      return result;
    } finally {
      release();
    }
  }

  async flush(): Promise<void> {
    await this.lock;
    await this.persist(this.state);
  }

  private async persist(state: AppState): Promise<void> {
    await fs.writeFile(this.stateFilePath, serializeState(state));
  }
}
