import fs from 'node:fs/promises';
import path from 'node:path';
import { jsonReplacer } from '../utils/json.js';
import { isoNow } from '../utils/time.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  ts: string;
  level: LogLevel;
  event: string;
  data?: Record<string, unknown>;
}

/**
 * Append-only NDJSON event logger.
 * Writes are chained so lines land in call order.
 */
export class EventLogger {
  private queue: Promise<void> = Promise.resolve();

  constructor(private readonly logFilePath: string) {}

  async init(): Promise<void> {
    await fs.mkdir(path.dirname(this.logFilePath), { recursive: true });
  }

  async log(level: LogLevel, event: string, data?: Record<string, unknown>): Promise<void> {
    const entry: LogEntry = {
      ts: isoNow(),
      level,
      event,
      ...(data === undefined ? {} : { data }),
    };

    const line = `${JSON.stringify(entry, jsonReplacer)}\n`;

    const write = this.queue.then(() => fs.appendFile(this.logFilePath, line));
    this.queue = write.catch(() => undefined);
    await write;
  }

  /** Resolve once every pending write has reached the file. */
  async flush(): Promise<void> {
    await this.queue;
  }
}
