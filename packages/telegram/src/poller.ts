import { isRelayError } from '@filerelay/core';

import type { TelegramApi } from './api.js';
import type { TelegramUpdate } from './types.js';

/** The part of the Bot API the poller needs */
export type UpdateSource = Pick<TelegramApi, 'getUpdates'>;

export interface PollerOptions {
  /** Long-polling timeout passed to getUpdates, in seconds (default 30) */
  timeoutSec?: number;
  /** Pause after a failed poll (default 5 s) */
  retryDelayMs?: number;
}

/**
 * Long-polling loop for the bot. Updates are handed to `onUpdate`
 * concurrently so a slow submission never holds up other users; the offset
 * advances as soon as a batch is received.
 */
export class TelegramPoller {
  private readonly timeoutSec: number;
  private readonly retryDelayMs: number;
  private readonly inFlight = new Set<Promise<void>>();
  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;
  private offset: number | undefined;

  constructor(
    private readonly api: UpdateSource,
    private readonly onUpdate: (update: TelegramUpdate) => Promise<void>,
    options: PollerOptions = {},
  ) {
    this.timeoutSec = options.timeoutSec ?? 30;
    this.retryDelayMs = options.retryDelayMs ?? 5_000;
  }

  get running(): boolean {
    return this.controller !== null;
  }

  start(): void {
    if (this.controller) return;
    const controller = new AbortController();
    this.controller = controller;
    this.loop = this.run(controller.signal);
  }

  /** Stop polling and wait for updates already handed out. */
  async stop(): Promise<void> {
    this.controller?.abort();
    this.controller = null;
    await this.loop;
    this.loop = null;
    await Promise.all([...this.inFlight]);
  }

  private async run(signal: AbortSignal): Promise<void> {
    console.log('[TELEGRAM] Long polling started');

    while (!signal.aborted) {
      try {
        const batch = await this.api.getUpdates({
          offset: this.offset,
          timeout: this.timeoutSec,
          signal,
        });
        if (batch.lastUpdateId !== undefined) this.offset = batch.lastUpdateId + 1;
        for (const update of batch.updates) this.dispatch(update);
      } catch (err) {
        if (signal.aborted) break;
        const waitMs =
          isRelayError(err) && err.retryAfterMs !== undefined ? err.retryAfterMs : this.retryDelayMs;
        console.error(
          `[TELEGRAM] getUpdates failed, retrying in ${waitMs}ms:`,
          err instanceof Error ? err.message : String(err),
        );
        await sleep(waitMs, signal);
      }
    }

    console.log('[TELEGRAM] Long polling stopped');
  }

  private dispatch(update: TelegramUpdate): void {
    const task = this.onUpdate(update).catch((err: unknown) => {
      console.error(`[TELEGRAM] Update ${update.update_id} failed:`, err);
    });
    this.inFlight.add(task);
    void task.finally(() => this.inFlight.delete(task));
  }
}

function sleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) return resolve();
    const timer = setTimeout(done, ms);
    signal.addEventListener('abort', done, { once: true });
    function done() {
      clearTimeout(timer);
      signal.removeEventListener('abort', done);
      resolve();
    }
  });
}
