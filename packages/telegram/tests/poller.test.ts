import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { RelayError } from '@filerelay/core';
import type { TelegramGetUpdatesOptions, TelegramUpdateBatch } from '../src/api.js';
import { TelegramPoller, type UpdateSource } from '../src/poller.js';
import type { TelegramUpdate } from '../src/types.js';

/** Serves queued batches, then parks until the poll is aborted */
function makeApi(batches: Array<TelegramUpdateBatch | Error>) {
  const calls: TelegramGetUpdatesOptions[] = [];
  const getUpdates = vi.fn(async (options: TelegramGetUpdatesOptions = {}): Promise<TelegramUpdateBatch> => {
    calls.push({ offset: options.offset, timeout: options.timeout });
    const next = batches.shift();
    if (next instanceof Error) throw next;
    if (next) return next;
    return new Promise((_resolve, reject) => {
      options.signal?.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
    });
  });
  const api: UpdateSource = { getUpdates };
  return { api, getUpdates, calls };
}

function makeUpdate(id: number): TelegramUpdate {
  return {
    update_id: id,
    message: { message_id: id, date: 0, chat: { id: 42, type: 'private' }, text: `m${id}` },
  };
}

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'error').mockImplementation(() => {});
});

afterEach(() => {
  vi.useRealTimers();
  vi.restoreAllMocks();
});

describe('TelegramPoller', () => {
  it('hands out updates and advances the offset past the last id', async () => {
    const { api, calls } = makeApi([{ updates: [makeUpdate(10), makeUpdate(11)], lastUpdateId: 12 }]);
    const seen: number[] = [];
    const poller = new TelegramPoller(api, async (u) => {
      seen.push(u.update_id);
    });

    poller.start();
    await vi.waitFor(() => expect(calls).toHaveLength(2));
    await poller.stop();

    expect(seen).toEqual([10, 11]);
    expect(calls).toEqual([
      { offset: undefined, timeout: 30 },
      { offset: 13, timeout: 30 },
    ]);
    expect(poller.running).toBe(false);
  });

  it('keeps polling after a handler fails', async () => {
    const { api, calls } = makeApi([
      { updates: [makeUpdate(1)], lastUpdateId: 1 },
      { updates: [makeUpdate(2)], lastUpdateId: 2 },
    ]);
    const seen: number[] = [];
    const poller = new TelegramPoller(api, async (u) => {
      seen.push(u.update_id);
      if (u.update_id === 1) throw new Error('handler broke');
    });

    poller.start();
    await vi.waitFor(() => expect(calls).toHaveLength(3));
    await poller.stop();

    expect(seen).toEqual([1, 2]);
  });

  it('waits the mandated time after a rate-limited poll', async () => {
    vi.useFakeTimers();
    const { api, calls } = makeApi([
      new RelayError('rate_limited', 'Too Many Requests', { retryAfterMs: 4_000 }),
      { updates: [], lastUpdateId: undefined },
    ]);
    const poller = new TelegramPoller(api, async () => {}, { retryDelayMs: 100 });

    poller.start();
    await vi.advanceTimersByTimeAsync(3_999);
    expect(calls).toHaveLength(1);

    await vi.advanceTimersByTimeAsync(1);
    await vi.waitFor(() => expect(calls.length).toBeGreaterThanOrEqual(2));

    await poller.stop();
  });

  it('waits for in-flight updates on stop', async () => {
    const { api } = makeApi([{ updates: [makeUpdate(1)], lastUpdateId: 1 }]);
    let finished = false;
    const poller = new TelegramPoller(api, async () => {
      await new Promise((resolve) => setTimeout(resolve, 20));
      finished = true;
    });

    poller.start();
    await vi.waitFor(() => expect(poller.running).toBe(true));
    await new Promise((resolve) => setTimeout(resolve, 0));
    await poller.stop();

    expect(finished).toBe(true);
  });
});
