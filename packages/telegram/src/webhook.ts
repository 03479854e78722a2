import type { Context } from 'hono';

import { telegramUpdateSchema, type TelegramUpdate } from './types.js';

export interface WebhookHandlerOptions {
  /** Expected X-Telegram-Bot-Api-Secret-Token; unchecked when absent */
  secret?: string;
  onUpdate: (update: TelegramUpdate) => Promise<void>;
}

/**
 * Build the Hono handler for `POST /telegram/webhook`.
 *
 * The update is acknowledged immediately and processed in the background:
 * Telegram redelivers anything not answered quickly, and a redelivered
 * update would start a second job.
 */
export function createTelegramWebhookHandler(options: WebhookHandlerOptions) {
  return async (c: Context): Promise<Response> => {
    // ── Verify webhook secret ─────────────────────────────────────────────
    if (options.secret && c.req.header('X-Telegram-Bot-Api-Secret-Token') !== options.secret) {
      return c.json({ error: 'Invalid webhook secret token' }, 403);
    }

    // ── Parse update ──────────────────────────────────────────────────────
    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      return c.json({ error: 'Invalid JSON body' }, 400);
    }

    const parsed = telegramUpdateSchema.safeParse(body);
    if (!parsed.success) {
      console.warn(`[TELEGRAM] Ignoring unreadable webhook update: ${parsed.error.message}`);
      return c.json({ ok: true });
    }

    options.onUpdate(parsed.data).catch((err: unknown) => {
      console.error(`[TELEGRAM] Failed to process update ${parsed.data.update_id}:`, err);
    });

    return c.json({ ok: true });
  };
}
