import { RelayError } from '@filerelay/core';
import { z } from 'zod';

import { telegramUpdateSchema, type TelegramUpdate } from './types.js';

const TELEGRAM_API = 'https://api.telegram.org';

// ─── Response schemas ───────────────────────────────────────────────────────

const apiResponseSchema = z.object({
  ok: z.boolean(),
  result: z.unknown().optional(),
  description: z.string().optional(),
  error_code: z.number().optional(),
  parameters: z.object({ retry_after: z.number().optional() }).optional(),
});

const sentMessageSchema = z.object({
  message_id: z.number(),
  chat: z.object({ id: z.number() }),
});

const botInfoSchema = z.object({
  id: z.number(),
  username: z.string(),
  first_name: z.string(),
});

const webhookInfoSchema = z.object({
  url: z.string(),
  pending_update_count: z.number(),
  last_error_message: z.string().optional(),
});

const updateIdSchema = z.object({ update_id: z.number() });

export type TelegramSentMessage = z.infer<typeof sentMessageSchema>;
export type TelegramBotInfo = z.infer<typeof botInfoSchema>;
export type TelegramWebhookInfo = z.infer<typeof webhookInfoSchema>;

// ─── Request types ──────────────────────────────────────────────────────────

export interface TelegramSendMessageOptions {
  chat_id: number | string;
  text: string;
  reply_to_message_id?: number;
}

export interface TelegramEditMessageOptions {
  chat_id: number | string;
  message_id: number;
  text: string;
}

export interface TelegramForwardMessageOptions {
  chat_id: number | string;
  from_chat_id: number | string;
  message_id: number;
}

export interface TelegramGetUpdatesOptions {
  offset?: number;
  /** Long-polling timeout in seconds */
  timeout?: number;
  signal?: AbortSignal;
}

export interface TelegramUpdateBatch {
  updates: TelegramUpdate[];
  /** Highest update_id seen, including updates that failed to parse */
  lastUpdateId?: number;
}

// ─── API client ─────────────────────────────────────────────────────────────

/**
 * Thin Bot API client. Every `ok: false` response is thrown as a
 * `RelayError`: `rate_limited` for 429 (with the mandated wait), `transport`
 * otherwise.
 */
export class TelegramApi {
  private readonly apiUrl: string;

  constructor(botToken: string, baseUrl: string = TELEGRAM_API) {
    this.apiUrl = `${baseUrl}/bot${botToken}`;
  }

  async getMe(): Promise<TelegramBotInfo> {
    return botInfoSchema.parse(await this.call('getMe'));
  }

  async sendMessage(options: TelegramSendMessageOptions): Promise<TelegramSentMessage> {
    return sentMessageSchema.parse(await this.call('sendMessage', options));
  }

  async editMessageText(options: TelegramEditMessageOptions): Promise<void> {
    await this.call('editMessageText', options);
  }

  async forwardMessage(options: TelegramForwardMessageOptions): Promise<TelegramSentMessage> {
    return sentMessageSchema.parse(await this.call('forwardMessage', options));
  }

  async getUpdates(options: TelegramGetUpdatesOptions = {}): Promise<TelegramUpdateBatch> {
    const raw = z.array(z.unknown()).parse(
      await this.call(
        'getUpdates',
        {
          offset: options.offset,
          timeout: options.timeout ?? 0,
          allowed_updates: ['message'],
        },
        options.signal,
      ),
    );

    const batch: TelegramUpdateBatch = { updates: [] };
    for (const item of raw) {
      const id = updateIdSchema.safeParse(item);
      if (!id.success) continue;
      batch.lastUpdateId = Math.max(batch.lastUpdateId ?? id.data.update_id, id.data.update_id);

      const parsed = telegramUpdateSchema.safeParse(item);
      if (parsed.success) {
        batch.updates.push(parsed.data);
      } else {
        console.warn(`[TELEGRAM] Skipping unreadable update ${id.data.update_id}: ${parsed.error.message}`);
      }
    }
    return batch;
  }

  async setWebhook(url: string, secretToken?: string): Promise<void> {
    await this.call('setWebhook', {
      url,
      secret_token: secretToken,
      allowed_updates: ['message'],
      drop_pending_updates: false,
    });
  }

  async deleteWebhook(): Promise<void> {
    await this.call('deleteWebhook', { drop_pending_updates: false });
  }

  async getWebhookInfo(): Promise<TelegramWebhookInfo> {
    return webhookInfoSchema.parse(await this.call('getWebhookInfo'));
  }

  // ── Transport ───────────────────────────────────────────────────────────

  private async call(method: string, body?: object, signal?: AbortSignal): Promise<unknown> {
    let res: Response;
    try {
      res = await fetch(`${this.apiUrl}/${method}`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(body ?? {}),
        signal,
      });
    } catch (err) {
      if (signal?.aborted) throw err;
      const detail = err instanceof Error ? err.message : String(err);
      throw new RelayError('transport', `${method}: ${detail}`, { cause: err });
    }

    let payload: z.infer<typeof apiResponseSchema>;
    try {
      payload = apiResponseSchema.parse(await res.json());
    } catch (err) {
      throw new RelayError('transport', `${method}: unreadable Bot API response`, { cause: err });
    }

    if (!payload.ok) {
      const description = payload.description ?? `error ${payload.error_code ?? 'unknown'}`;
      if (payload.error_code === 429) {
        const retryAfter = payload.parameters?.retry_after;
        throw new RelayError('rate_limited', description, {
          retryAfterMs: retryAfter !== undefined ? retryAfter * 1000 : undefined,
        });
      }
      throw new RelayError('transport', description);
    }

    return payload.result;
  }
}
