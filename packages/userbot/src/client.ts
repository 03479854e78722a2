/**
 * UserbotClient — the backend identity. A gramjs MTProto session for the
 * privileged user account that receives forwarded attachments from the
 * frontend bot, downloads them without the Bot API size cap and posts its
 * own status messages into "Saved Messages".
 */

import { stat } from 'node:fs/promises';

import { Api, TelegramClient, helpers, sessions } from 'telegram';
import * as events from 'telegram/events/index.js';
import {
  RelayError,
  type BackendMessage,
  type BackendReference,
  type BackendTransport,
  type InboxHandler,
  type SentMessageRef,
} from '@filerelay/core';

import { classifyMtprotoError } from './errors.js';
import { isRelayInbound, toInboxMessage } from './media.js';

export interface UserbotClientOptions {
  apiId: number;
  apiHash: string;
  /** Pre-authorized gramjs string session */
  session: string;
  /** User id of the frontend bot; only its chat is watched besides Saved Messages */
  frontendBotId: number;
  /** Resolved once at start so the bot's access hash is cached */
  frontendBotUsername?: string;
  connectionRetries?: number;
}

type ClientParams = NonNullable<ConstructorParameters<typeof TelegramClient>[3]>;

/**
 * Connection parameters for the MTProto client. Flood waits are never slept
 * through inside a request; they surface as `rate_limited` so the worker
 * applies its own single deferred retry.
 */
export function clientParams(options: Pick<UserbotClientOptions, 'connectionRetries'>): ClientParams {
  return {
    connectionRetries: options.connectionRetries ?? 5,
    floodSleepThreshold: 0,
  };
}

export class UserbotClient implements BackendTransport {
  private readonly client: TelegramClient;
  private readonly frontendBotId: number;
  private readonly frontendBotUsername?: string;
  /** Peers seen in inbound events, keyed by chat id */
  private readonly peers = new Map<number, Api.TypePeer>();
  private readonly inboxEvent = new events.NewMessage({});
  private inboxHandler: ((event: events.NewMessageEvent) => void) | null = null;
  private selfId = 0;

  constructor(options: UserbotClientOptions) {
    this.frontendBotId = options.frontendBotId;
    this.frontendBotUsername = options.frontendBotUsername;
    this.client = new TelegramClient(
      new sessions.StringSession(options.session),
      options.apiId,
      options.apiHash,
      clientParams(options),
    );
  }

  get id(): number {
    return this.selfId;
  }

  // ── Lifecycle ───────────────────────────────────────────────────────────

  /**
   * Connect, verify the session is authorized and start delivering inbox
   * traffic to `onMessage`.
   */
  async start(onMessage: InboxHandler): Promise<void> {
    await this.client.connect();
    if (!(await this.client.checkAuthorization())) {
      throw new RelayError('transport', 'Userbot session is not authorized; generate a new SESSION_STRING');
    }

    const me = await this.client.getMe();
    if (!(me instanceof Api.User)) {
      throw new RelayError('transport', 'Userbot session did not resolve to a user account');
    }
    this.selfId = me.id.toJSNumber();
    console.log(`[USERBOT] Connected as ${me.username ? `@${me.username}` : this.selfId}`);

    if (this.frontendBotUsername) {
      try {
        await this.client.getInputEntity(this.frontendBotUsername);
      } catch (err) {
        console.warn(
          `[USERBOT] Could not resolve @${this.frontendBotUsername}:`,
          err instanceof Error ? err.message : String(err),
        );
      }
    }

    const handler = (event: events.NewMessageEvent): void => {
      const message = event.message;
      const inbox = toInboxMessage(message, this.selfId);
      if (!isRelayInbound(inbox, message.out, this.frontendBotId)) return;

      this.peers.set(inbox.chatId, message.peerId);
      onMessage(inbox).catch((err) => {
        console.error(`[USERBOT] Inbox handler failed for message ${inbox.messageId}:`, err);
      });
    };

    this.client.addEventHandler(handler, this.inboxEvent);
    this.inboxHandler = handler;
  }

  async stop(): Promise<void> {
    if (this.inboxHandler) {
      this.client.removeEventHandler(this.inboxHandler, this.inboxEvent);
      this.inboxHandler = null;
    }
    await this.client.destroy();
    console.log('[USERBOT] Disconnected');
  }

  // ── BackendTransport ────────────────────────────────────────────────────

  async getMessage(ref: BackendReference): Promise<BackendMessage | undefined> {
    const message = await this.fetchMessage(ref, 'getMessage');
    if (!message) return undefined;
    const inbox = toInboxMessage(message, this.selfId);
    return { ref, text: inbox.text, attachment: inbox.attachment };
  }

  async downloadAttachment(ref: BackendReference, destination: string): Promise<number> {
    const message = await this.fetchMessage(ref, 'downloadAttachment');
    if (!message?.media) {
      throw new RelayError('expired', `downloadAttachment: message ${ref.messageId} has no media`);
    }

    try {
      await this.client.downloadMedia(message, { outputFile: destination });
    } catch (err) {
      throw classifyMtprotoError(err, 'downloadAttachment');
    }

    const { size } = await stat(destination);
    return size;
  }

  async sendSelfMessage(text: string): Promise<SentMessageRef> {
    try {
      const sent = await this.client.sendMessage('me', { message: text });
      return { chatId: this.selfId, messageId: sent.id };
    } catch (err) {
      throw classifyMtprotoError(err, 'sendSelfMessage');
    }
  }

  async editSelfMessage(messageId: number, text: string): Promise<void> {
    try {
      await this.client.editMessage('me', { message: messageId, text });
    } catch (err) {
      const relayErr = classifyMtprotoError(err, 'editSelfMessage');
      if (relayErr.message.includes('MESSAGE_NOT_MODIFIED')) return;
      throw relayErr;
    }
  }

  // ── Helpers ─────────────────────────────────────────────────────────────

  private async fetchMessage(ref: BackendReference, context: string): Promise<Api.Message | undefined> {
    const peer = this.peers.get(ref.chatId) ?? helpers.returnBigInt(ref.chatId);
    try {
      const [message] = await this.client.getMessages(peer, { ids: [ref.messageId] });
      return message instanceof Api.Message ? message : undefined;
    } catch (err) {
      throw classifyMtprotoError(err, context);
    }
  }
}
