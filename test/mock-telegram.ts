/**
 * In-process stand-in for Telegram as both identities see it.
 *
 * The bot and the backend account have separate message-id spaces, like the
 * real platform: a message the bot sends into the owner's chat gets one id
 * on the bot side and another on the backend side, and reply links are
 * translated between them. Messages reaching the backend inbox are queued
 * until a test takes them, so delivery order is under test control.
 *
 * Records every call for assertion in tests.
 */

import { writeFile } from 'node:fs/promises';

import { vi } from 'vitest';
import type {
  AttachmentDescriptor,
  BackendMessage,
  BackendReference,
  BackendTransport,
  FrontendTransport,
  InboxMessage,
  SentMessageRef,
} from '@filerelay/core';
import type { TelegramMessage, TelegramUpdate } from '@filerelay/telegram';

// ─── Identities ─────────────────────────────────────────────────────────────

/** User id of the backend account; also its chat id on the bot side */
export const OWNER_ID = 1000;

/** User id of the frontend bot; the chat id of the bot on the backend side */
export const BOT_ID = 4242;

// ─── Types ──────────────────────────────────────────────────────────────────

export interface BotEdit {
  chatId: number;
  messageId: number;
  text: string;
}

export interface BotSend {
  chatId: number;
  messageId: number;
  text: string;
  replyTo?: number;
}

interface StoredMessage {
  text: string;
  attachment?: AttachmentDescriptor;
}

function key(chatId: number, messageId: number): string {
  return `${chatId}:${messageId}`;
}

// ─── Mock platform ──────────────────────────────────────────────────────────

export class MockTelegram {
  readonly botSent: BotSend[] = [];
  readonly botEdits: BotEdit[] = [];
  readonly selfSent: Array<{ messageId: number; text: string }> = [];
  readonly selfEdits: Array<{ messageId: number; text: string }> = [];

  /** Attachments of user messages, keyed by chat and bot-side id */
  private readonly userAttachments = new Map<string, AttachmentDescriptor>();
  /** Everything the backend can read, keyed by chat and backend-side id */
  private readonly backendMessages = new Map<string, StoredMessage>();
  /** Bot-side id → backend-side id for messages in the owner's chat */
  private readonly botToBackend = new Map<number, number>();
  /** Download failures to inject, keyed by backend reference */
  private readonly downloadFailures = new Map<string, Error>();
  private inbox: InboxMessage[] = [];
  private nextBotId = 100;
  private nextBackendId = 1;
  private nextUpdateId = 1;

  // ── User side ───────────────────────────────────────────────────────────

  /** A user sends a document to the bot */
  sendDocument(chatId: number, messageId: number, fileName: string, size: number, mimeType = 'application/octet-stream'): TelegramUpdate {
    this.userAttachments.set(key(chatId, messageId), { kind: 'document', fileName, size, mimeType });
    return this.update(chatId, messageId, {
      document: { file_id: `fid-${messageId}`, file_unique_id: `uid-${messageId}`, file_name: fileName, file_size: size, mime_type: mimeType },
    });
  }

  /** A user sends any other message to the bot */
  sendMessage(chatId: number, messageId: number, fields: Partial<TelegramMessage>): TelegramUpdate {
    return this.update(chatId, messageId, fields);
  }

  private update(chatId: number, messageId: number, fields: Partial<TelegramMessage>): TelegramUpdate {
    return {
      update_id: this.nextUpdateId++,
      message: {
        message_id: messageId,
        from: { id: chatId, is_bot: false, first_name: `User${chatId}` },
        chat: { id: chatId, type: 'private' },
        date: 1_700_000_000,
        ...fields,
      },
    };
  }

  // ── Frontend identity ───────────────────────────────────────────────────

  readonly bot: FrontendTransport = {
    sendMessage: vi.fn(async (chatId: number, text: string, replyTo?: number): Promise<SentMessageRef> => {
      const messageId = this.nextBotId++;
      this.botSent.push({ chatId, messageId, text, replyTo });
      if (chatId === OWNER_ID) this.intoOwnerChat(messageId, { text }, replyTo);
      return { chatId, messageId };
    }),

    editMessage: vi.fn(async (chatId: number, messageId: number, text: string): Promise<void> => {
      this.botEdits.push({ chatId, messageId, text });
    }),

    forwardMessage: vi.fn(async (toChatId: number, fromChatId: number, messageId: number): Promise<SentMessageRef> => {
      const forwardedId = this.nextBotId++;
      const attachment = this.userAttachments.get(key(fromChatId, messageId));
      if (toChatId === OWNER_ID) this.intoOwnerChat(forwardedId, { text: '', attachment });
      return { chatId: toChatId, messageId: forwardedId };
    }),
  };

  /** The bot wrote into the owner's chat: the backend sees it under its own id */
  private intoOwnerChat(botMessageId: number, message: StoredMessage, replyTo?: number): void {
    const backendId = this.nextBackendId++;
    this.botToBackend.set(botMessageId, backendId);
    this.backendMessages.set(key(BOT_ID, backendId), message);
    this.inbox.push({
      chatId: BOT_ID,
      messageId: backendId,
      text: message.text,
      senderId: BOT_ID,
      replyToMessageId: replyTo === undefined ? undefined : this.botToBackend.get(replyTo),
      attachment: message.attachment,
      isSelfChat: false,
    });
  }

  // ── Backend identity ────────────────────────────────────────────────────

  readonly backend: BackendTransport = {
    getMessage: vi.fn(async (ref: BackendReference): Promise<BackendMessage | undefined> => {
      const message = this.backendMessages.get(key(ref.chatId, ref.messageId));
      return message ? { ref, ...message } : undefined;
    }),

    downloadAttachment: vi.fn(async (ref: BackendReference, destination: string): Promise<number> => {
      const failure = this.downloadFailures.get(key(ref.chatId, ref.messageId));
      if (failure) throw failure;

      const attachment = this.backendMessages.get(key(ref.chatId, ref.messageId))?.attachment;
      if (!attachment) throw new Error(`no media at ${ref.chatId}/${ref.messageId}`);

      const size = attachment.size ?? 1024;
      await writeFile(destination, Buffer.alloc(size));
      return size;
    }),

    sendSelfMessage: vi.fn(async (text: string): Promise<SentMessageRef> => {
      const messageId = this.nextBackendId++;
      this.selfSent.push({ messageId, text });
      return { chatId: OWNER_ID, messageId };
    }),

    editSelfMessage: vi.fn(async (messageId: number, text: string): Promise<void> => {
      this.selfEdits.push({ messageId, text });
    }),
  };

  /** The owner drops a file into their own saved messages */
  saveToSelf(attachment: AttachmentDescriptor): InboxMessage {
    const messageId = this.nextBackendId++;
    this.backendMessages.set(key(OWNER_ID, messageId), { text: '', attachment });
    return { chatId: OWNER_ID, messageId, text: '', attachment, isSelfChat: true };
  }

  /** Make downloads of a backend message fail with `err` */
  failDownload(ref: BackendReference, err: Error): void {
    this.downloadFailures.set(key(ref.chatId, ref.messageId), err);
  }

  /** Take every message queued for the backend inbox, oldest first */
  takeInbox(): InboxMessage[] {
    const taken = this.inbox;
    this.inbox = [];
    return taken;
  }

  /** Texts edited into one bot status message, in order */
  editsFor(chatId: number, messageId: number): string[] {
    return this.botEdits.filter((e) => e.chatId === chatId && e.messageId === messageId).map((e) => e.text);
  }
}
