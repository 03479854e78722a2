/**
 * FrontendIntake — turns user messages sent to the bot into relay jobs.
 *
 * For every accepted attachment:
 *   1. create the job and reply with a status message
 *   2. forward the user's message into the owner's chat with the bot
 *   3. reply to the forwarded copy with the correlation envelope
 *   4. edit the status to "queued"
 *
 * The bot never downloads the bytes itself. Any failure before the
 * envelope is out settles the job and tells the user to resend.
 */

import {
  encodeEnvelope,
  statusText,
  toFailure,
  type AttachmentDescriptor,
  type CorrelationStore,
  type FrontendTransport,
  type StatusReporter,
} from '@filerelay/core';

import { classifyMessage } from './classify.js';
import type { TelegramMessage, TelegramUpdate } from './types.js';

export interface IntakeOptions {
  transport: FrontendTransport;
  store: CorrelationStore;
  status: StatusReporter;
  /** User id of the backend account; its chat with the bot is the relay inbox */
  ownerId: number;
  /** Called when an update could not be handled at all */
  onUnexpectedError?: (scope: string, err: unknown) => void;
}

const COMMAND_RE = /^\/(start|help)(@\w+)?(\s|$)/;

export class FrontendIntake {
  private readonly transport: FrontendTransport;
  private readonly store: CorrelationStore;
  private readonly status: StatusReporter;
  private readonly ownerId: number;
  private readonly onUnexpectedError?: (scope: string, err: unknown) => void;

  constructor(options: IntakeOptions) {
    this.transport = options.transport;
    this.store = options.store;
    this.status = options.status;
    this.ownerId = options.ownerId;
    this.onUnexpectedError = options.onUnexpectedError;
  }

  /** Handle one Bot API update. Never rejects. */
  async handleUpdate(update: TelegramUpdate): Promise<void> {
    const msg = update.message;
    if (!msg) return;

    // Only private chats with people are served
    if (msg.chat.type !== 'private' || msg.from?.is_bot) return;

    try {
      await this.handleMessage(msg);
    } catch (err) {
      console.error(`[INTAKE] Failed to handle message ${msg.chat.id}/${msg.message_id}:`, err);
      this.onUnexpectedError?.(`message ${msg.chat.id}/${msg.message_id}`, err);
    }
  }

  private async handleMessage(msg: TelegramMessage): Promise<void> {
    if (msg.text && COMMAND_RE.test(msg.text.trim())) {
      await this.transport.sendMessage(msg.chat.id, statusText.welcome(msg.from?.first_name ?? 'there'));
      return;
    }

    const classification = classifyMessage(msg);
    if (!classification.ok) {
      const text =
        classification.reason === 'animated_sticker' ? statusText.animatedSticker() : statusText.unsupported();
      await this.transport.sendMessage(msg.chat.id, text, msg.message_id);
      return;
    }

    await this.submit(msg, classification.attachment);
  }

  private async submit(msg: TelegramMessage, attachment: AttachmentDescriptor): Promise<void> {
    const chatId = msg.chat.id;
    const job = this.store.create({ originChat: chatId, attachment });
    const id = job.correlationId;
    console.log(`[INTAKE] ${id}: ${attachment.kind} from chat ${chatId}`);

    let statusMessageId: number;
    try {
      const sent = await this.transport.sendMessage(chatId, statusText.received(), msg.message_id);
      statusMessageId = sent.messageId;
    } catch (err) {
      this.store.fail(id, { kind: 'transport', message: toFailure(err).message });
      console.error(`[INTAKE] ${id}: could not post status message:`, err);
      return;
    }

    const handle = { chatId, messageId: statusMessageId, owner: 'frontend' as const };
    this.store.attachStatusHandle(id, handle);

    let forwardedId: number;
    try {
      const forwarded = await this.transport.forwardMessage(this.ownerId, chatId, msg.message_id);
      forwardedId = forwarded.messageId;
    } catch (err) {
      await this.fail(id, 'forward', err);
      return;
    }

    if (!this.store.transition(id, 'forward_requested').ok) {
      console.warn(`[INTAKE] ${id}: settled before the forward was acknowledged`);
      return;
    }

    const envelope = encodeEnvelope({ correlationId: id, originChat: chatId, statusMessageId });
    try {
      await this.transport.sendMessage(this.ownerId, envelope, forwardedId);
    } catch (err) {
      // The forwarded copy stays in the inbox; without its envelope nothing claims it
      await this.fail(id, 'envelope', err);
      return;
    }

    // The backend may already have picked the job up
    if (this.store.get(id)?.state === 'forward_requested') {
      await this.status.update(handle, statusText.queued());
    }
  }

  private async fail(correlationId: string, step: 'forward' | 'envelope', err: unknown): Promise<void> {
    const failure = { kind: 'transport' as const, message: toFailure(err).message };
    const result = this.store.fail(correlationId, failure);
    if (!result.ok) return;

    console.warn(`[INTAKE] ${correlationId}: ${step} failed: ${failure.message}`);
    await this.status.update(result.job.statusHandle, statusText.failed(failure));
  }
}
