import type { FrontendTransport, SentMessageRef } from '@filerelay/core';

import type { TelegramApi } from './api.js';

/** Bot API answer to an edit whose text did not change */
const NOT_MODIFIED = 'message is not modified';

/** The frontend identity seen through the Bot API. */
export class BotTransport implements FrontendTransport {
  constructor(private readonly api: TelegramApi) {}

  async sendMessage(chatId: number, text: string, replyTo?: number): Promise<SentMessageRef> {
    const sent = await this.api.sendMessage({
      chat_id: chatId,
      text,
      reply_to_message_id: replyTo,
    });
    return { chatId: sent.chat.id, messageId: sent.message_id };
  }

  async editMessage(chatId: number, messageId: number, text: string): Promise<void> {
    try {
      await this.api.editMessageText({ chat_id: chatId, message_id: messageId, text });
    } catch (err) {
      if (err instanceof Error && err.message.includes(NOT_MODIFIED)) return;
      throw err;
    }
  }

  async forwardMessage(toChatId: number, fromChatId: number, messageId: number): Promise<SentMessageRef> {
    const forwarded = await this.api.forwardMessage({
      chat_id: toChatId,
      from_chat_id: fromChatId,
      message_id: messageId,
    });
    return { chatId: forwarded.chat.id, messageId: forwarded.message_id };
  }
}
