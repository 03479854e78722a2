export { TelegramApi } from './api.js';
export type {
  TelegramSendMessageOptions,
  TelegramEditMessageOptions,
  TelegramForwardMessageOptions,
  TelegramGetUpdatesOptions,
  TelegramUpdateBatch,
  TelegramSentMessage,
  TelegramBotInfo,
  TelegramWebhookInfo,
} from './api.js';
export { BotTransport } from './bot-transport.js';
export { classifyMessage } from './classify.js';
export type { Classification } from './classify.js';
export { FrontendIntake } from './intake.js';
export type { IntakeOptions } from './intake.js';
export { TelegramPoller } from './poller.js';
export type { PollerOptions, UpdateSource } from './poller.js';
export { createTelegramWebhookHandler } from './webhook.js';
export type { WebhookHandlerOptions } from './webhook.js';
export { telegramUpdateSchema, telegramMessageSchema } from './types.js';
export type { TelegramUpdate, TelegramMessage, TelegramUser, TelegramChat } from './types.js';
