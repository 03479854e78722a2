import { z } from 'zod';

/**
 * Bot API payload schemas, limited to the fields the relay reads. Unknown
 * keys are stripped on parse.
 */

// ─── Building blocks ────────────────────────────────────────────────────────

export const telegramUserSchema = z.object({
  id: z.number(),
  is_bot: z.boolean(),
  first_name: z.string(),
  last_name: z.string().optional(),
  username: z.string().optional(),
});

export const telegramChatSchema = z.object({
  id: z.number(),
  type: z.enum(['private', 'group', 'supergroup', 'channel']),
  title: z.string().optional(),
  username: z.string().optional(),
});

const fileFields = {
  file_id: z.string(),
  file_unique_id: z.string(),
  file_size: z.number().optional(),
};

export const photoSizeSchema = z.object({
  ...fileFields,
  width: z.number(),
  height: z.number(),
});

export const documentSchema = z.object({
  ...fileFields,
  file_name: z.string().optional(),
  mime_type: z.string().optional(),
});

export const videoSchema = documentSchema.extend({
  duration: z.number().optional(),
});

export const audioSchema = documentSchema.extend({
  duration: z.number().optional(),
  title: z.string().optional(),
});

export const voiceSchema = z.object({
  ...fileFields,
  duration: z.number().optional(),
  mime_type: z.string().optional(),
});

export const stickerSchema = z.object({
  ...fileFields,
  is_animated: z.boolean(),
  is_video: z.boolean(),
  emoji: z.string().optional(),
});

// ─── Message & update ───────────────────────────────────────────────────────

export const telegramMessageSchema = z.object({
  message_id: z.number(),
  from: telegramUserSchema.optional(),
  chat: telegramChatSchema,
  date: z.number(),
  text: z.string().optional(),
  caption: z.string().optional(),
  document: documentSchema.optional(),
  video: videoSchema.optional(),
  audio: audioSchema.optional(),
  voice: voiceSchema.optional(),
  photo: z.array(photoSizeSchema).optional(),
  sticker: stickerSchema.optional(),
  video_note: z.object(fileFields).optional(),
});

export const telegramUpdateSchema = z.object({
  update_id: z.number(),
  message: telegramMessageSchema.optional(),
});

export type TelegramUser = z.infer<typeof telegramUserSchema>;
export type TelegramChat = z.infer<typeof telegramChatSchema>;
export type TelegramMessage = z.infer<typeof telegramMessageSchema>;
export type TelegramUpdate = z.infer<typeof telegramUpdateSchema>;
