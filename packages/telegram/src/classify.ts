import type { AttachmentDescriptor } from '@filerelay/core';

import type { TelegramMessage } from './types.js';

export type Classification =
  | { ok: true; attachment: AttachmentDescriptor }
  | { ok: false; reason: 'animated_sticker' | 'unsupported' };

/**
 * Decide whether a message carries an attachment the relay accepts and
 * describe it. Photos resolve to their largest size; animated and video
 * stickers, video notes and plain text are rejected.
 */
export function classifyMessage(msg: TelegramMessage): Classification {
  if (msg.document) {
    return accept({
      kind: 'document',
      fileName: msg.document.file_name,
      size: msg.document.file_size,
      mimeType: msg.document.mime_type,
      fileId: msg.document.file_id,
      fileUniqueId: msg.document.file_unique_id,
    });
  }

  if (msg.video) {
    return accept({
      kind: 'video',
      fileName: msg.video.file_name,
      size: msg.video.file_size,
      mimeType: msg.video.mime_type,
      fileId: msg.video.file_id,
      fileUniqueId: msg.video.file_unique_id,
    });
  }

  if (msg.audio) {
    return accept({
      kind: 'audio',
      fileName: msg.audio.file_name,
      size: msg.audio.file_size,
      mimeType: msg.audio.mime_type,
      fileId: msg.audio.file_id,
      fileUniqueId: msg.audio.file_unique_id,
    });
  }

  if (msg.voice) {
    return accept({
      kind: 'voice',
      size: msg.voice.file_size,
      mimeType: msg.voice.mime_type,
      fileId: msg.voice.file_id,
      fileUniqueId: msg.voice.file_unique_id,
    });
  }

  const largest = msg.photo?.at(-1);
  if (largest) {
    return accept({
      kind: 'photo',
      size: largest.file_size,
      fileId: largest.file_id,
      fileUniqueId: largest.file_unique_id,
    });
  }

  if (msg.sticker) {
    if (msg.sticker.is_animated || msg.sticker.is_video) {
      return { ok: false, reason: 'animated_sticker' };
    }
    return accept({
      kind: 'sticker',
      size: msg.sticker.file_size,
      fileId: msg.sticker.file_id,
      fileUniqueId: msg.sticker.file_unique_id,
    });
  }

  return { ok: false, reason: 'unsupported' };
}

function accept(attachment: AttachmentDescriptor): Classification {
  return { ok: true, attachment };
}
