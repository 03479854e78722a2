import type { JobFailure, UploadResult } from '../types.js';

/**
 * User-facing texts for the status message. Everything is plain text (no
 * parse mode) so file names and links never need escaping.
 */

export function formatSize(bytes: number): string {
  return `${(bytes / (1024 * 1024)).toFixed(2)} MB`;
}

export const statusText = {
  welcome(name: string): string {
    return (
      `👋 Hello ${name}!\n\n` +
      'Send me a file of any size (document, video, audio, photo, voice or sticker) ' +
      'and I will upload it to Gofile and reply with a download link. ' +
      'Large files can take a while, please be patient.'
    );
  },

  received(): string {
    return '🔄 File received, preparing it for processing...';
  },

  queued(): string {
    return '✅ File handed over for processing. The link will appear here when it is ready.';
  },

  downloading(fileName: string): string {
    return `⏳ Downloading '${fileName}' from Telegram...`;
  },

  rateLimited(fileName: string, waitMs: number): string {
    return `⏳ Telegram asked us to slow down. Retrying '${fileName}' in ${Math.ceil(waitMs / 1000)}s...`;
  },

  uploading(fileName: string, sizeBytes: number): string {
    return `⏳ Uploading '${fileName}' (${formatSize(sizeBytes)}) to Gofile...`;
  },

  completed(result: UploadResult): string {
    const lines = [
      '✅ File uploaded!',
      '',
      `🏷️ Name: ${result.fileName}`,
      `🔗 Link: ${result.link}`,
    ];
    if (result.token) {
      lines.push(`🔑 Admin code: ${result.token} (keep it to manage the file)`);
    }
    return lines.join('\n');
  },

  failed(failure: JobFailure): string {
    switch (failure.kind) {
      case 'transport':
        return `❌ Could not hand the file over for processing: ${failure.message}\nPlease send it again.`;
      case 'resolution':
        return `❌ The file could not be located for processing (${failure.message}). Please send it again.`;
      case 'expired':
        return '❌ The file reference expired before it could be downloaded. Please send the file again.';
      case 'rate_limited':
        return '❌ Telegram is limiting downloads right now. Please try again later.';
      case 'upstream_store':
        return `❌ Upload to Gofile failed: ${failure.message}`;
      case 'timeout':
        return '❌ Processing timed out. Please send the file again.';
      case 'input_rejected':
        return `❌ ${failure.message}`;
      case 'unexpected':
        return `❌ An unexpected error occurred while processing the file: ${failure.message}`;
    }
  },

  unsupported(): string {
    return '❌ Please send a file: a document, video, audio, photo, voice message or static sticker.';
  },

  animatedSticker(): string {
    return '❌ Animated and video stickers are not supported. Please send a static sticker or a file.';
  },
};
