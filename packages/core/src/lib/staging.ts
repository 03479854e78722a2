import { mkdir, mkdtemp, rm } from 'node:fs/promises';
import { basename, extname, join } from 'node:path';

import type { AttachmentDescriptor, AttachmentKind } from '../types.js';

const MAX_NAME_LENGTH = 100;

const KIND_EXTENSIONS: Record<AttachmentKind, string> = {
  document: '',
  video: '.mp4',
  audio: '.mp3',
  photo: '.jpg',
  voice: '.ogg',
  sticker: '.webp',
};

/**
 * Make a declared file name safe for the local filesystem: anything other
 * than ASCII letters, digits, `.`, `_` and `-` becomes `_`, and the result is
 * capped at 100 characters with the extension preserved.
 */
export function sanitizeFileName(name: string): string {
  const safe = basename(name).replace(/[^a-zA-Z0-9._-]/g, '_');
  if (safe === '' || safe === '.' || safe === '..') return 'file';
  if (safe.length <= MAX_NAME_LENGTH) return safe;

  const ext = extname(safe);
  if (!ext || ext.length >= MAX_NAME_LENGTH) return safe.slice(0, MAX_NAME_LENGTH);
  return safe.slice(0, MAX_NAME_LENGTH - ext.length) + ext;
}

/**
 * Name for an attachment that carries no declared file name, e.g.
 * `photo_AgADBQ.jpg`.
 */
export function synthesizeFileName(attachment: AttachmentDescriptor, fallbackId: string | number): string {
  const id = attachment.fileUniqueId ?? String(fallbackId);
  return `${attachment.kind}_${id}${KIND_EXTENSIONS[attachment.kind]}`;
}

/** The declared name, or a synthesized one when the sender gave none. */
export function displayName(attachment: AttachmentDescriptor, fallbackId: string | number): string {
  return attachment.fileName?.trim() || synthesizeFileName(attachment, fallbackId);
}

/**
 * Run `fn` with a path inside a fresh, job-private directory under `root`.
 * The directory and anything written to it are removed on every exit path.
 */
export async function withStagedFile<T>(
  root: string,
  fileName: string,
  fn: (path: string) => Promise<T>,
): Promise<T> {
  await mkdir(root, { recursive: true });
  const dir = await mkdtemp(join(root, 'job-'));
  try {
    return await fn(join(dir, sanitizeFileName(fileName)));
  } finally {
    await rm(dir, { recursive: true, force: true }).catch((err: unknown) => {
      console.error(`[STAGING] Failed to remove ${dir}:`, err);
    });
  }
}
