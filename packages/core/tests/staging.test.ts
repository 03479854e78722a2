import { existsSync, mkdtempSync, readdirSync, rmSync } from 'node:fs';
import { writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { basename, dirname, join } from 'node:path';

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  displayName,
  sanitizeFileName,
  synthesizeFileName,
  withStagedFile,
} from '../src/lib/staging.js';

describe('sanitizeFileName', () => {
  it('keeps safe names untouched', () => {
    expect(sanitizeFileName('report.pdf')).toBe('report.pdf');
    expect(sanitizeFileName('My_File-2.tar.gz')).toBe('My_File-2.tar.gz');
  });

  it('replaces every character outside [A-Za-z0-9._-] with an underscore', () => {
    expect(sanitizeFileName('quarterly report (final).pdf')).toBe('quarterly_report__final_.pdf');
    expect(sanitizeFileName('résumé.docx')).toBe('r_sum_.docx');
  });

  it('strips directory components', () => {
    expect(sanitizeFileName('../../etc/passwd')).toBe('passwd');
  });

  it('falls back to "file" for empty or dot-only names', () => {
    expect(sanitizeFileName('')).toBe('file');
    expect(sanitizeFileName('..')).toBe('file');
  });

  it('caps long names at 100 characters and keeps the extension', () => {
    const result = sanitizeFileName(`${'a'.repeat(150)}.pdf`);
    expect(result).toHaveLength(100);
    expect(result).toBe(`${'a'.repeat(96)}.pdf`);
  });

  it('truncates long names without an extension', () => {
    expect(sanitizeFileName('b'.repeat(120))).toBe('b'.repeat(100));
  });
});

describe('synthesizeFileName / displayName', () => {
  it('builds a name from the kind and the platform id', () => {
    expect(synthesizeFileName({ kind: 'photo', fileUniqueId: 'AgAD42' }, 9)).toBe('photo_AgAD42.jpg');
    expect(synthesizeFileName({ kind: 'voice' }, 9)).toBe('voice_9.ogg');
    expect(synthesizeFileName({ kind: 'document' }, 'x1')).toBe('document_x1');
  });

  it('prefers the declared name', () => {
    expect(displayName({ kind: 'document', fileName: ' report.pdf ' }, 1)).toBe('report.pdf');
    expect(displayName({ kind: 'sticker', fileName: '   ', fileUniqueId: 'S1' }, 1)).toBe('sticker_S1.webp');
  });
});

describe('withStagedFile', () => {
  let root: string;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'staging-test-'));
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it('hands out a sanitized path in a private directory and removes it afterwards', async () => {
    let seen = '';
    const size = await withStagedFile(root, 'my report.pdf', async (path) => {
      seen = path;
      await writeFile(path, 'hello');
      expect(existsSync(path)).toBe(true);
      return 5;
    });

    expect(size).toBe(5);
    expect(basename(seen)).toBe('my_report.pdf');
    expect(basename(dirname(seen)).startsWith('job-')).toBe(true);
    expect(existsSync(dirname(seen))).toBe(false);
    expect(readdirSync(root)).toEqual([]);
  });

  it('removes the directory when the callback throws', async () => {
    let seen = '';
    await expect(
      withStagedFile(root, 'broken.bin', async (path) => {
        seen = path;
        await writeFile(path, 'partial');
        throw new Error('download interrupted');
      }),
    ).rejects.toThrow('download interrupted');

    expect(existsSync(dirname(seen))).toBe(false);
  });

  it('creates the root when it does not exist yet', async () => {
    const nested = join(root, 'a', 'b');
    await withStagedFile(nested, 'x.txt', async () => undefined);
    expect(existsSync(nested)).toBe(true);
  });
});
