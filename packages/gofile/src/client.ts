/**
 * GofileClient — uploads staged files to Gofile and returns the public
 * download page. Server selection goes through `getServer` and falls back
 * to a fixed default server when that lookup fails in any way.
 */

import { openAsBlob } from 'node:fs';

import { z } from 'zod';
import { RelayError, type ContentStore, type UploadResult } from '@filerelay/core';

// ─── Response shapes ────────────────────────────────────────────────────────

const serverResponseSchema = z.object({
  status: z.string(),
  data: z.object({ server: z.string().min(1) }).optional(),
});

const uploadResponseSchema = z.object({
  status: z.string(),
  data: z
    .object({
      downloadPage: z.string().optional(),
      fileName: z.string().optional(),
      adminCode: z.string().optional(),
    })
    .optional(),
});

// ─── Client ─────────────────────────────────────────────────────────────────

export interface GofileClientOptions {
  /** Base URL of the Gofile API (default https://api.gofile.io) */
  apiUrl?: string;
  /** Server used when `getServer` fails (default store1) */
  defaultServer?: string;
  /** Abort an upload after this long (default 30 min) */
  uploadTimeoutMs?: number;
  /** Timeout for the `getServer` lookup (default 15 s) */
  lookupTimeoutMs?: number;
}

export class GofileClient implements ContentStore {
  private readonly apiUrl: string;
  private readonly defaultServer: string;
  private readonly uploadTimeoutMs: number;
  private readonly lookupTimeoutMs: number;

  constructor(options: GofileClientOptions = {}) {
    this.apiUrl = (options.apiUrl ?? 'https://api.gofile.io').replace(/\/+$/, '');
    this.defaultServer = options.defaultServer ?? 'store1';
    this.uploadTimeoutMs = options.uploadTimeoutMs ?? 30 * 60 * 1000;
    this.lookupTimeoutMs = options.lookupTimeoutMs ?? 15 * 1000;
  }

  /** Pick an upload server; never throws */
  async getServer(): Promise<string> {
    try {
      const res = await fetch(`${this.apiUrl}/getServer`, {
        signal: AbortSignal.timeout(this.lookupTimeoutMs),
      });
      if (!res.ok) throw new Error(`HTTP ${res.status}`);

      const parsed = serverResponseSchema.safeParse(await res.json());
      if (parsed.success && parsed.data.status === 'ok' && parsed.data.data) {
        return parsed.data.data.server;
      }
      throw new Error('unexpected getServer response');
    } catch (err) {
      console.warn(
        `[GOFILE] getServer failed, using ${this.defaultServer}:`,
        err instanceof Error ? err.message : String(err),
      );
      return this.defaultServer;
    }
  }

  async upload(filePath: string, fileName: string): Promise<UploadResult> {
    const server = await this.getServer();
    const url = `https://${server}.gofile.io/uploadFile`;

    const form = new FormData();
    form.append('file', await openAsBlob(filePath), fileName);

    let res: Response;
    try {
      res = await fetch(url, {
        method: 'POST',
        body: form,
        signal: AbortSignal.timeout(this.uploadTimeoutMs),
      });
    } catch (err) {
      if (err instanceof Error && (err.name === 'TimeoutError' || err.name === 'AbortError')) {
        throw new RelayError('upstream_store', `Upload timed out after ${Math.round(this.uploadTimeoutMs / 1000)}s`, {
          cause: err,
        });
      }
      throw new RelayError(
        'upstream_store',
        `Upload failed: ${err instanceof Error ? err.message : String(err)}`,
        { cause: err },
      );
    }

    if (!res.ok) {
      throw new RelayError('upstream_store', `Upload failed with HTTP ${res.status}`);
    }

    let body: unknown;
    try {
      body = await res.json();
    } catch (err) {
      throw new RelayError('upstream_store', 'Upload response was not JSON', { cause: err });
    }

    const parsed = uploadResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new RelayError('upstream_store', 'Upload response had an unexpected shape');
    }
    const { status, data } = parsed.data;
    if (status !== 'ok') {
      throw new RelayError('upstream_store', `Upload rejected: ${status}`);
    }
    if (!data?.downloadPage) {
      throw new RelayError('upstream_store', 'Upload response carried no download link');
    }

    console.log(`[GOFILE] Uploaded ${fileName} to ${server}: ${data.downloadPage}`);
    return {
      link: data.downloadPage,
      token: data.adminCode,
      fileName: data.fileName ?? fileName,
    };
  }
}
