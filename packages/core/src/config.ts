import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { z } from 'zod';

const integerId = z.coerce.number().int().refine((n) => n !== 0, 'must be a non-zero chat id');
const durationMs = z.coerce.number().int().positive();

/**
 * Zod schema for the relay configuration.
 *
 * The credentials of both identities and the owner's user id are mandatory;
 * everything else has a default.
 */
export const configSchema = z.object({
  /** Frontend bot token from @BotFather */
  BOT_TOKEN: z.string().min(1, 'BOT_TOKEN is required'),

  /** MTProto application id of the backend account */
  API_ID: z.coerce.number().int().positive(),

  /** MTProto application hash of the backend account */
  API_HASH: z
    .string()
    .regex(/^[0-9a-fA-F]{32}$/, 'API_HASH must be exactly 32 hex characters'),

  /** Ready-made session string of the backend account */
  SESSION_STRING: z.string().min(1, 'SESSION_STRING is required'),

  /** User id of the backend account; the bot forwards into this chat */
  OWNER_ID: integerId,

  /** Chat that receives a copy of unexpected errors */
  ADMIN_CHAT_ID: integerId.optional(),

  GOFILE_API_URL: z.string().url().default('https://api.gofile.io'),
  GOFILE_DEFAULT_SERVER: z.string().min(1).default('store1'),

  /** Bound on a single content-store upload */
  UPLOAD_TIMEOUT_MS: durationMs.default(30 * 60 * 1000),
  /** Deadline for jobs that never reached the worker */
  JOB_TIMEOUT_MS: durationMs.default(10 * 60 * 1000),
  /** Deadline for jobs stuck while fetching or uploading */
  PROCESSING_TIMEOUT_MS: durationMs.default(40 * 60 * 1000),
  EVICTION_GRACE_MS: durationMs.default(60 * 1000),
  SWEEP_INTERVAL_MS: durationMs.default(60 * 1000),
  /** Longest rate-limit wait the worker retries after */
  MAX_RATE_LIMIT_WAIT_MS: durationMs.default(5 * 60 * 1000),

  /** Root directory for per-job staging directories */
  STAGING_DIR: z.string().min(1).default(join(tmpdir(), 'filerelay-staging')),

  /** Public URL for the bot webhook; long polling is used when absent */
  WEBHOOK_URL: z.string().url().optional(),
  WEBHOOK_SECRET: z
    .string()
    .regex(/^[A-Za-z0-9_-]{1,256}$/, 'WEBHOOK_SECRET may only contain A-Z, a-z, 0-9, _ and -')
    .optional(),

  /** Port the HTTP server listens on */
  PORT: z.coerce.number().int().min(1).max(65535).default(3456),

  /** Host the HTTP server binds to */
  HOST: z.string().default('0.0.0.0'),

  /** Path to the SQLite job history */
  DB_PATH: z.string().default('./filerelay.db'),
});

export type RelayConfig = z.infer<typeof configSchema>;

const KEYS = configSchema.keyof().options;

/**
 * Load configuration from `process.env`, validate with zod, and return a
 * frozen config object. Every key is read as `RELAY_<KEY>` first, then as
 * the bare `<KEY>`.
 *
 * Throws `ZodError` if validation fails.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): RelayConfig {
  const raw: Record<string, string> = {};
  for (const key of KEYS) {
    const value = env[`RELAY_${key}`] ?? env[key];
    // Skip unset and blank values so zod .default() kicks in
    if (value !== undefined && value.trim() !== '') raw[key] = value.trim();
  }

  return Object.freeze(configSchema.parse(raw));
}
