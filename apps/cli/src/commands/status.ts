/**
 * `filerelay status` — Show the current state of the relay.
 *
 * Checks:
 *   - Which credentials are configured (from .env and the environment)
 *   - Where Telegram currently delivers bot updates
 *   - Whether the HTTP server answers its health check
 *   - Recently settled jobs from the SQLite history
 */

import { Command } from 'commander';
import { existsSync } from 'node:fs';
import { resolve } from 'node:path';

import { readEnvFile } from '../env.js';

// ─── Status checks ──────────────────────────────────────────────────────────

async function checkHealth(port: number): Promise<{ ok: boolean; data?: unknown }> {
  try {
    const res = await fetch(`http://localhost:${port}/health`, {
      signal: AbortSignal.timeout(3000),
    });
    if (!res.ok) return { ok: false };
    return { ok: true, data: await res.json() };
  } catch {
    return { ok: false };
  }
}

async function checkWebhook(botToken: string): Promise<string> {
  const { TelegramApi } = await import('@filerelay/telegram');
  try {
    const info = await new TelegramApi(botToken).getWebhookInfo();
    if (!info.url) return 'none (long polling)';
    const lastError = info.last_error_message ? `, last error: ${info.last_error_message}` : '';
    return `${info.url} (${info.pending_update_count} pending${lastError})`;
  } catch (err) {
    return `unavailable (${err instanceof Error ? err.message : String(err)})`;
  }
}

async function recentJobs(dbPath: string, limit: number) {
  if (!existsSync(dbPath)) return null;
  const { createDatabase, JobHistory } = await import('@filerelay/core');
  return new JobHistory(createDatabase(dbPath)).recent(limit);
}

// ─── Command definition ─────────────────────────────────────────────────────

interface StatusOptions {
  envFile: string;
  limit: string;
}

export const statusCommand = new Command('status')
  .description('Show the current status of the relay')
  .option('--env-file <path>', 'Path to .env file', '.env')
  .option('--limit <n>', 'Number of recent jobs to list', '10')
  .action(async (options: StatusOptions) => {
    const envPath = resolve(process.cwd(), options.envFile);
    const env = readEnvFile(envPath);
    const lookup = (key: string): string | undefined =>
      env.get(`RELAY_${key}`) ?? env.get(key) ?? process.env[`RELAY_${key}`] ?? process.env[key];

    const port = Number(lookup('PORT')) || 3456;
    const dbPath = lookup('DB_PATH') || './filerelay.db';

    console.log('');
    console.log('filerelay status');
    console.log('================');
    console.log('');

    // 1. Environment file
    console.log(`  .env file:     ${envPath}${existsSync(envPath) ? '' : ' (NOT FOUND)'}`);

    // 2. Identities
    console.log('');
    console.log('  Configuration:');
    for (const key of ['BOT_TOKEN', 'API_ID', 'API_HASH', 'SESSION_STRING', 'OWNER_ID']) {
      console.log(`    ${key.padEnd(15)}${lookup(key) ? 'set' : 'MISSING'}`);
    }
    console.log(`    ${'Updates'.padEnd(15)}${lookup('WEBHOOK_URL') ? 'webhook' : 'long polling'}`);

    const botToken = lookup('BOT_TOKEN');
    if (botToken) {
      console.log(`    ${'Webhook'.padEnd(15)}${await checkWebhook(botToken)}`);
    }

    // 3. HTTP server
    console.log('');
    const health = await checkHealth(port);
    console.log(`  Server:        ${health.ok ? 'running' : 'not running'} (port ${port})`);
    if (health.ok && health.data !== undefined) {
      console.log(`    ${JSON.stringify(health.data)}`);
    }

    // 4. Job history
    console.log('');
    const jobs = await recentJobs(resolve(process.cwd(), dbPath), Number(options.limit) || 10);
    if (!jobs) {
      console.log(`  History:       ${dbPath} (not found)`);
    } else if (jobs.length === 0) {
      console.log(`  History:       ${dbPath} (no jobs yet)`);
    } else {
      console.log(`  History:       ${dbPath}`);
      for (const job of jobs) {
        const outcome = job.state === 'completed' ? job.link : `${job.failureKind}: ${job.failureMessage}`;
        console.log(`    ${job.settledAt}  ${job.fileName ?? job.attachmentKind}  ${outcome}`);
      }
    }

    console.log('');
  });
