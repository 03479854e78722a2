/**
 * `filerelay start` — Boot the relay: both Telegram identities, the update
 * loop (webhook or long polling) and the health server.
 */

import { Command } from 'commander';
import { resolve } from 'node:path';
import { ZodError } from 'zod';

import { loadEnvFile } from '../env.js';

interface StartOptions {
  envFile: string;
  port?: string;
  host?: string;
  db?: string;
  webhookUrl?: string;
}

export const startCommand = new Command('start')
  .description('Start the relay with the configured bot and backend account')
  .option('--env-file <path>', 'Path to .env file', '.env')
  .option('--port <port>', 'Override HTTP server port')
  .option('--host <host>', 'Override HTTP server host')
  .option('--db <path>', 'Override SQLite job history path')
  .option('--webhook-url <url>', 'Receive bot updates through this public webhook URL')
  .action(async (options: StartOptions) => {
    loadEnvFile(resolve(process.cwd(), options.envFile));

    // Apply option overrides to env
    if (options.port) process.env.RELAY_PORT = options.port;
    if (options.host) process.env.RELAY_HOST = options.host;
    if (options.db) process.env.RELAY_DB_PATH = options.db;
    if (options.webhookUrl) process.env.RELAY_WEBHOOK_URL = options.webhookUrl;

    const { loadConfig } = await import('@filerelay/core');
    let config: ReturnType<typeof loadConfig>;
    try {
      config = loadConfig();
    } catch (err) {
      if (err instanceof ZodError) {
        console.error('Invalid configuration:');
        for (const issue of err.issues) {
          console.error(`  ${issue.path.join('.') || '(root)'}: ${issue.message}`);
        }
        process.exit(1);
      }
      throw err;
    }

    const { start } = await import('../../../../src/index.js');
    const relay = await start(config);

    // ── Ready ───────────────────────────────────────────────────────────
    console.log('');
    console.log('filerelay is running');
    console.log(`  Health: http://localhost:${config.PORT}/health`);
    console.log('');
    console.log('Press Ctrl+C to stop.');

    // ── Graceful shutdown ───────────────────────────────────────────────
    let stopping = false;
    const shutdown = () => {
      if (stopping) return;
      stopping = true;
      console.log('\nStopping...');
      relay
        .stop()
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          console.error('[filerelay] Shutdown failed:', err);
          process.exit(1);
        });
    };

    process.on('SIGINT', shutdown);
    process.on('SIGTERM', shutdown);
  });
