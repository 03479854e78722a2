/**
 * filerelay — Entry point.
 *
 * Usage:
 *   npx tsx src/index.ts
 *
 * Configuration comes from the environment (see `loadConfig`): bot token,
 * MTProto credentials and session of the backend account, and OWNER_ID.
 */

import { pathToFileURL } from 'node:url';

import {
  JobHistory,
  createDatabase,
  loadConfig,
  type RelayConfig,
} from '@filerelay/core';
import { GofileClient } from '@filerelay/gofile';
import {
  BotTransport,
  TelegramApi,
  TelegramPoller,
  createTelegramWebhookHandler,
} from '@filerelay/telegram';
import { UserbotClient } from '@filerelay/userbot';

import { createRelay, relayNotice } from './relay.js';
import { createApp, createServer, type UpdateMode } from './server.js';

export {
  createRelay,
  relayNotice,
  type BackendConnector,
  type CreateRelayOptions,
  type Relay,
  type RelaySettings,
} from './relay.js';
export { createApp, createServer, WEBHOOK_PATH, type AppOptions, type ServerConfig, type UpdateMode } from './server.js';

/**
 * Start the relay: connect both identities, begin receiving bot updates
 * (webhook when WEBHOOK_URL is set, long polling otherwise) and serve
 * the health endpoint.
 */
export async function start(config: RelayConfig = loadConfig()) {
  const api = new TelegramApi(config.BOT_TOKEN);
  const me = await api.getMe();
  console.log(`[filerelay] Frontend bot: @${me.username} (${me.id})`);

  const userbot = new UserbotClient({
    apiId: config.API_ID,
    apiHash: config.API_HASH,
    session: config.SESSION_STRING,
    frontendBotId: me.id,
    frontendBotUsername: me.username,
  });

  const history = new JobHistory(createDatabase(config.DB_PATH));

  const { engine, intake, connectBackend } = createRelay({
    config,
    frontend: new BotTransport(api),
    backend: userbot,
    contentStore: new GofileClient({
      apiUrl: config.GOFILE_API_URL,
      defaultServer: config.GOFILE_DEFAULT_SERVER,
      uploadTimeoutMs: config.UPLOAD_TIMEOUT_MS,
    }),
    history,
  });

  await connectBackend(userbot);

  // ── Bot updates ─────────────────────────────────────────────────────
  const mode: UpdateMode = config.WEBHOOK_URL ? 'webhook' : 'polling';
  let poller: TelegramPoller | null = null;

  if (config.WEBHOOK_URL) {
    await api.setWebhook(config.WEBHOOK_URL, config.WEBHOOK_SECRET);
    console.log(`[filerelay] Webhook set to ${config.WEBHOOK_URL}`);
  } else {
    await api.deleteWebhook();
    poller = new TelegramPoller(api, (update) => intake.handleUpdate(update));
    poller.start();
    console.log('[filerelay] Long polling for updates');
  }

  const app = createApp({
    engine,
    mode,
    webhook:
      mode === 'webhook'
        ? createTelegramWebhookHandler({
            secret: config.WEBHOOK_SECRET,
            onUpdate: (update) => intake.handleUpdate(update),
          })
        : undefined,
  });
  const server = createServer(app, { port: config.PORT, host: config.HOST });

  engine.start();
  await engine.announce(relayNotice.started(mode));

  const stop = async () => {
    await engine.announce(relayNotice.stopping());
    engine.stop();
    await poller?.stop();
    await server.stop();
    await engine.idle();
    await userbot.stop();
  };

  return { engine, intake, history, server, stop };
}

// ── CLI entry point ─────────────────────────────────────────────────────────

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  start().catch((err) => {
    console.error('[filerelay] Fatal:', err);
    process.exit(1);
  });
}
