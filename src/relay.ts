/**
 * Relay assembly — wires the engine and the frontend intake around the two
 * identities and the content store. `start()` passes the live clients; the
 * integration tests pass in-process fakes.
 */

import {
  RelayEngine,
  type BackendTransport,
  type ContentStore,
  type FrontendTransport,
  type InboxHandler,
  type JobHistory,
  type RelayConfig,
  type Scheduler,
} from '@filerelay/core';
import { FrontendIntake } from '@filerelay/telegram';

export type RelaySettings = Pick<
  RelayConfig,
  | 'OWNER_ID'
  | 'ADMIN_CHAT_ID'
  | 'STAGING_DIR'
  | 'JOB_TIMEOUT_MS'
  | 'PROCESSING_TIMEOUT_MS'
  | 'EVICTION_GRACE_MS'
  | 'SWEEP_INTERVAL_MS'
  | 'MAX_RATE_LIMIT_WAIT_MS'
>;

export interface CreateRelayOptions {
  config: RelaySettings;
  frontend: FrontendTransport;
  backend: BackendTransport;
  contentStore: ContentStore;
  /** Settled jobs are recorded here when given */
  history?: JobHistory;
  now?: () => number;
  generateId?: () => string;
  schedule?: Scheduler;
}

/** The backend identity's connection, as far as startup is concerned */
export interface BackendConnector {
  start(onMessage: InboxHandler): Promise<void>;
}

export interface Relay {
  engine: RelayEngine;
  intake: FrontendIntake;
  /**
   * Connect the backend identity and feed its inbox to the engine. When it
   * cannot sign in, the owner and the admin chat are told before the error
   * is rethrown.
   */
  connectBackend(backend: BackendConnector): Promise<void>;
}

export const relayNotice = {
  started: (mode: string) => `🟢 File relay started (${mode})`,
  stopping: () => '🔴 File relay stopping',
  backendDown: (detail: string) =>
    `⚠️ The backend account could not connect: ${detail}\nGenerate a new SESSION_STRING and restart the relay.`,
};

export function createRelay(options: CreateRelayOptions): Relay {
  const { config, history } = options;

  const engine = new RelayEngine({
    frontend: options.frontend,
    backend: options.backend,
    contentStore: options.contentStore,
    stagingDir: config.STAGING_DIR,
    orphanTimeoutMs: config.JOB_TIMEOUT_MS,
    processingTimeoutMs: config.PROCESSING_TIMEOUT_MS,
    evictionGraceMs: config.EVICTION_GRACE_MS,
    sweepIntervalMs: config.SWEEP_INTERVAL_MS,
    maxRateLimitWaitMs: config.MAX_RATE_LIMIT_WAIT_MS,
    adminChatId: config.ADMIN_CHAT_ID,
    onSettled: history ? (job) => history.record(job) : undefined,
    now: options.now,
    generateId: options.generateId,
    schedule: options.schedule,
  });

  const intake = new FrontendIntake({
    transport: options.frontend,
    store: engine.store,
    status: engine.status,
    ownerId: config.OWNER_ID,
    onUnexpectedError: (scope, err) => engine.reportUnexpected(scope, err),
  });

  const connectBackend = async (backend: BackendConnector): Promise<void> => {
    try {
      await backend.start((message) => engine.handleBackendMessage(message));
    } catch (err) {
      const text = relayNotice.backendDown(err instanceof Error ? err.message : String(err));
      await Promise.all([
        options.frontend.sendMessage(config.OWNER_ID, text).catch((sendErr: unknown) => {
          const detail = sendErr instanceof Error ? sendErr.message : String(sendErr);
          console.warn('[filerelay] Could not notify the owner:', detail);
        }),
        engine.announce(text),
      ]);
      throw err;
    }
  };

  return { engine, intake, connectBackend };
}
