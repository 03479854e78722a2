/**
 * RelayEngine — owns the correlation store and wires the coordinator, the
 * worker and the status reporter around the two injected identities.
 *
 * The frontend intake writes into `engine.store` and reports through
 * `engine.status`; the backend event stream is fed to `handleBackendMessage`.
 */

import { RelayCoordinator } from './coordinator.js';
import { CorrelationStore, type SweepResult } from './correlation-store.js';
import { statusText } from './lib/status-text.js';
import { RoutedStatusReporter } from './status-reporter.js';
import type {
  BackendTransport,
  ContentStore,
  FrontendTransport,
  StatusReporter,
} from './transport.js';
import type { InboxMessage, Job } from './types.js';
import { FetchAndRelayWorker, type Scheduler } from './worker.js';

// ─── Options ────────────────────────────────────────────────────────────────

export interface RelayEngineOptions {
  frontend: FrontendTransport;
  backend: BackendTransport;
  contentStore: ContentStore;
  stagingDir: string;
  orphanTimeoutMs?: number;
  processingTimeoutMs?: number;
  evictionGraceMs?: number;
  /** How often `start()` sweeps the store (default 60 s) */
  sweepIntervalMs?: number;
  maxRateLimitWaitMs?: number;
  /** Chat that receives lifecycle notices and a copy of unexpected errors */
  adminChatId?: number;
  /** Called once per job when it settles (e.g. job history) */
  onSettled?: (job: Job) => void;
  now?: () => number;
  generateId?: () => string;
  schedule?: Scheduler;
}

// ─── Engine ─────────────────────────────────────────────────────────────────

export class RelayEngine {
  readonly store: CorrelationStore;
  readonly status: StatusReporter;

  private readonly frontend: FrontendTransport;
  private readonly backend: BackendTransport;
  private readonly worker: FetchAndRelayWorker;
  private readonly coordinator: RelayCoordinator;
  private readonly sweepIntervalMs: number;
  private readonly adminChatId?: number;
  private readonly tasks = new Set<Promise<void>>();
  /** Deferred retries waiting for their rate-limit window */
  private readonly retryTimers = new Set<ReturnType<typeof setTimeout>>();
  private sweepTimer: ReturnType<typeof setInterval> | null = null;

  constructor(options: RelayEngineOptions) {
    this.frontend = options.frontend;
    this.backend = options.backend;
    this.sweepIntervalMs = options.sweepIntervalMs ?? 60 * 1000;
    this.adminChatId = options.adminChatId;

    this.store = new CorrelationStore({
      orphanTimeoutMs: options.orphanTimeoutMs,
      processingTimeoutMs: options.processingTimeoutMs,
      evictionGraceMs: options.evictionGraceMs,
      onSettled: (job) => {
        options.onSettled?.(job);
        this.mirrorSettled(job);
      },
      now: options.now,
      generateId: options.generateId,
    });
    this.status = new RoutedStatusReporter(options.frontend, options.backend);

    this.worker = new FetchAndRelayWorker({
      store: this.store,
      backend: options.backend,
      contentStore: options.contentStore,
      status: this.status,
      stagingDir: options.stagingDir,
      maxRateLimitWaitMs: options.maxRateLimitWaitMs,
      schedule: options.schedule ?? ((task, delayMs) => this.defer(task, delayMs)),
      redispatch: (correlationId) => this.dispatch(correlationId),
      onUnexpectedError: (job, err) =>
        this.reportUnexpected(`job ${job.correlationId} (${job.attachment.kind})`, err),
    });

    this.coordinator = new RelayCoordinator({
      store: this.store,
      backend: options.backend,
      status: this.status,
      dispatch: (correlationId) => this.dispatch(correlationId),
      onUnexpectedError: (scope, err) => this.reportUnexpected(scope, err),
    });
  }

  // ── Backend inbox ───────────────────────────────────────────────────────

  /**
   * Route one message seen by the backend identity. Media the owner drops
   * into their own saved-messages chat takes the direct path; everything
   * else goes to the coordinator, which ignores non-envelopes.
   */
  async handleBackendMessage(message: InboxMessage): Promise<void> {
    if (message.isSelfChat) {
      if (message.attachment) await this.submitDirect(message);
      return;
    }
    await this.coordinator.handle(message);
  }

  /**
   * Direct path: the attachment already sits in the backend's own chat, so
   * it is bound to itself and dispatched without an envelope.
   */
  private async submitDirect(message: InboxMessage): Promise<void> {
    if (!message.attachment) return;

    let statusMessageId: number;
    try {
      const sent = await this.backend.sendSelfMessage(statusText.received());
      statusMessageId = sent.messageId;
    } catch (err) {
      console.error(`[ENGINE] Could not post status for direct submission ${message.messageId}:`, err);
      return;
    }

    const job = this.store.create({
      originChat: message.chatId,
      attachment: message.attachment,
      statusHandle: { chatId: message.chatId, messageId: statusMessageId, owner: 'backend' },
    });
    const id = job.correlationId;

    this.store.transition(id, 'forward_requested');
    const bind = this.store.bindBackendReference(id, {
      chatId: message.chatId,
      messageId: message.messageId,
    });
    if (bind.status !== 'bound' || !this.store.transition(id, 'fetching').ok) {
      console.warn(`[ENGINE] Direct submission ${id} could not be bound (${bind.status})`);
      return;
    }

    console.log(`[ENGINE] Direct submission ${id} from saved messages, dispatching`);
    this.dispatch(id);
  }

  private dispatch(correlationId: string): void {
    const task = this.worker.run(correlationId).catch((err: unknown) => {
      console.error(`[ENGINE] Worker for ${correlationId} crashed:`, err);
    });
    this.tasks.add(task);
    void task.finally(() => this.tasks.delete(task));
  }

  private defer(task: () => void, delayMs: number): void {
    const timer = setTimeout(() => {
      this.retryTimers.delete(timer);
      task();
    }, delayMs);
    timer.unref?.();
    this.retryTimers.add(timer);
  }

  /**
   * Resolves once every dispatched worker run has finished. Retries still
   * waiting out a rate limit are not waited for; `stop()` cancels them.
   */
  async idle(): Promise<void> {
    while (this.tasks.size > 0) {
      await Promise.all([...this.tasks]);
    }
  }

  /** Number of jobs currently being fetched or uploaded */
  inFlight(): number {
    return this.worker.inFlight();
  }

  // ── Sweeping ────────────────────────────────────────────────────────────

  /**
   * Reclaim stuck jobs and evict settled ones. Each reclaimed job gets its
   * terminal status edit here.
   */
  async sweep(now?: number): Promise<SweepResult> {
    const result = this.store.sweep(now);

    for (const job of result.timedOut) {
      console.warn(`[ENGINE] ${job.correlationId} timed out: ${job.failure?.message ?? 'no progress'}`);
    }
    await Promise.all(
      result.timedOut.map((job) =>
        job.failure ? this.status.update(job.statusHandle, statusText.failed(job.failure)) : undefined,
      ),
    );

    return result;
  }

  start(): void {
    if (this.sweepTimer) return;
    this.sweepTimer = setInterval(() => {
      this.sweep().catch((err: unknown) => {
        console.error('[ENGINE] Sweep failed:', err);
      });
    }, this.sweepIntervalMs);
    this.sweepTimer.unref?.();
  }

  stop(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
    if (this.retryTimers.size > 0) {
      console.warn(`[ENGINE] Cancelling ${this.retryTimers.size} pending retr${this.retryTimers.size === 1 ? 'y' : 'ies'}`);
      for (const timer of this.retryTimers) clearTimeout(timer);
      this.retryTimers.clear();
    }
  }

  /** Number of retries waiting for their rate-limit window */
  pendingRetries(): number {
    return this.retryTimers.size;
  }

  // ── Admin notifications ─────────────────────────────────────────────────

  /** Send a notice to the admin chat. Never rejects. */
  async announce(text: string): Promise<void> {
    if (this.adminChatId === undefined) return;
    try {
      await this.frontend.sendMessage(this.adminChatId, text);
    } catch (err) {
      console.warn('[ENGINE] Admin notification failed:', err instanceof Error ? err.message : String(err));
    }
  }

  /** Mirror an error that fits no known category to the admin chat. */
  reportUnexpected(scope: string, err: unknown): void {
    const detail = err instanceof Error ? err.message : String(err);
    void this.announce(`⚠️ Unexpected error in ${scope}:\n${detail}`);
  }

  private mirrorSettled(job: Job): void {
    const what = `Job ${job.correlationId} (${job.attachment.kind})`;
    if (job.state === 'completed' && job.result) {
      void this.announce(`✅ ${what} completed: ${job.result.fileName}\n${job.result.link}`);
    } else if (job.failure) {
      void this.announce(`❌ ${what} failed (${job.failure.kind}): ${job.failure.message}`);
    }
  }
}
