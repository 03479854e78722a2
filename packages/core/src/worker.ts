/**
 * FetchAndRelayWorker — takes a bound job from `fetching` to a terminal
 * state:
 *
 *   1. status → "downloading"
 *   2. fetch the attachment through the backend identity into a staged file
 *   3. status → "uploading" with the observed size
 *   4. upload once to the content store
 *   5. status → final link, job → completed
 *
 * A rate-limited fetch is re-dispatched once after the transport's mandated
 * wait, through a deferred task, so other jobs keep moving. Every other
 * failure is terminal. The staged file is removed on every exit path.
 */

import type { CorrelationStore } from './correlation-store.js';
import { toFailure, toRelayError, type RelayError } from './errors.js';
import { displayName, withStagedFile } from './lib/staging.js';
import { statusText } from './lib/status-text.js';
import type { BackendTransport, ContentStore, StatusReporter } from './transport.js';
import type { Job, JobFailure } from './types.js';

// ─── Tuning constants ───────────────────────────────────────────────────────

/** First attempt plus one retry after a rate limit */
const MAX_FETCH_ATTEMPTS = 2;

/** Wait used when a rate-limited transport does not say how long */
const DEFAULT_RATE_LIMIT_WAIT_MS = 5_000;

// ─── Options ────────────────────────────────────────────────────────────────

export type Scheduler = (task: () => void, delayMs: number) => void;

export interface WorkerOptions {
  store: CorrelationStore;
  backend: BackendTransport;
  contentStore: ContentStore;
  status: StatusReporter;
  /** Root directory for per-job staging directories */
  stagingDir: string;
  /** Longest transport-mandated wait the worker agrees to retry after */
  maxRateLimitWaitMs?: number;
  /** Deferred-task scheduler (default: unref'd setTimeout) */
  schedule?: Scheduler;
  /** Starts the retry run once its wait is over (default: `run`) */
  redispatch?: (correlationId: string) => void;
  /** Called for failures that fit no known category */
  onUnexpectedError?: (job: Job, err: unknown) => void;
}

const defaultScheduler: Scheduler = (task, delayMs) => {
  const timer = setTimeout(task, delayMs);
  timer.unref?.();
};

// ─── Worker ─────────────────────────────────────────────────────────────────

export class FetchAndRelayWorker {
  private readonly store: CorrelationStore;
  private readonly backend: BackendTransport;
  private readonly contentStore: ContentStore;
  private readonly status: StatusReporter;
  private readonly stagingDir: string;
  private readonly maxRateLimitWaitMs: number;
  private readonly schedule: Scheduler;
  private readonly redispatch: (correlationId: string) => void;
  private readonly onUnexpectedError?: (job: Job, err: unknown) => void;

  /** Correlation ids with a run in flight */
  private readonly running = new Set<string>();

  constructor(options: WorkerOptions) {
    this.store = options.store;
    this.backend = options.backend;
    this.contentStore = options.contentStore;
    this.status = options.status;
    this.stagingDir = options.stagingDir;
    this.maxRateLimitWaitMs = options.maxRateLimitWaitMs ?? 5 * 60 * 1000;
    this.schedule = options.schedule ?? defaultScheduler;
    this.redispatch =
      options.redispatch ??
      ((correlationId) => {
        this.run(correlationId).catch((e: unknown) => {
          console.error(`[WORKER] ${correlationId}: retry failed:`, e);
        });
      });
    this.onUnexpectedError = options.onUnexpectedError;
  }

  /** Number of jobs currently being fetched or uploaded */
  inFlight(): number {
    return this.running.size;
  }

  /**
   * Process one job. Never rejects: every failure ends up as a status edit
   * and a `failed` transition.
   */
  async run(correlationId: string): Promise<void> {
    if (this.running.has(correlationId)) {
      console.warn(`[WORKER] ${correlationId}: already running, ignoring duplicate dispatch`);
      return;
    }

    this.running.add(correlationId);
    try {
      await this.process(correlationId);
    } catch (err) {
      console.error(`[WORKER] ${correlationId}: unhandled error:`, err);
    } finally {
      this.running.delete(correlationId);
    }
  }

  private async process(correlationId: string): Promise<void> {
    const job = this.store.get(correlationId);
    if (!job || job.state !== 'fetching' || !job.backendReference) {
      console.warn(
        `[WORKER] ${correlationId}: not ready for processing (state=${job?.state ?? 'missing'})`,
      );
      return;
    }

    const ref = job.backendReference;
    const fileName = displayName(job.attachment, ref.messageId);
    const attempt = this.store.recordAttempt(correlationId) ?? 1;

    console.log(`[WORKER] ${correlationId}: fetching '${fileName}' (attempt ${attempt})`);
    await this.status.update(job.statusHandle, statusText.downloading(fileName));

    try {
      await withStagedFile(this.stagingDir, fileName, async (stagedPath) => {
        const size = await this.backend.downloadAttachment(ref, stagedPath);
        console.log(`[WORKER] ${correlationId}: fetched ${size} bytes, uploading`);

        if (!this.store.transition(correlationId, 'uploading').ok) {
          console.warn(`[WORKER] ${correlationId}: job was reclaimed during fetch, stopping`);
          return;
        }
        await this.status.update(job.statusHandle, statusText.uploading(fileName, size));

        const result = await this.contentStore.upload(stagedPath, fileName);

        if (!this.store.complete(correlationId, result).ok) {
          console.warn(`[WORKER] ${correlationId}: job was reclaimed during upload, not reporting`);
          return;
        }
        await this.status.update(job.statusHandle, statusText.completed(result));
        console.log(`[WORKER] ${correlationId}: completed → ${result.link}`);
      });
    } catch (err) {
      const relayErr = toRelayError(err);

      if (relayErr.kind === 'rate_limited') {
        const waitMs = this.retryDelay(job, attempt, relayErr);
        if (waitMs !== undefined) {
          await this.status.update(job.statusHandle, statusText.rateLimited(fileName, waitMs));
          this.scheduleRetry(correlationId, waitMs);
          return;
        }
      }

      if (relayErr.kind === 'unexpected') {
        console.error(`[WORKER] ${correlationId}: unexpected error:`, err);
        this.onUnexpectedError?.(job, err);
      }

      await this.failJob(job, toFailure(relayErr));
    }
  }

  /** Wait before the single retry, or undefined when the worker gives up */
  private retryDelay(job: Job, attempt: number, err: RelayError): number | undefined {
    const waitMs = err.retryAfterMs ?? DEFAULT_RATE_LIMIT_WAIT_MS;
    if (attempt >= MAX_FETCH_ATTEMPTS || waitMs > this.maxRateLimitWaitMs) {
      console.warn(
        `[WORKER] ${job.correlationId}: rate limited (wait ${waitMs}ms, attempt ${attempt}), giving up`,
      );
      return undefined;
    }

    return waitMs;
  }

  /** Re-dispatch as a deferred task; the current run has returned by the time it fires. */
  private scheduleRetry(correlationId: string, waitMs: number): void {
    console.warn(`[WORKER] ${correlationId}: rate limited, retrying in ${waitMs}ms`);
    this.schedule(() => this.redispatch(correlationId), waitMs);
  }

  private async failJob(job: Job, failure: JobFailure): Promise<void> {
    const result = this.store.fail(job.correlationId, failure);
    if (!result.ok) {
      console.warn(`[WORKER] ${job.correlationId}: already settled, dropping ${failure.kind} failure`);
      return;
    }
    console.warn(`[WORKER] ${job.correlationId}: failed (${failure.kind}): ${failure.message}`);
    await this.status.update(job.statusHandle, statusText.failed(failure));
  }
}
