/**
 * CorrelationStore — in-memory registry of in-flight relay jobs.
 *
 * Every mutating method is synchronous and completes within a single turn of
 * the event loop, so concurrent jobs observe each operation atomically. Two
 * coordinators racing to bind the same correlation id see exactly one
 * `bound` result.
 *
 * Jobs are reclaimed by `sweep()`:
 *   - pre-dispatch jobs idle past `orphanTimeoutMs` fail with `timeout`
 *   - fetching/uploading jobs idle past `processingTimeoutMs` fail likewise
 *   - terminal jobs are evicted once `evictionGraceMs` has passed
 */

import { randomUUID } from 'node:crypto';

import {
  JOB_STATE_ORDER,
  isTerminal,
  type AttachmentDescriptor,
  type BackendReference,
  type Job,
  type JobFailure,
  type JobState,
  type StatusHandle,
  type UploadResult,
} from './types.js';

// ─── Options & results ──────────────────────────────────────────────────────

export interface CorrelationStoreOptions {
  /** Deadline for jobs that never reached the worker (default 10 min) */
  orphanTimeoutMs?: number;
  /** Deadline for jobs stuck while fetching or uploading (default 40 min) */
  processingTimeoutMs?: number;
  /** How long terminal jobs stay readable before eviction (default 60 s) */
  evictionGraceMs?: number;
  /** Called once per job when it reaches `completed` or `failed` */
  onSettled?: (job: Job) => void;
  /** Clock, overridable in tests */
  now?: () => number;
  /** Correlation id generator, overridable in tests */
  generateId?: () => string;
}

export interface CreateJobInput {
  originChat: number;
  attachment: AttachmentDescriptor;
  statusHandle?: StatusHandle;
}

export type TransitionResult =
  | { ok: true; job: Job }
  | { ok: false; reason: 'not_found' | 'invalid_transition' };

export type BindResult =
  | { status: 'bound'; job: Job }
  | { status: 'already_bound'; job: Job }
  | { status: 'not_found' }
  | { status: 'invalid_state'; job: Job };

export interface SweepResult {
  /** Jobs reclaimed as timed out (already failed and evicted) */
  timedOut: Job[];
  /** Correlation ids of terminal jobs evicted after their grace period */
  evicted: string[];
}

const PRE_DISPATCH_STATES: ReadonlySet<JobState> = new Set([
  'created',
  'forward_requested',
  'forward_acked',
]);

// ─── CorrelationStore ───────────────────────────────────────────────────────

export class CorrelationStore {
  private readonly jobs = new Map<string, Job>();
  private readonly orphanTimeoutMs: number;
  private readonly processingTimeoutMs: number;
  private readonly evictionGraceMs: number;
  private readonly onSettled?: (job: Job) => void;
  private readonly now: () => number;
  private readonly generateId: () => string;

  constructor(options: CorrelationStoreOptions = {}) {
    this.orphanTimeoutMs = options.orphanTimeoutMs ?? 10 * 60 * 1000;
    this.processingTimeoutMs = options.processingTimeoutMs ?? 40 * 60 * 1000;
    this.evictionGraceMs = options.evictionGraceMs ?? 60 * 1000;
    this.onSettled = options.onSettled;
    this.now = options.now ?? Date.now;
    this.generateId = options.generateId ?? randomUUID;
  }

  create(input: CreateJobInput): Job {
    let correlationId = this.generateId();
    while (this.jobs.has(correlationId)) {
      correlationId = this.generateId();
    }

    const ts = this.now();
    const job: Job = {
      correlationId,
      originChat: input.originChat,
      statusHandle: input.statusHandle,
      attachment: { ...input.attachment },
      state: 'created',
      attemptCount: 0,
      createdAt: ts,
      lastUpdateAt: ts,
    };
    this.jobs.set(correlationId, job);
    return snapshot(job);
  }

  get(correlationId: string): Job | undefined {
    const job = this.jobs.get(correlationId);
    return job ? snapshot(job) : undefined;
  }

  size(): number {
    return this.jobs.size;
  }

  /** Count of jobs not yet in a terminal state */
  activeCount(): number {
    let count = 0;
    for (const job of this.jobs.values()) {
      if (!isTerminal(job.state)) count++;
    }
    return count;
  }

  attachStatusHandle(correlationId: string, handle: StatusHandle): TransitionResult {
    const job = this.jobs.get(correlationId);
    if (!job) return { ok: false, reason: 'not_found' };
    if (isTerminal(job.state)) return { ok: false, reason: 'invalid_transition' };
    job.statusHandle = { ...handle };
    job.lastUpdateAt = this.now();
    return { ok: true, job: snapshot(job) };
  }

  /**
   * Bind the backend copy of the attachment and move the job to
   * `forward_acked`. Only a job in `forward_requested` can be bound, and
   * only once.
   */
  bindBackendReference(correlationId: string, ref: BackendReference): BindResult {
    const job = this.jobs.get(correlationId);
    if (!job) return { status: 'not_found' };
    if (job.backendReference) return { status: 'already_bound', job: snapshot(job) };
    if (job.state !== 'forward_requested') return { status: 'invalid_state', job: snapshot(job) };

    job.backendReference = { ...ref };
    job.state = 'forward_acked';
    job.lastUpdateAt = this.now();
    return { status: 'bound', job: snapshot(job) };
  }

  /** Advance a job through a non-terminal state. Use `complete`/`fail` to settle. */
  transition(correlationId: string, next: JobState): TransitionResult {
    const job = this.jobs.get(correlationId);
    if (!job) return { ok: false, reason: 'not_found' };
    if (isTerminal(next) || !canTransition(job.state, next)) {
      return { ok: false, reason: 'invalid_transition' };
    }

    job.state = next;
    job.lastUpdateAt = this.now();
    return { ok: true, job: snapshot(job) };
  }

  fail(correlationId: string, failure: JobFailure): TransitionResult {
    const job = this.jobs.get(correlationId);
    if (!job) return { ok: false, reason: 'not_found' };
    if (isTerminal(job.state)) return { ok: false, reason: 'invalid_transition' };

    job.failure = { ...failure };
    job.state = 'failed';
    job.lastUpdateAt = this.now();
    this.settle(job);
    return { ok: true, job: snapshot(job) };
  }

  complete(correlationId: string, result: UploadResult): TransitionResult {
    const job = this.jobs.get(correlationId);
    if (!job) return { ok: false, reason: 'not_found' };
    if (job.state !== 'uploading') return { ok: false, reason: 'invalid_transition' };

    job.result = { ...result };
    job.state = 'completed';
    job.lastUpdateAt = this.now();
    this.settle(job);
    return { ok: true, job: snapshot(job) };
  }

  /** Count a fetch attempt; returns the new attempt count */
  recordAttempt(correlationId: string): number | undefined {
    const job = this.jobs.get(correlationId);
    if (!job || isTerminal(job.state)) return undefined;
    job.attemptCount++;
    job.lastUpdateAt = this.now();
    return job.attemptCount;
  }

  evict(correlationId: string): boolean {
    return this.jobs.delete(correlationId);
  }

  sweep(now: number = this.now()): SweepResult {
    const timedOut: Job[] = [];
    const evicted: string[] = [];

    for (const [id, job] of this.jobs) {
      const idle = now - job.lastUpdateAt;

      if (isTerminal(job.state)) {
        if (idle >= this.evictionGraceMs) {
          this.jobs.delete(id);
          evicted.push(id);
        }
        continue;
      }

      const deadline = PRE_DISPATCH_STATES.has(job.state)
        ? this.orphanTimeoutMs
        : this.processingTimeoutMs;
      if (idle < deadline) continue;

      job.failure = {
        kind: 'timeout',
        message: `No progress for ${Math.round(idle / 1000)}s in state ${job.state}`,
      };
      job.state = 'failed';
      job.lastUpdateAt = now;
      this.settle(job);
      this.jobs.delete(id);
      timedOut.push(snapshot(job));
    }

    return { timedOut, evicted };
  }

  private settle(job: Job): void {
    if (!this.onSettled) return;
    try {
      this.onSettled(snapshot(job));
    } catch (err) {
      console.error(`[STORE] onSettled listener failed for ${job.correlationId}:`, err);
    }
  }
}

// ─── Helpers ────────────────────────────────────────────────────────────────

export function canTransition(from: JobState, to: JobState): boolean {
  if (isTerminal(from)) return false;
  if (to === 'failed') return true;
  return JOB_STATE_ORDER.indexOf(to) > JOB_STATE_ORDER.indexOf(from);
}

function snapshot(job: Job): Job {
  return {
    ...job,
    attachment: { ...job.attachment },
    statusHandle: job.statusHandle ? { ...job.statusHandle } : undefined,
    backendReference: job.backendReference ? { ...job.backendReference } : undefined,
    failure: job.failure ? { ...job.failure } : undefined,
    result: job.result ? { ...job.result } : undefined,
  };
}
