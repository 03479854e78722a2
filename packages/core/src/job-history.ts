/**
 * JobHistory — durable record of every job that reached a terminal state.
 *
 * The in-memory store forgets a job shortly after it settles; this table is
 * what `filerelay status` reads afterwards.
 */

import { desc, eq } from 'drizzle-orm';

import type { RelayDatabase } from './db/client.js';
import { relayJobs, type RelayJobRow } from './db/schema.js';
import type { Job } from './types.js';

export class JobHistory {
  constructor(private readonly db: RelayDatabase) {}

  /** Insert or overwrite the row for a settled job. */
  record(job: Job): void {
    const row = {
      correlationId: job.correlationId,
      originChat: job.originChat,
      attachmentKind: job.attachment.kind,
      fileName: job.result?.fileName ?? job.attachment.fileName ?? null,
      fileSize: job.attachment.size ?? null,
      state: job.state,
      failureKind: job.failure?.kind ?? null,
      failureMessage: job.failure?.message ?? null,
      link: job.result?.link ?? null,
      attemptCount: job.attemptCount,
      createdAt: new Date(job.createdAt).toISOString(),
      settledAt: new Date(job.lastUpdateAt).toISOString(),
    };

    this.db
      .insert(relayJobs)
      .values(row)
      .onConflictDoUpdate({
        target: relayJobs.correlationId,
        set: {
          state: row.state,
          failureKind: row.failureKind,
          failureMessage: row.failureMessage,
          link: row.link,
          attemptCount: row.attemptCount,
          settledAt: row.settledAt,
        },
      })
      .run();
  }

  get(correlationId: string): RelayJobRow | undefined {
    return this.db
      .select()
      .from(relayJobs)
      .where(eq(relayJobs.correlationId, correlationId))
      .get();
  }

  /** Most recently settled jobs first */
  recent(limit = 10): RelayJobRow[] {
    return this.db
      .select()
      .from(relayJobs)
      .orderBy(desc(relayJobs.settledAt))
      .limit(limit)
      .all();
  }
}
