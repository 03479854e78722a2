import { sqliteTable, text, integer } from 'drizzle-orm/sqlite-core';

// ─── relayJobs ──────────────────────────────────────────────────────────────

export const relayJobs = sqliteTable('relay_jobs', {
  correlationId: text('correlation_id').primaryKey().notNull(),
  originChat: integer('origin_chat').notNull(),
  attachmentKind: text('attachment_kind').notNull(),
  fileName: text('file_name'),
  fileSize: integer('file_size'),
  state: text('state').notNull(), // 'completed' | 'failed'
  failureKind: text('failure_kind'),
  failureMessage: text('failure_message'),
  link: text('link'),
  attemptCount: integer('attempt_count').notNull().default(0),
  createdAt: text('created_at').notNull(),
  settledAt: text('settled_at').notNull(),
});

export type RelayJobRow = typeof relayJobs.$inferSelect;
export type NewRelayJobRow = typeof relayJobs.$inferInsert;
