import { integer, text } from 'drizzle-orm/sqlite-core';
import { index, sqliteTable } from 'drizzle-orm/sqlite-core';

/**
 * One row per queued job (digest, sync), from enqueue to completion
 */
export const jobRuns = sqliteTable(
  'job_runs',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    job: text('job').notNull(),
    startedAt: integer('started_at', { mode: 'timestamp_ms' }).notNull(),
    finishedAt: integer('finished_at', { mode: 'timestamp_ms' }),
    status: text('status').notNull(), // running | success | failed
    error: text('error')
  },
  table => ({
    startedAtIdx: index('job_runs_started_at_idx').on(table.startedAt)
  })
);

/**
 * Outcome and counters of every library sync cycle
 */
export const syncRuns = sqliteTable(
  'sync_runs',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    jobId: integer('job_id').references(() => jobRuns.id, { onDelete: 'set null' }),
    startedAt: integer('started_at', { mode: 'timestamp_ms' }).notNull(),
    finishedAt: integer('finished_at', { mode: 'timestamp_ms' }).notNull(),
    outcome: text('outcome').notNull(), // synced | aborted
    forced: integer('forced', { mode: 'boolean' }).notNull().default(false),
    listingComplete: integer('listing_complete', { mode: 'boolean' }).notNull(),
    listed: integer('listed').notNull().default(0),
    cached: integer('cached').notNull().default(0),
    newCount: integer('new_count').notNull().default(0),
    deletedCount: integer('deleted_count').notNull().default(0),
    expiredCount: integer('expired_count').notNull().default(0),
    retainedCount: integer('retained_count').notNull().default(0),
    enrichedCount: integer('enriched_count').notNull().default(0),
    fallbackCount: integer('fallback_count').notNull().default(0),
    droppedCount: integer('dropped_count').notNull().default(0),
    total: integer('total').notNull().default(0),
    persisted: integer('persisted', { mode: 'boolean' }).notNull(),
    error: text('error')
  },
  table => ({
    startedAtIdx: index('sync_runs_started_at_idx').on(table.startedAt)
  })
);

export type JobRunRecord = typeof jobRuns.$inferSelect;
export type SyncRunRecord = typeof syncRuns.$inferSelect;
export type NewSyncRunRecord = typeof syncRuns.$inferInsert;
