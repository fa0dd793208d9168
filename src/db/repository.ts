import { desc, eq } from 'drizzle-orm';

import type { SyncResult } from '../library/sync-service.js';
import { getDb } from './index.js';
import { jobRuns, syncRuns, type JobRunRecord, type SyncRunRecord } from './schema.js';

export type JobStatus = 'success' | 'failed';

export const recordJobStart = async (job: string): Promise<number | null> => {
  const db = getDb();
  const [inserted] = await db
    .insert(jobRuns)
    .values({ job, startedAt: new Date(), status: 'running' })
    .returning({ id: jobRuns.id });
  return inserted?.id ?? null;
};

export const recordJobCompletion = async (jobId: number, status: JobStatus, error?: string) => {
  const db = getDb();
  await db
    .update(jobRuns)
    .set({ finishedAt: new Date(), status, error })
    .where(eq(jobRuns.id, jobId));
};

export const recordSyncRun = async (result: SyncResult, jobId?: number | null): Promise<number | null> => {
  const db = getDb();
  const { counts } = result;
  const [inserted] = await db
    .insert(syncRuns)
    .values({
      jobId: jobId ?? null,
      startedAt: result.startedAt,
      finishedAt: result.finishedAt,
      outcome: result.outcome,
      forced: result.forced,
      listingComplete: result.listingComplete,
      listed: counts.listed,
      cached: counts.cached,
      newCount: counts.new,
      deletedCount: counts.deleted,
      expiredCount: counts.expired,
      retainedCount: counts.retained,
      enrichedCount: counts.enriched,
      fallbackCount: counts.fallback,
      droppedCount: counts.dropped,
      total: counts.total,
      persisted: result.persisted,
      error: result.error?.message ?? null
    })
    .returning({ id: syncRuns.id });
  return inserted?.id ?? null;
};

/**
 * Most recent sync cycles first
 */
export const getRecentSyncRuns = async (limit = 10): Promise<SyncRunRecord[]> => {
  const db = getDb();
  return db.select().from(syncRuns).orderBy(desc(syncRuns.startedAt), desc(syncRuns.id)).limit(limit);
};

export const getRecentJobRuns = async (limit = 10): Promise<JobRunRecord[]> => {
  const db = getDb();
  return db.select().from(jobRuns).orderBy(desc(jobRuns.startedAt), desc(jobRuns.id)).limit(limit);
};
