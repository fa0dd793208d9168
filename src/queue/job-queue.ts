/**
 * In-process job queue for background tasks
 * Runs one job at a time so sync cycles never overlap, and refuses a job
 * whose type is already queued or running.
 */

import PQueue from 'p-queue';

import { recordJobCompletion, recordJobStart } from '../db/repository.js';
import { logger } from '../logger.js';
import { formatUserError } from '../utils/error-formatter.js';

export type JobType = { type: 'digest' } | { type: 'sync'; force?: boolean };

export type JobKind = JobType['type'];

export interface JobHandlers {
  digest: (jobId: number) => Promise<void>;
  sync: (force: boolean, jobId: number) => Promise<void>;
}

export interface JobOutcome {
  /** null when the job could not be recorded and never ran */
  jobId: number | null;
  status: 'success' | 'failed';
  error?: Error;
}

interface ActiveJob {
  job: JobType;
  jobId: number | null;
  startedAt: Date;
  recorded: Promise<number>;
  done: Promise<JobOutcome>;
}

export class JobQueue {
  private queue: PQueue;
  // At most one job per type, keyed before the job row is written
  private activeJobs = new Map<JobKind, ActiveJob>();

  constructor(
    private readonly handlers: JobHandlers,
    concurrency = 1
  ) {
    this.queue = new PQueue({ concurrency });
    logger.info({ concurrency }, 'job queue initialized');
  }

  /**
   * Enqueue a job for background execution.
   * Returns the job id, or null when a job of the same type is already queued or running.
   */
  async enqueue(job: JobType): Promise<number | null> {
    const active = this.activeJobs.get(job.type);
    if (active) {
      logger.warn({ type: job.type, activeJobId: active.jobId }, 'job of this type already queued or running, skipping');
      return null;
    }

    return this.start(job).recorded;
  }

  /**
   * Enqueue a job and wait for it. When a job of the same type is already
   * queued or running, waits for that one instead.
   */
  async run(job: JobType): Promise<JobOutcome> {
    const active = this.activeJobs.get(job.type);
    if (active) {
      logger.info({ type: job.type, activeJobId: active.jobId }, 'joining job already in progress');
      return active.done;
    }

    return this.start(job).done;
  }

  private start(job: JobType): ActiveJob {
    const jobName = this.getJobName(job);

    const recorded = recordJobStart(jobName).then(jobId => {
      if (jobId === null) {
        throw new Error(`failed to record start of ${jobName} job`);
      }
      entry.jobId = jobId;
      logger.info({ jobId, type: job.type, jobName }, 'job enqueued');
      return jobId;
    });

    const done = recorded
      .then(
        async (jobId): Promise<JobOutcome> =>
          (await this.queue.add(() => this.execute(job, jobId, jobName))) ?? {
            jobId,
            status: 'failed',
            error: new Error('job produced no outcome')
          },
        (error: unknown): JobOutcome => {
          const err = error instanceof Error ? error : new Error(String(error));
          logger.error({ err, type: job.type, jobName }, 'job could not be recorded, not running it');
          return { jobId: null, status: 'failed', error: err };
        }
      )
      .finally(() => this.activeJobs.delete(job.type));

    const entry: ActiveJob = { job, jobId: null, startedAt: new Date(), recorded, done };
    this.activeJobs.set(job.type, entry);
    return entry;
  }

  private async execute(job: JobType, jobId: number, jobName: string): Promise<JobOutcome> {
    try {
      logger.info({ jobId, type: job.type, jobName }, 'job execution started');
      await this.executeJob(job, jobId);
      await recordJobCompletion(jobId, 'success');
      logger.info({ jobId, type: job.type, jobName }, 'job completed successfully');
      return { jobId, status: 'success' };
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      logger.error({ jobId, err, type: job.type, jobName }, 'job failed');
      try {
        await recordJobCompletion(jobId, 'failed', formatUserError(err, `running ${jobName}`));
      } catch (recordError) {
        logger.error({ jobId, err: recordError }, 'failed to record job failure');
      }
      return { jobId, status: 'failed', error: err };
    }
  }

  /**
   * Execute a job using the appropriate handler
   */
  private async executeJob(job: JobType, jobId: number): Promise<void> {
    switch (job.type) {
      case 'digest':
        await this.handlers.digest(jobId);
        break;
      case 'sync':
        await this.handlers.sync(job.force ?? false, jobId);
        break;
    }
  }

  /**
   * Resolves once every queued and running job has finished
   */
  async waitForIdle(): Promise<void> {
    await Promise.all(Array.from(this.activeJobs.values(), active => active.done));
    await this.queue.onIdle();
  }

  /**
   * Get queue statistics
   */
  getStats() {
    return {
      pending: this.queue.pending,
      size: this.queue.size,
      active: this.activeJobs.size,
      concurrency: this.queue.concurrency
    };
  }

  /**
   * Get list of active job IDs
   */
  getActiveJobIds(): number[] {
    return Array.from(this.activeJobs.values())
      .map(active => active.jobId)
      .filter((jobId): jobId is number => jobId !== null);
  }

  isActive(type: JobKind): boolean {
    return this.activeJobs.has(type);
  }

  private getJobName(job: JobType): string {
    switch (job.type) {
      case 'digest':
        return 'digest';
      case 'sync':
        return job.force ? 'sync-force' : 'sync';
    }
  }
}
