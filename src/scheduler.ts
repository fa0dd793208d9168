import cron, { type ScheduledTask } from 'node-cron';

import { logger } from './logger.js';

export type DigestJobRunner = () => Promise<unknown>;

export class Scheduler {
  private tasks: ScheduledTask[] = [];

  constructor(private readonly runDigestJob: DigestJobRunner) {}

  /**
   * Schedule the daily digest; throws on an invalid cron expression
   */
  start(digestCron: string): void {
    this.stop();

    if (!cron.validate(digestCron)) {
      throw new Error(`Invalid DIGEST_CRON expression: ${digestCron}`);
    }

    // Timezone comes from the process environment (TZ of the container)
    const task = cron.schedule(digestCron, () => {
      logger.info('starting scheduled daily digest');
      this.runDigestJob()
        .then(() => logger.info('scheduled daily digest handed to job queue'))
        .catch(error => logger.error({ err: error }, 'scheduled daily digest failed'));
    });
    this.tasks.push(task);

    logger.info({ cron: digestCron }, 'daily digest scheduled');
  }

  stop(): void {
    for (const task of this.tasks) {
      task.stop();
    }
    this.tasks = [];
  }
}

export const createScheduler = (runDigestJob: DigestJobRunner) => new Scheduler(runDigestJob);
