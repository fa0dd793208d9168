import 'dotenv/config';
import { UpdatePoller } from './bot/poller.js';
import { CommandHandler } from './bot/commands.js';
import { APP_ENV, type AppEnv } from './config.js';
import { closeDb } from './db/index.js';
import { recordSyncRun } from './db/repository.js';
import { DigestRunner } from './digest-runner.js';
import { checkConfiguration, initializeDirectories } from './init.js';
import type { SyncResult } from './library/sync-service.js';
import { logger } from './logger.js';
import { JobQueue, type JobOutcome } from './queue/job-queue.js';
import { createScheduler } from './scheduler.js';
import { createServices, type Services } from './services.js';

export interface SyncRun {
  job: JobOutcome;
  sync: SyncResult | null;
}

export interface App {
  readonly services: Services;
  readonly queue: JobQueue;
  start(): Promise<void>;
  stop(): Promise<void>;
  runDigest(): Promise<JobOutcome>;
  runSync(force?: boolean): Promise<SyncRun>;
}

export const createApp = (env: AppEnv = APP_ENV): App => {
  const services = createServices(env);
  const digestRunner = new DigestRunner({
    sync: services.library,
    notifier: services.notifier,
    newAlbumsHours: env.NEW_ALBUMS_HOURS
  });

  let lastSync: SyncResult | null = null;

  const queue = new JobQueue({
    async digest(jobId) {
      const report = await digestRunner.run(jobId);
      lastSync = report.sync;
    },
    async sync(force, jobId) {
      const result = await services.library.sync({ force });
      lastSync = result;
      try {
        await recordSyncRun(result, jobId);
      } catch (error) {
        logger.warn({ err: error, jobId }, 'failed to record sync run');
      }
      if (result.outcome === 'aborted') {
        throw result.error ?? new Error('library sync aborted');
      }
    }
  });

  const runSync = async (force = false): Promise<SyncRun> => {
    lastSync = null;
    const job = await queue.run({ type: 'sync', force });
    return { job, sync: lastSync };
  };

  const scheduler = createScheduler(() => queue.enqueue({ type: 'digest' }));

  const commands = new CommandHandler({
    telegram: services.telegram,
    subsonic: services.subsonic,
    loadAlbums: () => services.library.loadCached(),
    requestSync: async () => (await runSync(false)).job,
    authorizedChatId: env.TELEGRAM_CHAT_ID
  });
  const poller = new UpdatePoller(services.telegram, commands);

  return {
    services,
    queue,
    async start() {
      await initializeDirectories(env);

      for (const problem of checkConfiguration(env)) {
        logger.warn({ problem }, 'configuration incomplete');
      }

      scheduler.start(env.DIGEST_CRON);

      if (env.BOT_ENABLED && env.TELEGRAM_BOT_TOKEN) {
        poller.start();
      } else {
        logger.info({ botEnabled: env.BOT_ENABLED }, 'telegram bot commands disabled');
      }

      if (env.RUN_ON_STARTUP) {
        logger.info('running digest on startup');
        await queue.enqueue({ type: 'digest' });
      }
    },
    async stop() {
      scheduler.stop();
      await poller.stop();
      await queue.waitForIdle();
      closeDb();
      logger.info('scheduler stopped');
    },
    runDigest() {
      logger.info('manually triggering daily digest');
      return queue.run({ type: 'digest' });
    },
    runSync(force = false) {
      logger.info({ force }, 'manually triggering library sync');
      return runSync(force);
    }
  };
};
