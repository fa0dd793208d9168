import { format } from 'date-fns';

import { APP_ENV } from './config.js';
import { recordSyncRun } from './db/repository.js';
import { filterAnniversaries, filterRecentlyAdded } from './library/filters.js';
import type { LibrarySyncService, SyncResult } from './library/sync-service.js';
import type { Album, Clock } from './library/types.js';
import { logger } from './logger.js';
import { formatAlbumList } from './notifications/format.js';
import type { DeliveryReport, TelegramNotifier } from './notifications/telegram.js';

export type FeedName = 'new-albums' | 'anniversaries';

export interface FeedReport {
  feed: FeedName;
  albums: number;
  delivery?: DeliveryReport;
  error?: Error;
}

export interface DigestReport {
  sync: SyncResult;
  feeds: FeedReport[];
}

export interface DigestRunnerDeps {
  sync: Pick<LibrarySyncService, 'sync'>;
  notifier: Pick<TelegramNotifier, 'send'>;
  newAlbumsHours?: number;
  clock?: Clock;
  recordSync?: (result: SyncResult, jobId?: number | null) => Promise<unknown>;
}

export const newAlbumsTitle = (hours: number): string => `🆕 Freshly Added Albums (Last ${hours}h)`;

export const anniversariesTitle = (now: Date): string =>
  `🎂 On this day (${format(now, 'MMMM d')}) in music history`;

/**
 * Daily digest: one library sync, then the freshly-added and anniversary feeds
 */
export class DigestRunner {
  private readonly newAlbumsHours: number;
  private readonly clock: Clock;
  private readonly recordSync: (result: SyncResult, jobId?: number | null) => Promise<unknown>;

  constructor(private readonly deps: DigestRunnerDeps) {
    this.newAlbumsHours = deps.newAlbumsHours ?? APP_ENV.NEW_ALBUMS_HOURS;
    this.clock = deps.clock ?? (() => new Date());
    this.recordSync = deps.recordSync ?? recordSyncRun;
  }

  async run(jobId?: number | null): Promise<DigestReport> {
    logger.info({ jobId }, 'starting daily digest');

    const sync = await this.deps.sync.sync({ force: false });
    try {
      await this.recordSync(sync, jobId);
    } catch (error) {
      logger.warn({ err: error, jobId }, 'failed to record sync run');
    }

    if (sync.outcome === 'aborted') {
      logger.warn({ albums: sync.albums.length }, 'library sync aborted, building digest from previous cache');
    }

    const now = this.clock();
    const feeds = [
      await this.sendFeed('new-albums', () =>
        this.buildFeed(filterRecentlyAdded(sync.albums, { hours: this.newAlbumsHours, now }), newAlbumsTitle(this.newAlbumsHours))
      ),
      await this.sendFeed('anniversaries', () =>
        this.buildFeed(
          filterAnniversaries(sync.albums, { day: now.getDate(), month: now.getMonth() + 1 }),
          anniversariesTitle(now)
        )
      )
    ];

    logger.info(
      { jobId, feeds: feeds.map(feed => ({ feed: feed.feed, albums: feed.albums, failed: Boolean(feed.error) })) },
      'daily digest complete'
    );
    return { sync, feeds };
  }

  private buildFeed(albums: Album[], title: string): { albums: number; message: string | null } {
    return { albums: albums.length, message: formatAlbumList(albums, title) };
  }

  /**
   * Build and send one feed; failures stay inside the feed
   */
  private async sendFeed(
    feed: FeedName,
    build: () => { albums: number; message: string | null }
  ): Promise<FeedReport> {
    try {
      const { albums, message } = build();
      if (!message) {
        logger.info({ feed }, 'no albums for feed, nothing to send');
        return { feed, albums };
      }

      logger.info({ feed, albums }, 'sending feed');
      const delivery = await this.deps.notifier.send(message);
      return { feed, albums, delivery };
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      logger.error({ err, feed }, 'failed to build or send feed');
      return { feed, albums: 0, error: err };
    }
  }
}
