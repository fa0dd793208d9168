/**
 * Library sync service
 * Runs one incremental sync cycle: list the server, diff against the cached
 * snapshot, fetch details for new and stale albums, merge and persist.
 *
 * Cycles must not overlap; callers go through the job queue.
 */

import { logger } from '../logger.js';
import { enrichAlbums, DEFAULT_ENRICHMENT_CONCURRENCY } from './enrichment.js';
import { DAY_MS, DEFAULT_EXPIRY_DAYS, reconcile } from './reconciler.js';
import type {
  Album,
  AlbumCacheStore,
  AlbumDetailSource,
  AlbumListingSource,
  Clock,
  DeletionPolicy
} from './types.js';

export type SyncStage = 'idle' | 'load' | 'listing' | 'reconcile' | 'enrich' | 'merge' | 'persist';

export type SyncOutcome = 'synced' | 'aborted';

export interface SyncCounts {
  listed: number;
  cached: number;
  new: number;
  deleted: number;
  expired: number;
  retained: number;
  enriched: number;
  fallback: number;
  dropped: number;
  total: number;
}

export interface SyncResult {
  outcome: SyncOutcome;
  albums: Album[];
  counts: SyncCounts;
  forced: boolean;
  listingComplete: boolean;
  persisted: boolean;
  error?: Error;
  startedAt: Date;
  finishedAt: Date;
}

export interface SyncOptions {
  expiryWindowMs: number;
  concurrency: number;
  deletionPolicy: DeletionPolicy;
}

export interface LibrarySyncDeps {
  listing: AlbumListingSource;
  details: AlbumDetailSource;
  store: AlbumCacheStore;
  options?: Partial<SyncOptions>;
  clock?: Clock;
}

export const DEFAULT_SYNC_OPTIONS: SyncOptions = {
  expiryWindowMs: DEFAULT_EXPIRY_DAYS * DAY_MS,
  concurrency: DEFAULT_ENRICHMENT_CONCURRENCY,
  deletionPolicy: 'require-complete-listing'
};

const emptyCounts = (): SyncCounts => ({
  listed: 0,
  cached: 0,
  new: 0,
  deleted: 0,
  expired: 0,
  retained: 0,
  enriched: 0,
  fallback: 0,
  dropped: 0,
  total: 0
});

export class LibrarySyncService {
  private readonly listing: AlbumListingSource;
  private readonly details: AlbumDetailSource;
  private readonly store: AlbumCacheStore;
  private readonly options: SyncOptions;
  private readonly clock: Clock;
  private currentStage: SyncStage = 'idle';

  constructor(deps: LibrarySyncDeps) {
    this.listing = deps.listing;
    this.details = deps.details;
    this.store = deps.store;
    this.options = { ...DEFAULT_SYNC_OPTIONS, ...deps.options };
    if (!Number.isInteger(this.options.concurrency) || this.options.concurrency < 1) {
      throw new RangeError(`concurrency must be a positive integer, got ${this.options.concurrency}`);
    }
    if (!(this.options.expiryWindowMs > 0)) {
      throw new RangeError(`expiryWindowMs must be positive, got ${this.options.expiryWindowMs}`);
    }
    this.clock = deps.clock ?? (() => new Date());
  }

  get stage(): SyncStage {
    return this.currentStage;
  }

  /**
   * Albums as last persisted, without contacting the server
   */
  async loadCached(): Promise<Album[]> {
    const snapshot = await this.store.load();
    return [...snapshot.values()];
  }

  async sync(options: { force?: boolean } = {}): Promise<SyncResult> {
    const force = options.force ?? false;
    const startedAt = this.clock();
    const counts = emptyCounts();

    try {
      this.currentStage = 'load';
      const cached = await this.store.load();
      counts.cached = cached.size;

      this.currentStage = 'listing';
      const listing = await this.listing.listAll();

      if (listing.pages === 0) {
        const error = listing.error ?? new Error('album listing returned no albums');
        logger.error(
          { err: error, cachedAlbums: cached.size },
          'album listing returned nothing, keeping previous cache'
        );
        counts.total = cached.size;
        return {
          outcome: 'aborted',
          albums: [...cached.values()],
          counts,
          forced: force,
          listingComplete: listing.complete,
          persisted: false,
          error,
          startedAt,
          finishedAt: this.clock()
        };
      }

      this.currentStage = 'reconcile';
      const listed = new Map<string, Album>();
      for (const album of listing.albums) {
        listed.set(album.id, album);
      }
      counts.listed = listed.size;

      const diff = reconcile({
        currentIds: new Set(listed.keys()),
        cached,
        now: this.clock(),
        expiryWindowMs: this.options.expiryWindowMs,
        force,
        listingComplete: listing.complete,
        deletionPolicy: this.options.deletionPolicy
      });
      counts.new = diff.newIds.size;
      counts.deleted = diff.deletedIds.size;
      counts.expired = diff.expiredIds.size;
      counts.retained = diff.retainedIds.size;

      logger.info(
        {
          listed: counts.listed,
          cached: cached.size,
          new: counts.new,
          deleted: counts.deleted,
          expired: counts.expired,
          retained: counts.retained,
          toFetch: diff.idsToFetch.size,
          force
        },
        'reconciled album listing against cache'
      );

      if (diff.retainedIds.size > 0) {
        logger.warn(
          { retained: diff.retainedIds.size, listingError: listing.error?.message },
          'album listing was incomplete, keeping unlisted cached albums'
        );
      }

      this.currentStage = 'enrich';
      const enrichment = await enrichAlbums(diff.idsToFetch, this.details, listed, {
        concurrency: this.options.concurrency,
        clock: this.clock
      });
      counts.enriched = enrichment.enriched;
      counts.fallback = enrichment.fallback;
      counts.dropped = enrichment.dropped;

      this.currentStage = 'merge';
      const merged = new Map<string, Album>();
      for (const [id, album] of cached) {
        if (diff.deletedIds.has(id) || diff.expiredIds.has(id)) continue;
        merged.set(id, album);
      }
      for (const [id, album] of enrichment.albums) {
        merged.set(id, album);
      }

      const albums = [...merged.values()];
      counts.total = albums.length;

      this.currentStage = 'persist';
      let persisted = false;
      let error: Error | undefined;
      try {
        await this.store.save(albums);
        persisted = true;
      } catch (saveError) {
        error = saveError instanceof Error ? saveError : new Error(String(saveError));
        logger.error({ err: error, albums: albums.length }, 'failed to persist album cache');
      }

      logger.info({ ...counts, persisted, force }, 'library sync complete');

      const result: SyncResult = {
        outcome: 'synced',
        albums,
        counts,
        forced: force,
        listingComplete: listing.complete,
        persisted,
        startedAt,
        finishedAt: this.clock()
      };
      if (error) {
        result.error = error;
      }
      return result;
    } finally {
      this.currentStage = 'idle';
    }
  }
}
