/**
 * Enrichment scheduler
 * Fetches full album records for a set of ids through a bounded pool.
 * Each id ends up enriched, replaced by its listing record, or dropped.
 */

import pLimit from 'p-limit';

import { logger } from '../logger.js';
import type { Album, AlbumDetailSource, Clock } from './types.js';

export const DEFAULT_ENRICHMENT_CONCURRENCY = 10;
const PROGRESS_INTERVAL = 50;

export type EnrichmentOutcome = 'enriched' | 'fallback' | 'dropped';

export interface EnrichmentOptions {
  concurrency?: number;
  clock?: Clock;
  onProgress?: (completed: number, total: number) => void;
}

export interface EnrichmentResult {
  /** Enriched and fallback albums keyed by id */
  albums: Map<string, Album>;
  outcomes: Map<string, EnrichmentOutcome>;
  enriched: number;
  fallback: number;
  dropped: number;
}

export async function enrichAlbums(
  ids: Iterable<string>,
  source: AlbumDetailSource,
  fallbacks: ReadonlyMap<string, Album>,
  options: EnrichmentOptions = {}
): Promise<EnrichmentResult> {
  const { concurrency = DEFAULT_ENRICHMENT_CONCURRENCY, clock = () => new Date(), onProgress } = options;
  const idList = [...ids];
  const total = idList.length;

  const albums = new Map<string, Album>();
  const outcomes = new Map<string, EnrichmentOutcome>();
  let completed = 0;

  if (total === 0) {
    return { albums, outcomes, enriched: 0, fallback: 0, dropped: 0 };
  }

  logger.info({ total, concurrency }, 'fetching album details');

  const limit = pLimit(concurrency);

  const tasks = idList.map(id =>
    limit(async () => {
      let outcome: EnrichmentOutcome;
      try {
        const detail = await source.fetchDetail(id);
        albums.set(id, { ...detail, id, fetchedAt: clock().toISOString() });
        outcome = 'enriched';
      } catch (error) {
        const listed = fallbacks.get(id);
        if (listed) {
          logger.warn({ err: error, albumId: id }, 'album detail failed, using listing record');
          albums.set(id, { ...listed, fetchedAt: clock().toISOString() });
          outcome = 'fallback';
        } else {
          logger.warn({ err: error, albumId: id }, 'album detail failed, no listing record to fall back on');
          outcome = 'dropped';
        }
      }

      outcomes.set(id, outcome);
      completed++;
      if (completed % PROGRESS_INTERVAL === 0) {
        logger.info({ completed, total }, 'album detail progress');
      }
      onProgress?.(completed, total);
    })
  );

  await Promise.all(tasks);

  let enriched = 0;
  let fallback = 0;
  let dropped = 0;
  for (const outcome of outcomes.values()) {
    if (outcome === 'enriched') enriched++;
    else if (outcome === 'fallback') fallback++;
    else dropped++;
  }

  logger.info({ total, enriched, fallback, dropped, concurrency }, 'album detail fetch complete');

  return { albums, outcomes, enriched, fallback, dropped };
}
