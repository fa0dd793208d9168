/**
 * Reconciler
 * Classifies listed and cached ids into new, deleted, expired and retained.
 * Pure: no I/O, the clock is an argument.
 */

import { differenceInMilliseconds, isValid, parseISO } from 'date-fns';

import type { Album, DeletionPolicy } from './types.js';

export const DEFAULT_EXPIRY_DAYS = 7;
export const DAY_MS = 24 * 60 * 60 * 1000;

export interface ReconcileInput {
  currentIds: ReadonlySet<string>;
  cached: ReadonlyMap<string, Album>;
  now: Date;
  expiryWindowMs: number;
  force: boolean;
  listingComplete: boolean;
  deletionPolicy: DeletionPolicy;
}

export interface ReconcileResult {
  newIds: Set<string>;
  deletedIds: Set<string>;
  expiredIds: Set<string>;
  /** Cached but unlisted ids kept as-is because the listing was truncated */
  retainedIds: Set<string>;
  idsToFetch: Set<string>;
}

/**
 * Whether a cached album's enrichment is too old to trust.
 * Missing or unparseable timestamps count as expired.
 */
export const isExpired = (album: Album, now: Date, expiryWindowMs: number): boolean => {
  if (!album.fetchedAt) {
    return true;
  }

  const fetchedAt = parseISO(album.fetchedAt);
  if (!isValid(fetchedAt)) {
    return true;
  }

  return differenceInMilliseconds(now, fetchedAt) >= expiryWindowMs;
};

export function reconcile(input: ReconcileInput): ReconcileResult {
  const { currentIds, cached, now, expiryWindowMs, force, listingComplete, deletionPolicy } = input;

  const newIds = new Set<string>();
  for (const id of currentIds) {
    if (!cached.has(id)) {
      newIds.add(id);
    }
  }

  const trustListing = listingComplete || deletionPolicy === 'trust-partial-listing';
  const deletedIds = new Set<string>();
  const retainedIds = new Set<string>();
  for (const id of cached.keys()) {
    if (currentIds.has(id)) continue;
    if (trustListing) {
      deletedIds.add(id);
    } else {
      retainedIds.add(id);
    }
  }

  const expiredIds = new Set<string>();
  if (force) {
    return { newIds, deletedIds, expiredIds, retainedIds, idsToFetch: new Set(currentIds) };
  }

  for (const [id, album] of cached) {
    if (!currentIds.has(id)) continue;
    if (isExpired(album, now, expiryWindowMs)) {
      expiredIds.add(id);
    }
  }

  return {
    newIds,
    deletedIds,
    expiredIds,
    retainedIds,
    idsToFetch: new Set([...newIds, ...expiredIds])
  };
}
