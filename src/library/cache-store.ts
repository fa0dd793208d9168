/**
 * Album cache store
 * Persists the enriched album snapshot as a JSON array in a single file.
 *
 * Reads never fail: a missing file is an empty cache, an unreadable or
 * malformed one is an empty cache plus a warning. Writes replace the file
 * atomically (temp file + rename) and propagate errors to the caller.
 */

import { promises as fs } from 'node:fs';
import path from 'node:path';

import { logger } from '../logger.js';
import { asNumber, asString, isRecord } from '../subsonic/decode.js';
import type { Album, AlbumCacheStore, AlbumSnapshot, ReleaseDate } from './types.js';

const isNodeError = (error: unknown): error is NodeJS.ErrnoException =>
  error instanceof Error && 'code' in error;

const parseReleaseDate = (value: unknown): ReleaseDate => {
  if (!isRecord(value)) {
    return { kind: 'absent' };
  }

  if (value.kind === 'textual') {
    const text = asString(value.value);
    return text ? { kind: 'textual', value: text } : { kind: 'absent' };
  }

  if (value.kind === 'structured') {
    const structured: Extract<ReleaseDate, { kind: 'structured' }> = { kind: 'structured' };
    const year = asNumber(value.year);
    const month = asNumber(value.month);
    const day = asNumber(value.day);
    if (year !== undefined) structured.year = year;
    if (month !== undefined) structured.month = month;
    if (day !== undefined) structured.day = day;
    return structured;
  }

  return { kind: 'absent' };
};

/**
 * Rebuild an Album from its persisted form, or null when it has no id
 */
export const parseCachedAlbum = (raw: unknown): Album | null => {
  if (!isRecord(raw)) {
    return null;
  }

  const id = asString(raw.id);
  if (!id) {
    return null;
  }

  const album: Album = {
    id,
    name: asString(raw.name) ?? 'Unknown Album',
    artist: asString(raw.artist) ?? 'Unknown Artist',
    releaseDate: parseReleaseDate(raw.releaseDate),
    genres: Array.isArray(raw.genres)
      ? raw.genres.filter((genre): genre is string => typeof genre === 'string')
      : []
  };

  const artistId = asString(raw.artistId);
  if (artistId) album.artistId = artistId;
  const year = asNumber(raw.year);
  if (year !== undefined) album.year = year;
  const songCount = asNumber(raw.songCount);
  if (songCount !== undefined) album.songCount = songCount;
  const duration = asNumber(raw.duration);
  if (duration !== undefined) album.duration = duration;
  const coverArt = asString(raw.coverArt);
  if (coverArt) album.coverArt = coverArt;
  const createdAt = asString(raw.createdAt);
  if (createdAt) album.createdAt = createdAt;
  // Kept verbatim even when unparseable; the reconciler treats that as expired
  const fetchedAt = asString(raw.fetchedAt);
  if (fetchedAt) album.fetchedAt = fetchedAt;

  return album;
};

export class JsonFileCacheStore implements AlbumCacheStore {
  constructor(private readonly filePath: string) {}

  async load(): Promise<AlbumSnapshot> {
    const snapshot: AlbumSnapshot = new Map();

    let content: string;
    try {
      content = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isNodeError(error) && error.code === 'ENOENT') {
        logger.info({ path: this.filePath }, 'no album cache yet, starting empty');
      } else {
        logger.warn({ err: error, path: this.filePath }, 'failed to read album cache, starting fresh');
      }
      return snapshot;
    }

    let data: unknown;
    try {
      data = JSON.parse(content);
    } catch (error) {
      logger.warn({ err: error, path: this.filePath }, 'album cache is not valid JSON, starting fresh');
      return snapshot;
    }

    if (!Array.isArray(data)) {
      logger.warn({ path: this.filePath }, 'album cache is not an array, starting fresh');
      return snapshot;
    }

    let skipped = 0;
    for (const raw of data) {
      const album = parseCachedAlbum(raw);
      if (!album) {
        skipped++;
        continue;
      }
      snapshot.set(album.id, album);
    }

    if (skipped > 0) {
      logger.warn({ skipped, path: this.filePath }, 'skipped malformed album cache entries');
    }

    logger.info({ albums: snapshot.size, path: this.filePath }, 'loaded album cache');
    return snapshot;
  }

  async save(albums: Album[]): Promise<void> {
    const dir = path.dirname(this.filePath);
    const tempPath = path.join(dir, `.${path.basename(this.filePath)}.${process.pid}.tmp`);

    await fs.mkdir(dir, { recursive: true });
    await fs.writeFile(tempPath, JSON.stringify(albums), 'utf-8');
    try {
      await fs.rename(tempPath, this.filePath);
    } catch (error) {
      await fs.rm(tempPath, { force: true });
      throw error;
    }

    logger.info({ albums: albums.length, path: this.filePath }, 'updated album cache');
  }
}
