/**
 * Decoders from loosely-typed Subsonic JSON into the Album model.
 * Navidrome adds fields over the Subsonic API (structured releaseDate,
 * genres list), so every field is optional on the wire.
 */

import type { Album, ReleaseDate } from '../library/types.js';

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/** Strings as-is (when non-empty), numbers stringified (some servers use numeric ids) */
export const asString = (value: unknown): string | undefined => {
  if (typeof value === 'string') {
    return value.length > 0 ? value : undefined;
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value);
  }
  return undefined;
};

export const asNumber = (value: unknown): number | undefined => {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
};

/** Wrap a single object in an array; Subsonic JSON collapses one-element lists on some servers */
export const asArray = (value: unknown): unknown[] => {
  if (Array.isArray(value)) return value;
  if (value === undefined || value === null) return [];
  return [value];
};

// Checked in order; getAlbum fills releaseDate, older servers only the others
const RELEASE_DATE_KEYS = ['releaseDate', 'originalReleaseDate', 'date', 'originalDate', 'published'] as const;

export const decodeReleaseDate = (raw: Record<string, unknown>): ReleaseDate => {
  for (const key of RELEASE_DATE_KEYS) {
    const value = raw[key];

    if (typeof value === 'string' && value.trim() !== '') {
      return { kind: 'textual', value: value.trim() };
    }

    if (isRecord(value)) {
      const year = asNumber(value.year);
      const month = asNumber(value.month);
      const day = asNumber(value.day);
      if (year === undefined && month === undefined && day === undefined) {
        continue;
      }

      const structured: Extract<ReleaseDate, { kind: 'structured' }> = { kind: 'structured' };
      if (year !== undefined) structured.year = year;
      if (month !== undefined) structured.month = month;
      if (day !== undefined) structured.day = day;
      return structured;
    }
  }

  return { kind: 'absent' };
};

export const decodeGenres = (raw: Record<string, unknown>): string[] => {
  const names = asArray(raw.genres)
    .map(genre => (isRecord(genre) ? asString(genre.name) : asString(genre)))
    .filter((name): name is string => name !== undefined);

  if (names.length > 0) {
    return names;
  }

  const single = asString(raw.genre);
  return single ? [single] : [];
};

/**
 * Decode an album from getAlbumList / getAlbum output.
 * Returns null when the record has no usable id.
 */
export const decodeAlbum = (raw: unknown): Album | null => {
  if (!isRecord(raw)) {
    return null;
  }

  const id = asString(raw.id);
  if (!id) {
    return null;
  }

  const album: Album = {
    id,
    name: asString(raw.name) ?? asString(raw.title) ?? 'Unknown Album',
    artist: asString(raw.artist) ?? 'Unknown Artist',
    releaseDate: decodeReleaseDate(raw),
    genres: decodeGenres(raw)
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

  const created = asString(raw.created);
  if (created) album.createdAt = created;

  return album;
};
