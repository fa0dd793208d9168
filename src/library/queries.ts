/**
 * Lookups over the cached album collection used by the bot and the CLI
 */

import type { Album } from './types.js';

export const DEFAULT_QUERY_LIMIT = 50;

export interface LibraryStats {
  albums: number;
  artists: number;
  songs: number;
  genres: number;
}

const byArtistThenName = (a: Album, b: Album): number =>
  a.artist.localeCompare(b.artist, undefined, { sensitivity: 'base' }) ||
  a.name.localeCompare(b.name, undefined, { sensitivity: 'base' });

/**
 * Case-insensitive substring search on album name and artist
 */
export function searchAlbums(albums: Album[], query: string, limit = DEFAULT_QUERY_LIMIT): Album[] {
  const needle = query.trim().toLowerCase();
  if (!needle) {
    return [];
  }

  return albums
    .filter(album => album.name.toLowerCase().includes(needle) || album.artist.toLowerCase().includes(needle))
    .sort(byArtistThenName)
    .slice(0, limit);
}

export function pickRandomAlbum(albums: Album[], random: () => number = Math.random): Album | null {
  if (albums.length === 0) {
    return null;
  }
  const index = Math.min(Math.floor(random() * albums.length), albums.length - 1);
  return albums[index] ?? null;
}

export function albumsByGenre(albums: Album[], genre: string, limit = DEFAULT_QUERY_LIMIT): Album[] {
  const wanted = genre.trim().toLowerCase();
  if (!wanted) {
    return [];
  }

  return albums
    .filter(album => album.genres.some(name => name.toLowerCase() === wanted))
    .sort(byArtistThenName)
    .slice(0, limit);
}

export function libraryStats(albums: Album[]): LibraryStats {
  const artists = new Set<string>();
  const genres = new Set<string>();
  let songs = 0;

  for (const album of albums) {
    artists.add(album.artist.toLowerCase());
    for (const genre of album.genres) {
      genres.add(genre.toLowerCase());
    }
    songs += album.songCount ?? 0;
  }

  return { albums: albums.length, artists: artists.size, songs, genres: genres.size };
}
