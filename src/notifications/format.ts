/**
 * Telegram HTML rendering of albums
 */

import type { Album, ReleaseDate } from '../library/types.js';

export const escapeHtml = (text: string): string =>
  text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');

const pad2 = (value: number): string => String(value).padStart(2, '0');

/**
 * Date shown next to an album. Structured dates are padded to YYYY-MM-DD
 * (unknown year as ????, unknown month or day as 01).
 */
export function formatReleaseDate(releaseDate: ReleaseDate, year?: number): string {
  if (releaseDate.kind === 'structured') {
    const { year: releaseYear, month = 1, day = 1 } = releaseDate;
    return `${releaseYear ?? '????'}-${pad2(month)}-${pad2(day)}`;
  }

  if (releaseDate.kind === 'textual' && releaseDate.value.length >= 4) {
    return releaseDate.value;
  }

  return year !== undefined ? String(year) : '';
}

export const formatGenres = (album: Album): string => album.genres.join(', ');

/**
 * One block per album, each followed by a blank line so messages split on album boundaries
 */
export function formatAlbumEntry(album: Album): string {
  let entry = `💿 <b>${escapeHtml(album.name)}</b>\n`;
  entry += `👤 ${escapeHtml(album.artist)}\n`;
  entry += `📅 ${escapeHtml(formatReleaseDate(album.releaseDate, album.year))}\n`;

  const genres = formatGenres(album);
  if (genres) {
    entry += `🏷 ${escapeHtml(genres)}\n`;
  }

  return `${entry}\n`;
}

export function formatAlbumList(albums: Album[], intro: string): string | null {
  if (albums.length === 0) {
    return null;
  }

  return `<b>${escapeHtml(intro)}</b>\n\n${albums.map(formatAlbumEntry).join('')}`;
}

/**
 * Compact single-line form used in search and genre results
 */
export function formatAlbumLine(album: Album): string {
  let line = `• ${escapeHtml(album.artist)} - ${escapeHtml(album.name)}`;
  if (album.year !== undefined) {
    line += ` 📅 ${album.year}`;
  }
  const genres = formatGenres(album);
  if (genres) {
    line += ` 🏷 ${escapeHtml(genres)}`;
  }
  return line;
}
