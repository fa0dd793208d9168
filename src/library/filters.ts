/**
 * Feed filters over the synced album collection
 */

import { isAfter, isValid, parseISO, subHours } from 'date-fns';

import type { Album, ReleaseDate } from './types.js';

const ISO_DAY = /^(\d{4})-(\d{2})-(\d{2})$/;

export interface RecentlyAddedOptions {
  hours: number;
  now?: Date;
}

/**
 * Albums added to the server within the last `hours`, newest first.
 * Albums without a parseable `createdAt` are left out.
 */
export function filterRecentlyAdded(albums: Album[], options: RecentlyAddedOptions): Album[] {
  const cutoff = subHours(options.now ?? new Date(), options.hours);

  return albums
    .flatMap(album => {
      if (!album.createdAt) return [];
      const createdAt = parseISO(album.createdAt);
      if (!isValid(createdAt) || !isAfter(createdAt, cutoff)) return [];
      return [{ album, time: createdAt.getTime() }];
    })
    .sort((a, b) => b.time - a.time)
    .map(entry => entry.album);
}

/**
 * Month and day of a release, or null when the date has no day precision
 */
export function releaseMonthDay(releaseDate: ReleaseDate): { month: number; day: number } | null {
  if (releaseDate.kind === 'structured') {
    const { month, day } = releaseDate;
    return month !== undefined && day !== undefined ? { month, day } : null;
  }

  if (releaseDate.kind === 'textual') {
    const head = releaseDate.value.slice(0, 10);
    const match = ISO_DAY.exec(head);
    if (!match || !isValid(parseISO(head))) {
      return null;
    }
    return { month: Number(match[2]), day: Number(match[3]) };
  }

  return null;
}

export interface AnniversaryOptions {
  day: number;
  month: number;
}

/**
 * Albums released on this calendar day in any year, in collection order
 */
export function filterAnniversaries(albums: Album[], options: AnniversaryOptions): Album[] {
  return albums.filter(album => {
    const released = releaseMonthDay(album.releaseDate);
    return released !== null && released.month === options.month && released.day === options.day;
  });
}
