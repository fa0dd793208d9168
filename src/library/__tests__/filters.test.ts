import { describe, it, expect } from 'vitest';

import { createMockAlbum } from '../../__tests__/helpers/mock-album.js';
import { filterAnniversaries, filterRecentlyAdded, releaseMonthDay } from '../filters.js';

const NOW = new Date('2024-06-15T12:00:00.000Z');

describe('filterRecentlyAdded', () => {
  it('returns albums added inside the window, newest first', () => {
    const albums = [
      createMockAlbum({ id: 'older', createdAt: '2024-06-14T20:00:00Z' }),
      createMockAlbum({ id: 'newest', createdAt: '2024-06-15T11:00:00Z' }),
      createMockAlbum({ id: 'outside', createdAt: '2024-06-13T12:00:00Z' })
    ];

    const result = filterRecentlyAdded(albums, { hours: 24, now: NOW });

    expect(result.map(album => album.id)).toEqual(['newest', 'older']);
  });

  it('excludes albums added exactly at the cutoff', () => {
    const albums = [createMockAlbum({ id: 'edge', createdAt: '2024-06-14T12:00:00.000Z' })];

    expect(filterRecentlyAdded(albums, { hours: 24, now: NOW })).toEqual([]);
  });

  it('skips albums without a usable creation time', () => {
    const albums = [
      createMockAlbum({ id: 'none' }),
      createMockAlbum({ id: 'garbage', createdAt: 'last tuesday' }),
      createMockAlbum({ id: 'ok', createdAt: '2024-06-15T09:30:00Z' })
    ];

    expect(filterRecentlyAdded(albums, { hours: 24, now: NOW }).map(album => album.id)).toEqual(['ok']);
  });
});

describe('releaseMonthDay', () => {
  it('reads structured dates', () => {
    expect(releaseMonthDay({ kind: 'structured', year: 1969, month: 9, day: 26 })).toEqual({ month: 9, day: 26 });
  });

  it('needs both month and day', () => {
    expect(releaseMonthDay({ kind: 'structured', year: 1969, month: 9 })).toBeNull();
  });

  it('reads the leading ISO date of textual values', () => {
    expect(releaseMonthDay({ kind: 'textual', value: '1997-05-21T00:00:00Z' })).toEqual({ month: 5, day: 21 });
  });

  it('ignores bare years and invalid dates', () => {
    expect(releaseMonthDay({ kind: 'textual', value: '1997' })).toBeNull();
    expect(releaseMonthDay({ kind: 'textual', value: '1997-02-30' })).toBeNull();
    expect(releaseMonthDay({ kind: 'absent' })).toBeNull();
  });
});

describe('filterAnniversaries', () => {
  it('matches structured and textual release dates on the same day and month', () => {
    const albums = [
      createMockAlbum({ id: 'structured', releaseDate: { kind: 'structured', year: 1977, month: 6, day: 15 } }),
      createMockAlbum({ id: 'textual', releaseDate: { kind: 'textual', value: '2003-06-15' } }),
      createMockAlbum({ id: 'other-day', releaseDate: { kind: 'structured', year: 1977, month: 6, day: 16 } }),
      createMockAlbum({ id: 'year-only', releaseDate: { kind: 'textual', value: '1977' }, year: 1977 })
    ];

    const result = filterAnniversaries(albums, { day: 15, month: 6 });

    expect(result.map(album => album.id)).toEqual(['structured', 'textual']);
  });
});
