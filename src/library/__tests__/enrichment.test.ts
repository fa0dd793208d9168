import { describe, it, expect, vi } from 'vitest';

vi.mock('../../logger.js', () => ({
  logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() }
}));

import { createMockAlbum, MapDetailSource } from '../../__tests__/helpers/mock-album.js';
import { enrichAlbums } from '../enrichment.js';
import type { Album, AlbumDetailSource } from '../types.js';

const NOW = new Date('2024-06-15T12:00:00.000Z');
const clock = () => NOW;

describe('enrichAlbums', () => {
  it('stamps fetched details with the current time', async () => {
    const source = new MapDetailSource(
      new Map([['a', createMockAlbum({ id: 'a', name: 'Detailed', genres: ['Jazz'] })]])
    );

    const result = await enrichAlbums(['a'], source, new Map(), { clock });

    expect(result.albums.get('a')).toEqual({
      id: 'a',
      name: 'Detailed',
      artist: 'Test Artist',
      releaseDate: { kind: 'absent' },
      genres: ['Jazz'],
      fetchedAt: '2024-06-15T12:00:00.000Z'
    });
    expect(result.outcomes.get('a')).toBe('enriched');
    expect(result.enriched).toBe(1);
  });

  it('falls back to the listing record when the detail fetch fails', async () => {
    const source = new MapDetailSource();
    const listed = createMockAlbum({ id: 'c', name: 'X' });

    const result = await enrichAlbums(['c'], source, new Map([['c', listed]]), { clock });

    expect(result.albums.get('c')).toEqual({ ...listed, fetchedAt: '2024-06-15T12:00:00.000Z' });
    expect(result.outcomes.get('c')).toBe('fallback');
    expect(result.fallback).toBe(1);
  });

  it('drops albums with no detail and no listing record', async () => {
    const result = await enrichAlbums(['ghost'], new MapDetailSource(), new Map(), { clock });

    expect(result.albums.has('ghost')).toBe(false);
    expect(result.outcomes.get('ghost')).toBe('dropped');
    expect(result.dropped).toBe(1);
  });

  it('gives every id exactly one outcome', async () => {
    const source = new MapDetailSource(
      new Map([
        ['a', createMockAlbum({ id: 'a' })],
        ['b', createMockAlbum({ id: 'b' })]
      ])
    );
    source.failing.add('b');
    const fallbacks = new Map([['b', createMockAlbum({ id: 'b' })]]);

    const result = await enrichAlbums(['a', 'b', 'c'], source, fallbacks, { clock });

    expect(Object.fromEntries(result.outcomes)).toEqual({ a: 'enriched', b: 'fallback', c: 'dropped' });
    expect([...result.albums.keys()].sort()).toEqual(['a', 'b']);
  });

  it('never runs more detail fetches at once than the concurrency limit', async () => {
    let inFlight = 0;
    let peak = 0;
    const source: AlbumDetailSource = {
      async fetchDetail(id: string): Promise<Album> {
        inFlight++;
        peak = Math.max(peak, inFlight);
        await new Promise(resolve => setTimeout(resolve, 5));
        inFlight--;
        return createMockAlbum({ id });
      }
    };
    const ids = Array.from({ length: 12 }, (_, index) => `album-${index}`);

    const result = await enrichAlbums(ids, source, new Map(), { concurrency: 3, clock });

    expect(result.enriched).toBe(12);
    expect(peak).toBe(3);
  });

  it('does not let a slow fetch hold back faster ones', async () => {
    const completed: string[] = [];
    const source: AlbumDetailSource = {
      async fetchDetail(id: string): Promise<Album> {
        await new Promise(resolve => setTimeout(resolve, id === 'slow' ? 40 : 1));
        completed.push(id);
        return createMockAlbum({ id });
      }
    };

    await enrichAlbums(['slow', 'fast-1', 'fast-2'], source, new Map(), { concurrency: 2, clock });

    expect(completed).toEqual(['fast-1', 'fast-2', 'slow']);
  });

  it('reports progress for every completion', async () => {
    const onProgress = vi.fn();
    const source = new MapDetailSource(new Map([['a', createMockAlbum({ id: 'a' })]]));

    await enrichAlbums(['a', 'b'], source, new Map(), { clock, onProgress });

    expect(onProgress).toHaveBeenCalledTimes(2);
    expect(onProgress).toHaveBeenLastCalledWith(2, 2);
  });

  it('returns an empty result without fetching when there is nothing to do', async () => {
    const source = new MapDetailSource();

    const result = await enrichAlbums([], source, new Map(), { clock });

    expect(result.albums.size).toBe(0);
    expect(source.requested).toEqual([]);
  });
});
