import { describe, it, expect } from 'vitest';

import { createMockAlbum } from '../../__tests__/helpers/mock-album.js';
import { escapeHtml, formatAlbumEntry, formatAlbumLine, formatAlbumList, formatReleaseDate } from '../format.js';

describe('escapeHtml', () => {
  it('escapes the characters Telegram HTML reserves', () => {
    expect(escapeHtml('Tom & Jerry <Live>')).toBe('Tom &amp; Jerry &lt;Live&gt;');
  });
});

describe('formatReleaseDate', () => {
  it('pads structured dates', () => {
    expect(formatReleaseDate({ kind: 'structured', year: 1971, month: 11, day: 8 })).toBe('1971-11-08');
  });

  it('fills unknown parts of a structured date', () => {
    expect(formatReleaseDate({ kind: 'structured', month: 3 })).toBe('????-03-01');
  });

  it('shows textual dates verbatim', () => {
    expect(formatReleaseDate({ kind: 'textual', value: '1999' })).toBe('1999');
  });

  it('falls back to the album year', () => {
    expect(formatReleaseDate({ kind: 'textual', value: '99' }, 1999)).toBe('1999');
    expect(formatReleaseDate({ kind: 'absent' }, 2001)).toBe('2001');
    expect(formatReleaseDate({ kind: 'absent' })).toBe('');
  });
});

describe('formatAlbumEntry', () => {
  it('renders one escaped block followed by a blank line', () => {
    const album = createMockAlbum({
      id: 'a',
      name: 'A & B',
      artist: 'X',
      releaseDate: { kind: 'structured', year: 1971, month: 11, day: 8 },
      genres: ['Rock', 'Blues']
    });

    expect(formatAlbumEntry(album)).toBe('💿 <b>A &amp; B</b>\n👤 X\n📅 1971-11-08\n🏷 Rock, Blues\n\n');
  });

  it('leaves out the genre line when there are no genres', () => {
    const album = createMockAlbum({ id: 'a', name: 'Name', artist: 'Artist', year: 2001 });

    expect(formatAlbumEntry(album)).toBe('💿 <b>Name</b>\n👤 Artist\n📅 2001\n\n');
  });
});

describe('formatAlbumList', () => {
  it('returns null for an empty feed', () => {
    expect(formatAlbumList([], 'Nothing')).toBeNull();
  });

  it('puts a bold intro before the entries', () => {
    const album = createMockAlbum({ id: 'a', name: 'Name', artist: 'Artist', year: 2001 });

    expect(formatAlbumList([album], 'New <today>')).toBe(
      '<b>New &lt;today&gt;</b>\n\n💿 <b>Name</b>\n👤 Artist\n📅 2001\n\n'
    );
  });
});

describe('formatAlbumLine', () => {
  it('renders artist, name, year and genres on one line', () => {
    const album = createMockAlbum({ id: 'a', name: 'Name', artist: 'Artist', year: 2001, genres: ['Jazz'] });

    expect(formatAlbumLine(album)).toBe('• Artist - Name 📅 2001 🏷 Jazz');
  });

  it('omits missing year and genres', () => {
    expect(formatAlbumLine(createMockAlbum({ id: 'a', name: 'N', artist: 'A' }))).toBe('• A - N');
  });
});
