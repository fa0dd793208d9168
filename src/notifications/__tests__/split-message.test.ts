import { describe, it, expect, vi } from 'vitest';

vi.mock('../../logger.js', () => ({
  logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() }
}));

import { createMockAlbum } from '../../__tests__/helpers/mock-album.js';
import { formatAlbumList } from '../format.js';
import { splitMessage, TELEGRAM_MESSAGE_LIMIT } from '../split-message.js';

describe('splitMessage', () => {
  it('returns short text unchanged', () => {
    expect(splitMessage('hello\n\nworld\n\n', 100)).toEqual(['hello\n\nworld\n\n']);
  });

  it('breaks between blocks', () => {
    const text = `Intro\n\n${'a'.repeat(10)}\n\n${'b'.repeat(10)}\n\n${'c'.repeat(10)}\n\n`;

    expect(splitMessage(text, 30)).toEqual([`Intro\n\n${'a'.repeat(10)}`, `${'b'.repeat(10)}\n\n${'c'.repeat(10)}`]);
  });

  it('truncates a single block that is over the limit', () => {
    const text = `short\n\n${'x'.repeat(25)}`;

    expect(splitMessage(text, 10)).toEqual(['short', 'x'.repeat(10)]);
  });

  it('truncates an oversized block at its last line break', () => {
    const text = `intro\n\n💿 <b>${'a'.repeat(20)}</b>\n👤 artist`;

    expect(splitMessage(text, 30)).toEqual(['intro', `💿 <b>${'a'.repeat(20)}</b>`]);
  });

  it('drops markup when an oversized block has no line break to cut at', () => {
    expect(splitMessage(`<b>${'a'.repeat(10)}</b>`, 12)).toEqual(['a'.repeat(9)]);
    expect(splitMessage(`<b>${'a'.repeat(5)}</b>`, 10)).toEqual(['a'.repeat(5)]);
  });

  it('does not end a truncated block inside an entity', () => {
    expect(splitMessage('Tom &amp; Jerry', 6)).toEqual(['Tom ']);
  });

  it('does not split a surrogate pair when truncating', () => {
    expect(splitMessage(`ab${'💿'.repeat(10)}`, 5)).toEqual(['ab💿']);
  });

  it('keeps every album of a long digest intact within the Telegram limit', () => {
    const albums = Array.from({ length: 120 }, (_, index) =>
      createMockAlbum({ id: `${index}`, name: `Album number ${index}`, genres: ['Progressive Rock', 'Art Rock'] })
    );
    const text = formatAlbumList(albums, 'Freshly Added');
    expect(text).not.toBeNull();

    const parts = splitMessage(text ?? '');

    expect(parts.length).toBeGreaterThan(1);
    expect(parts.every(part => part.length <= TELEGRAM_MESSAGE_LIMIT)).toBe(true);
    expect(parts.slice(1).every(part => part.startsWith('💿 <b>Album number'))).toBe(true);
    expect(parts.join('\n\n').split('💿').length - 1).toBe(120);
  });
});
