import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('../logger.js', () => ({
  logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() }
}));

vi.mock('../db/repository.js', () => ({
  recordSyncRun: vi.fn().mockResolvedValue(1)
}));

import { anniversariesTitle, DigestRunner, newAlbumsTitle } from '../digest-runner.js';
import type { SyncResult } from '../library/sync-service.js';
import type { Album } from '../library/types.js';
import type { DeliveryReport } from '../notifications/telegram.js';
import { createMockAlbum } from './helpers/mock-album.js';

// Local time so the anniversary feed matches June 15 in any timezone
const NOW = new Date(2024, 5, 15, 12, 0, 0);
const hoursAgo = (hours: number) => new Date(NOW.getTime() - hours * 60 * 60 * 1000).toISOString();

const fresh = createMockAlbum({ id: 'fresh', name: 'Fresh', year: 2024, createdAt: hoursAgo(2) });
const anniversary = createMockAlbum({
  id: 'anniv',
  name: 'Anniversary',
  createdAt: hoursAgo(24 * 30),
  releaseDate: { kind: 'structured', year: 1977, month: 6, day: 15 }
});
const neither = createMockAlbum({ id: 'neither', createdAt: hoursAgo(48) });

const FRESH_FEED = '<b>🆕 Freshly Added Albums (Last 24h)</b>\n\n💿 <b>Fresh</b>\n👤 Test Artist\n📅 2024\n\n';
const ANNIVERSARY_FEED =
  '<b>🎂 On this day (June 15) in music history</b>\n\n💿 <b>Anniversary</b>\n👤 Test Artist\n📅 1977-06-15\n\n';

const syncResult = (albums: Album[], overrides: Partial<SyncResult> = {}): SyncResult => ({
  outcome: 'synced',
  albums,
  counts: {
    listed: albums.length,
    cached: albums.length,
    new: 0,
    deleted: 0,
    expired: 0,
    retained: 0,
    enriched: 0,
    fallback: 0,
    dropped: 0,
    total: albums.length
  },
  forced: false,
  listingComplete: true,
  persisted: true,
  startedAt: NOW,
  finishedAt: NOW,
  ...overrides
});

describe('DigestRunner', () => {
  const delivered: DeliveryReport = { parts: 1, sent: 1, failed: 0 };
  let sync: ReturnType<typeof vi.fn<(options: { force?: boolean }) => Promise<SyncResult>>>;
  let send: ReturnType<typeof vi.fn<(text: string) => Promise<DeliveryReport>>>;
  let recordSync: ReturnType<typeof vi.fn<(result: SyncResult, jobId?: number | null) => Promise<unknown>>>;

  const createRunner = () =>
    new DigestRunner({ sync: { sync }, notifier: { send }, newAlbumsHours: 24, clock: () => NOW, recordSync });

  beforeEach(() => {
    vi.clearAllMocks();
    sync = vi.fn<(options: { force?: boolean }) => Promise<SyncResult>>().mockResolvedValue(
      syncResult([fresh, anniversary, neither])
    );
    send = vi.fn<(text: string) => Promise<DeliveryReport>>().mockResolvedValue(delivered);
    recordSync = vi.fn<(result: SyncResult, jobId?: number | null) => Promise<unknown>>().mockResolvedValue(1);
  });

  it('titles the feeds', () => {
    expect(newAlbumsTitle(48)).toBe('🆕 Freshly Added Albums (Last 48h)');
    expect(anniversariesTitle(NOW)).toBe('🎂 On this day (June 15) in music history');
  });

  it('syncs once and sends both feeds', async () => {
    const report = await createRunner().run(7);

    expect(sync).toHaveBeenCalledTimes(1);
    expect(sync).toHaveBeenCalledWith({ force: false });
    expect(recordSync).toHaveBeenCalledWith(report.sync, 7);
    expect(send.mock.calls).toEqual([[FRESH_FEED], [ANNIVERSARY_FEED]]);
    expect(report.feeds).toEqual([
      { feed: 'new-albums', albums: 1, delivery: delivered },
      { feed: 'anniversaries', albums: 1, delivery: delivered }
    ]);
  });

  it('sends nothing for an empty feed', async () => {
    sync.mockResolvedValueOnce(syncResult([fresh, neither]));

    const report = await createRunner().run();

    expect(send.mock.calls).toEqual([[FRESH_FEED]]);
    expect(report.feeds[1]).toEqual({ feed: 'anniversaries', albums: 0 });
  });

  it('still sends the second feed when the first fails', async () => {
    const failure = new Error('telegram sendMessage: Bad Request');
    send.mockRejectedValueOnce(failure);

    const report = await createRunner().run();

    expect(send).toHaveBeenCalledTimes(2);
    expect(report.feeds).toEqual([
      { feed: 'new-albums', albums: 0, error: failure },
      { feed: 'anniversaries', albums: 1, delivery: delivered }
    ]);
  });

  it('builds the digest from the previous cache when the sync aborts', async () => {
    sync.mockResolvedValueOnce(
      syncResult([anniversary], { outcome: 'aborted', persisted: false, error: new Error('listing failed') })
    );

    const report = await createRunner().run();

    expect(report.sync.outcome).toBe('aborted');
    expect(send.mock.calls).toEqual([[ANNIVERSARY_FEED]]);
  });

  it('carries on when the sync run cannot be recorded', async () => {
    recordSync.mockRejectedValueOnce(new Error('SQLITE_READONLY'));

    const report = await createRunner().run(3);

    expect(report.feeds.map(feed => feed.albums)).toEqual([1, 1]);
  });
});
