import type { AppEnv } from './config.js';
import { SubsonicDetailSource } from './library/detail-source.js';
import { JsonFileCacheStore } from './library/cache-store.js';
import { SubsonicListingSource } from './library/listing-source.js';
import { DAY_MS } from './library/reconciler.js';
import { LibrarySyncService } from './library/sync-service.js';
import type { DeletionPolicy } from './library/types.js';
import { TelegramClient, TelegramNotifier } from './notifications/telegram.js';
import { SubsonicClient } from './subsonic/client.js';

export interface Services {
  subsonic: SubsonicClient;
  library: LibrarySyncService;
  telegram: TelegramClient;
  notifier: TelegramNotifier;
}

const toDeletionPolicy = (value: string): DeletionPolicy =>
  value === 'trust-partial-listing' ? 'trust-partial-listing' : 'require-complete-listing';

/**
 * Build the clients and the sync engine from configuration
 */
export function createServices(env: AppEnv): Services {
  const subsonic = new SubsonicClient({
    baseUrl: env.NAVIDROME_URL,
    username: env.NAVIDROME_USER,
    password: env.NAVIDROME_PASSWORD,
    timeoutMs: env.NAVIDROME_TIMEOUT
  });

  const library = new LibrarySyncService({
    listing: new SubsonicListingSource(subsonic, {
      pageSize: env.LISTING_PAGE_SIZE,
      musicFolder: env.NAVIDROME_MUSIC_FOLDER
    }),
    details: new SubsonicDetailSource(subsonic),
    store: new JsonFileCacheStore(env.CACHE_PATH),
    options: {
      expiryWindowMs: env.SYNC_EXPIRY_DAYS * DAY_MS,
      concurrency: env.SYNC_CONCURRENCY,
      deletionPolicy: toDeletionPolicy(env.SYNC_DELETION_POLICY)
    }
  });

  const telegram = new TelegramClient({ token: env.TELEGRAM_BOT_TOKEN });
  const notifier = new TelegramNotifier(telegram, env.TELEGRAM_CHAT_ID);

  return { subsonic, library, telegram, notifier };
}
