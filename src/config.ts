import { cleanEnv, str, bool, makeValidator, EnvError } from 'envalid';

/** Navidrome ignores getAlbumList sizes above this */
export const MAX_LISTING_PAGE_SIZE = 500;

export const parsePositiveInt = (input: string, max?: number): number => {
  const value = Number(input);
  if (input.trim() === '' || !Number.isInteger(value) || value < 1) {
    throw new EnvError(`Expected a positive integer, got "${input}"`);
  }
  if (max !== undefined && value > max) {
    throw new EnvError(`Expected at most ${max}, got ${value}`);
  }
  return value;
};

export const positiveInt = makeValidator(input => parsePositiveInt(input));
export const listingPageSize = makeValidator(input => parsePositiveInt(input, MAX_LISTING_PAGE_SIZE));

export const APP_ENV = cleanEnv(process.env, {
  // Navidrome (Subsonic API)
  NAVIDROME_URL: str({ default: '', desc: 'Base URL of the Navidrome server, e.g. http://localhost:4533' }),
  NAVIDROME_USER: str({ default: '', desc: 'Navidrome username used for Subsonic API calls' }),
  NAVIDROME_PASSWORD: str({ default: '', desc: 'Navidrome password (sent as a salted md5 token, never in clear)' }),
  NAVIDROME_MUSIC_FOLDER: str({ default: '', desc: 'Restrict the album listing to this music folder name (default: all folders)' }),
  NAVIDROME_TIMEOUT: positiveInt({ default: 30000, desc: 'Per-request timeout for Navidrome calls in milliseconds (default: 30000)' }),
  // Telegram
  TELEGRAM_BOT_TOKEN: str({ default: '', desc: 'Telegram Bot API token' }),
  TELEGRAM_CHAT_ID: str({ default: '', desc: 'Chat that receives notifications and may issue commands' }),
  BOT_ENABLED: bool({ default: true, desc: 'Answer interactive commands (long polling) while the server runs' }),
  // Directories and files
  DATA_DIR: str({ default: './data', desc: 'Directory for data files (default: ./data, Docker: /app/data)' }),
  CACHE_PATH: str({ default: './data/albums_cache.json', desc: 'Enriched album cache file' }),
  DATABASE_PATH: str({ default: './data/digest.db', desc: 'SQLite file for job and sync run history' }),
  // Library sync
  SYNC_EXPIRY_DAYS: positiveInt({ default: 7, desc: 'Re-fetch album details older than this many days (default: 7)' }),
  SYNC_CONCURRENCY: positiveInt({ default: 10, desc: 'Max simultaneous album detail requests (default: 10)' }),
  LISTING_PAGE_SIZE: listingPageSize({ default: MAX_LISTING_PAGE_SIZE, desc: 'Albums per getAlbumList page (default and max: 500)' }),
  SYNC_DELETION_POLICY: str({
    choices: ['require-complete-listing', 'trust-partial-listing'],
    default: 'require-complete-listing',
    desc: 'Whether albums missing from a truncated listing are deleted (trust-partial-listing) or kept'
  }),
  // Digest
  NEW_ALBUMS_HOURS: positiveInt({ default: 24, desc: 'Window for the freshly-added albums feed (default: 24 hours)' }),
  DIGEST_CRON: str({ default: '0 8 * * *', desc: 'Schedule for the daily digest (default: 8am every day)' }),
  RUN_ON_STARTUP: bool({ default: false, desc: 'Run one digest immediately when the server starts' }),
  // Logging
  LOG_LEVEL: str({
    choices: ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'],
    default: 'info'
  }),
  LOG_PRETTY: bool({ default: false, desc: 'Human-readable log output (pino-pretty)' })
});

export type AppEnv = typeof APP_ENV;
