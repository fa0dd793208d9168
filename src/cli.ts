#!/usr/bin/env node
/**
 * CLI for Navidrome Album Digest
 * Runs the scheduler and bot by default; one-off commands work on the local album cache.
 */

import './load-env.js';
import { format } from 'date-fns';

import { APP_ENV } from './config.js';
import { closeDb } from './db/index.js';
import { getRecentSyncRuns } from './db/repository.js';
import { createApp } from './index.js';
import { libraryStats, pickRandomAlbum, searchAlbums } from './library/queries.js';
import type { Album } from './library/types.js';
import { logger } from './logger.js';
import { createServices } from './services.js';
import { formatReleaseDate } from './notifications/format.js';
import { formatUserError } from './utils/error-formatter.js';

const usage = `Navidrome Album Digest - daily Telegram digest of your Navidrome library

Usage:
  navidrome-digest [server]         Start scheduler and Telegram bot (default)
  navidrome-digest digest           Sync the library and send today's digest now
  navidrome-digest sync [--force]   Sync the album cache (--force re-fetches every album)
  navidrome-digest search <text>    Search the album cache by album or artist
  navidrome-digest random           Suggest a random album from the cache
  navidrome-digest stats            Show album cache statistics
  navidrome-digest history [n]      Show the last n sync runs (default 10)
  navidrome-digest --help           Show this help

Configuration is read from environment variables, ./.env and $DATA_DIR/.env.`;

const args = process.argv.slice(2);
const command = args[0];

const describeAlbum = (album: Album): string => {
  const date = formatReleaseDate(album.releaseDate, album.year);
  const genres = album.genres.length > 0 ? ` [${album.genres.join(', ')}]` : '';
  return `${album.artist} - ${album.name}${date ? ` (${date})` : ''}${genres}`;
};

async function main(): Promise<void> {
  // Handle help flags first (before creating app)
  if (command === '--help' || command === '-h' || command === 'help') {
    console.log(usage);
    return;
  }

  // Default to server (with or without explicit 'server' command)
  if (!command || command === 'server' || command === 'start') {
    const app = createApp();

    // Graceful shutdown handler
    const shutdown = (signal: string) => {
      logger.info({ signal }, 'received shutdown signal');
      app
        .stop()
        .then(() => process.exit(0))
        .catch(error => {
          logger.error({ err: error }, 'shutdown failed');
          process.exit(1);
        });
    };

    process.on('SIGTERM', () => shutdown('SIGTERM'));
    process.on('SIGINT', () => shutdown('SIGINT'));

    await app.start();
    logger.info({ cron: APP_ENV.DIGEST_CRON }, 'album digest server running');
    logger.info('press Ctrl+C to exit');
    return;
  }

  if (command === 'digest') {
    const app = createApp();
    const outcome = await app.runDigest();
    closeDb();
    if (outcome.status === 'failed') {
      console.error(formatUserError(outcome.error, 'sending the daily digest'));
      process.exitCode = 1;
      return;
    }
    console.log('Digest sent.');
    return;
  }

  if (command === 'sync') {
    const force = args.includes('--force');
    const app = createApp();
    const { job, sync } = await app.runSync(force);
    closeDb();

    if (sync) {
      const { counts } = sync;
      console.log(
        `Sync ${sync.outcome}${sync.forced ? ' (forced)' : ''}: ${counts.total} albums ` +
          `(${counts.new} new, ${counts.deleted} deleted, ${counts.expired} refreshed, ` +
          `${counts.retained} retained, ${counts.fallback} fallback, ${counts.dropped} dropped)`
      );
      if (!sync.persisted) {
        console.log('Album cache was not updated.');
      }
    }
    if (job.status === 'failed') {
      console.error(formatUserError(job.error, 'syncing the library'));
      process.exitCode = 1;
    }
    return;
  }

  if (command === 'search' || command === 'random' || command === 'stats') {
    const albums = await createServices(APP_ENV).library.loadCached();
    if (albums.length === 0) {
      console.log('The album cache is empty. Run `navidrome-digest sync` first.');
      return;
    }

    if (command === 'search') {
      const query = args.slice(1).join(' ').trim();
      if (!query) {
        console.error('Error: search text required');
        console.error('Usage: navidrome-digest search <text>');
        process.exit(1);
      }
      const results = searchAlbums(albums, query);
      if (results.length === 0) {
        console.log(`No albums found matching '${query}'.`);
        return;
      }
      for (const album of results) {
        console.log(describeAlbum(album));
      }
      return;
    }

    if (command === 'random') {
      const album = pickRandomAlbum(albums);
      console.log(album ? describeAlbum(album) : 'No albums found.');
      return;
    }

    const stats = libraryStats(albums);
    console.log(`Albums:  ${stats.albums}`);
    console.log(`Artists: ${stats.artists}`);
    console.log(`Songs:   ${stats.songs}`);
    console.log(`Genres:  ${stats.genres}`);
    return;
  }

  if (command === 'history') {
    const limit = Number.parseInt(args[1] ?? '10', 10);
    const runs = await getRecentSyncRuns(Number.isFinite(limit) && limit > 0 ? limit : 10);
    closeDb();
    if (runs.length === 0) {
      console.log('No sync runs recorded yet.');
      return;
    }
    for (const run of runs) {
      const when = format(run.startedAt, 'yyyy-MM-dd HH:mm:ss');
      const detail =
        `${run.total} albums, ${run.newCount} new, ${run.deletedCount} deleted, ` +
        `${run.expiredCount} refreshed, ${run.droppedCount} dropped`;
      const flags = [run.forced ? 'forced' : '', run.listingComplete ? '' : 'partial listing', run.persisted ? '' : 'not saved']
        .filter(Boolean)
        .join(', ');
      console.log(`${when}  ${run.outcome.padEnd(7)}  ${detail}${flags ? ` [${flags}]` : ''}${run.error ? `  ${run.error}` : ''}`);
    }
    return;
  }

  // Unknown command
  console.error(`Error: Unknown command '${command}'`);
  console.log('\n' + usage);
  process.exit(1);
}

main().catch(error => {
  logger.error({ err: error }, 'CLI execution failed');
  process.exit(1);
});
