/**
 * Interactive bot commands
 * Queries run against the synced album cache; only the authorized chat is answered.
 */

import type { Album } from '../library/types.js';
import { albumsByGenre, libraryStats, pickRandomAlbum, searchAlbums } from '../library/queries.js';
import { logger } from '../logger.js';
import { escapeHtml, formatAlbumLine, formatGenres } from '../notifications/format.js';
import { splitMessage } from '../notifications/split-message.js';
import type { IncomingMessage, TelegramClient } from '../notifications/telegram.js';
import type { JobOutcome } from '../queue/job-queue.js';
import type { SubsonicClient } from '../subsonic/client.js';

export const UNAUTHORIZED_REPLY = '⛔ This bot is only available in the authorized group.';

export const HELP_TEXT = [
  '👋 <b>Hello! I am the Navidrome Bot.</b>',
  '',
  'Available commands:',
  '• /search &lt;text&gt; - Search for an artist or album',
  '• /random - Suggest a random album',
  '• /genre &lt;name&gt; - List albums of a genre',
  '• /nowplaying - Show what is playing right now',
  '• /stats - Show library statistics',
  '• /help - Show this message'
].join('\n');

const COMMANDS = ['start', 'help', 'search', 'random', 'stats', 'genre', 'nowplaying'] as const;

export type BotCommand = (typeof COMMANDS)[number];

const isBotCommand = (value: string): value is BotCommand => COMMANDS.some(command => command === value);

export interface ParsedCommand {
  command: string;
  args: string;
}

/**
 * Split "/search@mybot @mybot radiohead" into command "search" and args "radiohead"
 */
export function parseCommand(text: string): ParsedCommand | null {
  const trimmed = text.trim();
  if (!trimmed.startsWith('/')) {
    return null;
  }

  const [head = '', ...rest] = trimmed.split(/\s+/);
  const command = head.slice(1).split('@')[0]?.toLowerCase() ?? '';
  if (!command) {
    return null;
  }

  // Group clients sometimes put the bot mention in front of the argument
  const words = rest[0]?.startsWith('@') ? rest.slice(1) : rest;
  return { command, args: words.join(' ') };
}

export interface BotDeps {
  telegram: Pick<TelegramClient, 'sendMessage' | 'sendPhoto'>;
  subsonic: Pick<SubsonicClient, 'getCoverArt' | 'getScanStatus' | 'getNowPlaying'>;
  /** Albums from the persisted cache */
  loadAlbums: () => Promise<Album[]>;
  /** Run a library sync through the job queue and wait for it */
  requestSync: () => Promise<JobOutcome>;
  authorizedChatId: string;
  random?: () => number;
}

export class CommandHandler {
  private readonly random: () => number;

  constructor(private readonly deps: BotDeps) {
    this.random = deps.random ?? Math.random;
    if (!deps.authorizedChatId) {
      logger.warn('no authorized chat configured, bot will reject all commands');
    }
  }

  isAuthorized(chatId: string): boolean {
    return Boolean(this.deps.authorizedChatId) && chatId === this.deps.authorizedChatId;
  }

  /**
   * Answer one incoming message. Returns the command handled, or null when ignored.
   */
  async handle(message: IncomingMessage): Promise<BotCommand | null> {
    const parsed = parseCommand(message.text);
    if (!parsed || !isBotCommand(parsed.command)) {
      return null;
    }
    const command = parsed.command;
    const { args } = parsed;

    if (!this.isAuthorized(message.chatId)) {
      logger.warn({ chatId: message.chatId, command, username: message.username }, 'unauthorized command attempt');
      await this.reply(message, UNAUTHORIZED_REPLY);
      return command;
    }

    logger.info({ command, username: message.username }, 'handling bot command');

    try {
      switch (command) {
        case 'start':
        case 'help':
          await this.reply(message, HELP_TEXT);
          break;
        case 'search':
          await this.search(message, args);
          break;
        case 'random':
          await this.randomAlbum(message);
          break;
        case 'stats':
          await this.stats(message);
          break;
        case 'genre':
          await this.genre(message, args);
          break;
        case 'nowplaying':
          await this.nowPlaying(message);
          break;
      }
    } catch (error) {
      logger.error({ err: error, command }, 'bot command failed');
      const detail = error instanceof Error ? error.message : String(error);
      await this.reply(message, `❌ Error: ${escapeHtml(detail)}`);
    }

    return command;
  }

  private async reply(message: IncomingMessage, text: string): Promise<void> {
    for (const part of splitMessage(text)) {
      try {
        await this.deps.telegram.sendMessage(message.chatId, part, { replyToMessageId: message.messageId });
      } catch (error) {
        logger.error({ err: error, chatId: message.chatId }, 'failed to send bot reply');
      }
    }
  }

  /**
   * Cached albums, syncing the library first when nothing has been cached yet
   */
  private async albums(message: IncomingMessage): Promise<Album[]> {
    const cached = await this.deps.loadAlbums();
    if (cached.length > 0) {
      return cached;
    }

    await this.reply(message, '📚 The album cache is empty, syncing the library first...');
    const outcome = await this.deps.requestSync();
    if (outcome.status === 'failed') {
      logger.warn({ err: outcome.error }, 'library sync requested by bot failed');
    }
    return this.deps.loadAlbums();
  }

  private async search(message: IncomingMessage, query: string): Promise<void> {
    if (!query) {
      await this.reply(message, 'Please provide a search term. Example: <code>/search Radiohead</code>');
      return;
    }

    const results = searchAlbums(await this.albums(message), query);
    if (results.length === 0) {
      await this.reply(message, `❌ No albums found matching '${escapeHtml(query)}'.`);
      return;
    }

    const lines = [`🔎 <b>Results for '${escapeHtml(query)}':</b>`, '', ...results.map(formatAlbumLine)];
    await this.reply(message, lines.join('\n'));
  }

  private async genre(message: IncomingMessage, genre: string): Promise<void> {
    if (!genre) {
      await this.reply(message, 'Please provide a genre. Example: <code>/genre Jazz</code>');
      return;
    }

    const results = albumsByGenre(await this.albums(message), genre);
    if (results.length === 0) {
      await this.reply(message, `❌ No albums found for genre '${escapeHtml(genre)}'.`);
      return;
    }

    const lines = [`🏷 <b>Albums tagged '${escapeHtml(genre)}':</b>`, '', ...results.map(formatAlbumLine)];
    await this.reply(message, lines.join('\n'));
  }

  private async randomAlbum(message: IncomingMessage): Promise<void> {
    const album = pickRandomAlbum(await this.albums(message), this.random);
    if (!album) {
      await this.reply(message, '❌ No albums found in the library.');
      return;
    }

    let caption = `🎲 <b>Why not listen to this?</b>\n\n💿 <b>${escapeHtml(album.name)}</b>\n👤 ${escapeHtml(album.artist)}`;
    if (album.year !== undefined) {
      caption += `\n📅 ${album.year}`;
    }
    const genres = formatGenres(album);
    if (genres) {
      caption += `\n🏷 ${escapeHtml(genres)}`;
    }

    if (album.coverArt) {
      try {
        const cover = await this.deps.subsonic.getCoverArt(album.coverArt);
        await this.deps.telegram.sendPhoto(message.chatId, cover, {
          caption,
          replyToMessageId: message.messageId
        });
        return;
      } catch (error) {
        logger.warn({ err: error, albumId: album.id }, 'failed to send cover art, sending text only');
      }
    }

    await this.reply(message, caption);
  }

  private async stats(message: IncomingMessage): Promise<void> {
    const stats = libraryStats(await this.albums(message));
    const lines = [
      '📊 <b>Navidrome Library Statistics</b>',
      '',
      `💿 Albums: ${stats.albums}`,
      `👤 Artists: ${stats.artists}`,
      `🎵 Songs: ${stats.songs}`,
      `🏷 Genres: ${stats.genres}`
    ];

    try {
      const scan = await this.deps.subsonic.getScanStatus();
      if (scan.scanning) {
        lines.push('🔄 Library scan in progress');
      } else if (scan.lastScan) {
        lines.push(`🗓 Last scan: ${escapeHtml(scan.lastScan)}`);
      }
    } catch (error) {
      logger.warn({ err: error }, 'failed to fetch scan status');
    }

    await this.reply(message, lines.join('\n'));
  }

  private async nowPlaying(message: IncomingMessage): Promise<void> {
    const entries = await this.deps.subsonic.getNowPlaying();
    if (entries.length === 0) {
      await this.reply(message, '🔇 Nothing is playing right now.');
      return;
    }

    const lines = entries.map(entry => {
      let line = `• ${escapeHtml(entry.username)}: ${escapeHtml(entry.artist)} - ${escapeHtml(entry.title)}`;
      if (entry.album) {
        line += ` (${escapeHtml(entry.album)})`;
      }
      return line;
    });
    await this.reply(message, ['🎧 <b>Now playing</b>', '', ...lines].join('\n'));
  }
}
