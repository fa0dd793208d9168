import { createHash, randomBytes } from 'node:crypto';
import got, { HTTPError, ParseError, type Got } from 'got';

import { logger } from '../logger.js';
import type { Album } from '../library/types.js';
import { asArray, asNumber, asString, decodeAlbum, isRecord } from './decode.js';
import { SubsonicApiError, SubsonicDecodeError, SubsonicError, SubsonicTransportError } from './errors.js';

export const SUBSONIC_API_VERSION = '1.16.1';
export const SUBSONIC_CLIENT_NAME = 'navidrome-album-digest';

export interface SubsonicConfig {
  baseUrl: string;
  username: string;
  password: string;
  timeoutMs: number;
  clientName?: string;
}

export type SearchParams = Record<string, string | number | boolean>;

export type AlbumListType =
  | 'alphabeticalByArtist'
  | 'alphabeticalByName'
  | 'newest'
  | 'random'
  | 'recent'
  | 'frequent'
  | 'starred';

export interface AlbumListQuery {
  type: AlbumListType;
  size: number;
  offset: number;
  musicFolderId?: string;
}

export interface AlbumListPage {
  albums: Album[];
  /** Entries the server sent, including ones dropped for having no id */
  entries: number;
}

export interface MusicFolder {
  id: string;
  name: string;
}

export interface ScanStatus {
  scanning: boolean;
  count?: number;
  folderCount?: number;
  lastScan?: string;
}

export interface NowPlayingEntry {
  username: string;
  title: string;
  artist: string;
  album?: string;
  minutesAgo?: number;
  playerName?: string;
}

type SubsonicBody = Record<string, unknown>;

/**
 * Unwrap the `subsonic-response` envelope and raise server-reported failures
 */
export const unwrapEnvelope = (endpoint: string, payload: unknown): SubsonicBody => {
  const body = isRecord(payload) ? payload['subsonic-response'] : undefined;
  if (!isRecord(body)) {
    throw new SubsonicDecodeError(endpoint, 'response has no subsonic-response envelope');
  }

  if (body.status === 'failed') {
    const error = isRecord(body.error) ? body.error : {};
    throw new SubsonicApiError(endpoint, asNumber(error.code) ?? 0, asString(error.message) ?? 'unknown error');
  }

  return body;
};

const toTransportError = (endpoint: string, error: unknown): SubsonicError => {
  if (error instanceof SubsonicError) {
    return error;
  }
  if (error instanceof ParseError) {
    return new SubsonicDecodeError(endpoint, 'response body is not valid JSON', { cause: error });
  }
  if (error instanceof HTTPError) {
    return new SubsonicTransportError(endpoint, error.message, error.response.statusCode, { cause: error });
  }
  const message = error instanceof Error ? error.message : String(error);
  return new SubsonicTransportError(endpoint, message, undefined, { cause: error });
};

/**
 * Client for the Subsonic REST API as served by Navidrome.
 * Credentials are passed in explicitly; every request carries a fresh
 * salt and md5 token (Subsonic API >= 1.13).
 */
export class SubsonicClient {
  private readonly http: Got;

  constructor(private readonly config: SubsonicConfig) {
    this.http = got.extend({
      prefixUrl: `${config.baseUrl.replace(/\/+$/, '')}/rest`,
      timeout: { request: config.timeoutMs },
      // Failed albums are retried by the next sync cycle, not here
      retry: { limit: 0 }
    });
  }

  private authParams(): SearchParams {
    const salt = randomBytes(3).toString('hex');
    const token = createHash('md5').update(this.config.password + salt).digest('hex');

    return {
      u: this.config.username,
      t: token,
      s: salt,
      v: SUBSONIC_API_VERSION,
      c: this.config.clientName ?? SUBSONIC_CLIENT_NAME,
      f: 'json'
    };
  }

  private assertConfigured(): void {
    if (!this.config.baseUrl) {
      throw new SubsonicError('Navidrome URL not configured (set NAVIDROME_URL)');
    }
    if (!this.config.password) {
      logger.warn('navidrome password not configured, requests will be rejected');
    }
  }

  async request(endpoint: string, params: SearchParams = {}): Promise<SubsonicBody> {
    this.assertConfigured();
    logger.debug({ endpoint, params }, 'subsonic request');

    let payload: unknown;
    try {
      payload = await this.http
        .get(endpoint, { searchParams: { ...this.authParams(), ...params } })
        .json<unknown>();
    } catch (error) {
      throw toTransportError(endpoint, error);
    }

    return unwrapEnvelope(endpoint, payload);
  }

  /**
   * One page of the album listing. Records without an id are skipped
   * but still counted in `entries`.
   */
  async getAlbumList(query: AlbumListQuery): Promise<AlbumListPage> {
    const params: SearchParams = { type: query.type, size: query.size, offset: query.offset };
    if (query.musicFolderId) {
      params.musicFolderId = query.musicFolderId;
    }

    const body = await this.request('getAlbumList', params);
    if (!isRecord(body.albumList)) {
      throw new SubsonicDecodeError('getAlbumList', 'response has no albumList');
    }

    const entries = asArray(body.albumList.album);
    const albums: Album[] = [];
    for (const raw of entries) {
      const album = decodeAlbum(raw);
      if (album) {
        albums.push(album);
      } else {
        logger.debug({ offset: query.offset }, 'skipping album list entry without id');
      }
    }
    return { albums, entries: entries.length };
  }

  /**
   * Full album record (structured release date, genre list)
   */
  async getAlbum(id: string): Promise<Album> {
    const body = await this.request('getAlbum', { id });
    const album = decodeAlbum(body.album);
    if (!album) {
      throw new SubsonicDecodeError('getAlbum', `no album record for id ${id}`);
    }
    return album;
  }

  async getMusicFolders(): Promise<MusicFolder[]> {
    const body = await this.request('getMusicFolders');
    const container = isRecord(body.musicFolders) ? body.musicFolders : {};

    const folders: MusicFolder[] = [];
    for (const raw of asArray(container.musicFolder)) {
      if (!isRecord(raw)) continue;
      const id = asString(raw.id);
      if (id) {
        folders.push({ id, name: asString(raw.name) ?? '' });
      }
    }
    return folders;
  }

  async getScanStatus(): Promise<ScanStatus> {
    const body = await this.request('getScanStatus');
    if (!isRecord(body.scanStatus)) {
      throw new SubsonicDecodeError('getScanStatus', 'response has no scanStatus');
    }

    const raw = body.scanStatus;
    const status: ScanStatus = { scanning: raw.scanning === true };
    const count = asNumber(raw.count);
    if (count !== undefined) status.count = count;
    const folderCount = asNumber(raw.folderCount);
    if (folderCount !== undefined) status.folderCount = folderCount;
    const lastScan = asString(raw.lastScan);
    if (lastScan) status.lastScan = lastScan;
    return status;
  }

  async getNowPlaying(): Promise<NowPlayingEntry[]> {
    const body = await this.request('getNowPlaying');
    const container = isRecord(body.nowPlaying) ? body.nowPlaying : {};

    const entries: NowPlayingEntry[] = [];
    for (const raw of asArray(container.entry)) {
      if (!isRecord(raw)) continue;
      const entry: NowPlayingEntry = {
        username: asString(raw.username) ?? 'someone',
        title: asString(raw.title) ?? 'Unknown Title',
        artist: asString(raw.artist) ?? 'Unknown Artist'
      };
      const album = asString(raw.album);
      if (album) entry.album = album;
      const minutesAgo = asNumber(raw.minutesAgo);
      if (minutesAgo !== undefined) entry.minutesAgo = minutesAgo;
      const playerName = asString(raw.playerName);
      if (playerName) entry.playerName = playerName;
      entries.push(entry);
    }
    return entries;
  }

  /**
   * Raw cover image bytes. Subsonic answers errors for binary endpoints
   * with a JSON envelope instead of an HTTP error status.
   */
  async getCoverArt(coverArtId: string, size = 600): Promise<Buffer> {
    this.assertConfigured();
    const endpoint = 'getCoverArt';

    let contentType: string;
    let body: Buffer;
    try {
      const response = await this.http.get(endpoint, {
        searchParams: { ...this.authParams(), id: coverArtId, size },
        responseType: 'buffer'
      });
      contentType = response.headers['content-type'] ?? '';
      body = response.body;
    } catch (error) {
      throw toTransportError(endpoint, error);
    }

    if (contentType.includes('json')) {
      let payload: unknown;
      try {
        payload = JSON.parse(body.toString('utf8'));
      } catch (error) {
        throw new SubsonicDecodeError(endpoint, 'response body is not valid JSON', { cause: error });
      }
      unwrapEnvelope(endpoint, payload);
      throw new SubsonicDecodeError(endpoint, 'expected image data, got a JSON response');
    }

    return body;
  }
}
