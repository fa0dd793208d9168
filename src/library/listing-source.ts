/**
 * Remote listing source
 * Pages through getAlbumList to collect the lightweight record of every album
 */

import { logger } from '../logger.js';
import type { AlbumListPage, AlbumListType, SubsonicClient } from '../subsonic/client.js';
import type { Album, AlbumListingSource, ListingResult } from './types.js';

export type AlbumListClient = Pick<SubsonicClient, 'getAlbumList' | 'getMusicFolders'>;

export interface ListingOptions {
  pageSize: number;
  listType?: AlbumListType;
  /** Music folder name to restrict the listing to (empty = all folders) */
  musicFolder?: string;
}

export class SubsonicListingSource implements AlbumListingSource {
  // undefined = not resolved yet, null = resolved to "all folders"
  private musicFolderId: string | null | undefined;

  constructor(
    private readonly client: AlbumListClient,
    private readonly options: ListingOptions
  ) {
    if (!Number.isInteger(options.pageSize) || options.pageSize < 1) {
      throw new RangeError(`pageSize must be a positive integer, got ${options.pageSize}`);
    }
  }

  /**
   * Fetch every page sequentially until the server sends an empty page.
   * A short page is not the end: the server may cap the page size, and
   * entries without an id are dropped after counting.
   * A failing page stops the listing and returns what was accumulated
   * (complete: false); this never throws.
   */
  async listAll(): Promise<ListingResult> {
    const { pageSize, listType = 'alphabeticalByArtist' } = this.options;
    const musicFolderId = await this.resolveMusicFolderId();

    const albums: Album[] = [];
    let offset = 0;
    let pages = 0;

    logger.info({ pageSize, listType, musicFolderId }, 'fetching full album list from navidrome');

    for (;;) {
      let page: AlbumListPage;
      try {
        page = await this.client.getAlbumList({ type: listType, size: pageSize, offset, musicFolderId });
      } catch (error) {
        const err = error instanceof Error ? error : new Error(String(error));
        logger.warn(
          { err, offset, pages, albumsListed: albums.length },
          'album list page failed, stopping listing'
        );
        return { albums, complete: false, pages, error: err };
      }

      if (page.entries === 0) {
        break;
      }

      albums.push(...page.albums);
      pages++;
      // Advance by what the server sent so a capped page size skips nothing
      offset += page.entries;

      if (albums.length % 2000 < page.albums.length) {
        logger.info({ albumsListed: albums.length }, 'fetched album list batch');
      }
    }

    logger.info({ albumsListed: albums.length, pages }, 'album list complete');
    return { albums, complete: true, pages };
  }

  private async resolveMusicFolderId(): Promise<string | undefined> {
    const name = this.options.musicFolder;
    if (!name) {
      return undefined;
    }
    if (this.musicFolderId !== undefined) {
      return this.musicFolderId ?? undefined;
    }

    try {
      const folders = await this.client.getMusicFolders();
      const match = folders.find(folder => folder.name === name);
      if (!match) {
        logger.warn(
          { musicFolder: name, available: folders.map(folder => folder.name) },
          'configured music folder not found, listing all folders'
        );
        this.musicFolderId = null;
        return undefined;
      }

      logger.debug({ musicFolder: name, musicFolderId: match.id }, 'resolved music folder');
      this.musicFolderId = match.id;
      return match.id;
    } catch (error) {
      // Not cached: the next cycle tries again
      logger.warn({ err: error, musicFolder: name }, 'failed to resolve music folder, listing all folders');
      return undefined;
    }
  }
}
