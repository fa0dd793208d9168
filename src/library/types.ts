/**
 * Album model shared by the sync engine, feed filters and the bot.
 */

/**
 * When an album was released, as the server reported it.
 * Navidrome's getAlbum returns a {year, month, day} record, getAlbumList
 * and older Subsonic servers a plain string (ISO date or bare year).
 */
export type ReleaseDate =
  | { kind: 'structured'; year?: number; month?: number; day?: number }
  | { kind: 'textual'; value: string }
  | { kind: 'absent' };

export interface Album {
  id: string;
  name: string;
  artist: string;
  artistId?: string;
  year?: number;
  songCount?: number;
  duration?: number; // seconds
  coverArt?: string;
  createdAt?: string; // ISO timestamp the album was added to the server
  releaseDate: ReleaseDate;
  genres: string[];
  fetchedAt?: string; // ISO UTC, set by the sync engine on every enrichment
}

export type AlbumSnapshot = Map<string, Album>;

export type DeletionPolicy = 'require-complete-listing' | 'trust-partial-listing';

export interface ListingResult {
  albums: Album[];
  /** True when pagination reached the end of the listing without error */
  complete: boolean;
  pages: number;
  error?: Error;
}

export interface AlbumListingSource {
  listAll(): Promise<ListingResult>;
}

export interface AlbumDetailSource {
  /** Rejects when the album cannot be fetched or decoded */
  fetchDetail(id: string): Promise<Album>;
}

export interface AlbumCacheStore {
  load(): Promise<AlbumSnapshot>;
  save(albums: Album[]): Promise<void>;
}

export type Clock = () => Date;
