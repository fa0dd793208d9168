import type { SubsonicClient } from '../subsonic/client.js';
import type { Album, AlbumDetailSource } from './types.js';

export type AlbumDetailClient = Pick<SubsonicClient, 'getAlbum'>;

/**
 * Full album metadata via getAlbum (structured release date, genre list)
 */
export class SubsonicDetailSource implements AlbumDetailSource {
  constructor(private readonly client: AlbumDetailClient) {}

  fetchDetail(id: string): Promise<Album> {
    return this.client.getAlbum(id);
  }
}
