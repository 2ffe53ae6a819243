import { Inject, Injectable, Logger } from '@nestjs/common';
import { createJsonLogEntry } from '../../shared';
import {
  findCollectionByName,
  type RemoteAlbum,
  type ResolvedCollection,
} from '../../domain/sync/collection';
import { CollectionLookupError, CollectionNotFoundError } from '../../domain/sync/sync-errors';
import {
  MEDIA_SERVER_PORT,
  type MediaServerPort,
  type MediaServerTarget,
} from './ports/media-server.port';

@Injectable()
export class ResolveCollectionService {
  private readonly logger = new Logger(ResolveCollectionService.name);

  constructor(@Inject(MEDIA_SERVER_PORT) private readonly mediaServer: MediaServerPort) {}

  async resolve(target: MediaServerTarget, name: string, runId: string): Promise<ResolvedCollection> {
    this.logger.log(JSON.stringify(createJsonLogEntry({
      level: 'info',
      service: 'sync-agent',
      message: `Looking for album "${name}".`,
      correlationId: runId,
      endpoint: target.baseUrl,
    })));

    let albums: RemoteAlbum[];
    try {
      albums = await this.mediaServer.listAlbums(target);
    } catch (error) {
      const reason = error instanceof Error ? error.message : 'unknown error';
      throw new CollectionLookupError(`Unable to list albums (${reason}).`, { cause: error });
    }

    const collection = findCollectionByName(albums, name);
    if (!collection) {
      throw new CollectionNotFoundError(name);
    }

    this.logger.log(JSON.stringify(createJsonLogEntry({
      level: 'info',
      service: 'sync-agent',
      message: 'Album resolved.',
      correlationId: runId,
      collectionId: collection.id,
      metadata: { albumCount: albums.length },
    })));
    return collection;
  }
}
