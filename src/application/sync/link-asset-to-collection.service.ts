import { Inject, Injectable, Logger } from '@nestjs/common';
import { createJsonLogEntry } from '../../shared';
import type { ResolvedCollection } from '../../domain/sync/collection';
import {
  MEDIA_SERVER_PORT,
  type MediaServerPort,
  type MediaServerTarget,
} from './ports/media-server.port';

export type CollectionLinkResult =
  | { linked: true; alreadyPresent: boolean }
  | { linked: false; reason: string };

// The server answers "duplicate" for an asset already in the album.
const ALREADY_IN_ALBUM_ERROR = 'duplicate';

/**
 * A link failure is reported, never thrown: the asset already exists remotely
 * and must not be uploaded again because of a missing album membership.
 */
@Injectable()
export class LinkAssetToCollectionService {
  private readonly logger = new Logger(LinkAssetToCollectionService.name);

  constructor(@Inject(MEDIA_SERVER_PORT) private readonly mediaServer: MediaServerPort) {}

  async link(
    target: MediaServerTarget,
    collection: ResolvedCollection,
    assetId: string,
    runId: string,
  ): Promise<CollectionLinkResult> {
    let result: CollectionLinkResult;

    try {
      const items = await this.mediaServer.addAssetsToAlbum(target, collection.id, [assetId]);
      const item = items.find((candidate) => candidate.id === assetId);

      if (!item || item.success) {
        result = { linked: true, alreadyPresent: false };
      } else if (item.error === ALREADY_IN_ALBUM_ERROR) {
        result = { linked: true, alreadyPresent: true };
      } else {
        result = { linked: false, reason: `server refused the asset (${item.error ?? 'no reason given'})` };
      }
    } catch (error) {
      result = { linked: false, reason: error instanceof Error ? error.message : String(error) };
    }

    if (result.linked) {
      this.logger.log(JSON.stringify(createJsonLogEntry({
        level: 'info',
        service: 'sync-agent',
        message: `Added to album "${collection.name}".`,
        correlationId: runId,
        assetId,
        collectionId: collection.id,
        metadata: { alreadyPresent: result.alreadyPresent },
      })));
    } else {
      this.logger.error(JSON.stringify(createJsonLogEntry({
        level: 'error',
        service: 'sync-agent',
        message: `Failed to add asset to album "${collection.name}".`,
        correlationId: runId,
        assetId,
        collectionId: collection.id,
        error: result.reason,
      })));
    }

    return result;
  }
}
