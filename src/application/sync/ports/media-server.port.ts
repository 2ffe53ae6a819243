import type { CandidateFile } from '../../../domain/sync/candidate-file';
import type { RemoteAlbum } from '../../../domain/sync/collection';
import type { AssetUploadFields } from '../../../domain/sync/upload-identity';
import type { AssetUploadResponse } from '../../../domain/sync/upload-outcome';

export const MEDIA_SERVER_PORT = Symbol('MEDIA_SERVER_PORT');

export interface MediaServerTarget {
  baseUrl: string;
  apiKey: string;
}

export interface MediaServerProbeResult {
  reachable: boolean;
  statusCode?: number;
  detail?: string;
}

export interface AssetUploadRequest {
  file: CandidateFile;
  fields: AssetUploadFields;
}

export interface AlbumAssetLinkResult {
  id: string;
  success: boolean;
  error?: string;
}

export interface MediaServerPort {
  /** Never rejects; an unreachable server is reported in the result. */
  probe(baseUrl: string): Promise<MediaServerProbeResult>;
  listAlbums(target: MediaServerTarget): Promise<RemoteAlbum[]>;
  /**
   * Resolves with whatever status the server answered; rejects only when no
   * answer was obtained (transport error, timeout, unreadable file).
   */
  uploadAsset(target: MediaServerTarget, request: AssetUploadRequest): Promise<AssetUploadResponse>;
  addAssetsToAlbum(
    target: MediaServerTarget,
    albumId: string,
    assetIds: string[],
  ): Promise<AlbumAssetLinkResult[]>;
}
