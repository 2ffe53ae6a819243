import { open, type FileHandle } from 'node:fs/promises';
import { Injectable } from '@nestjs/common';
import type {
  AlbumAssetLinkResult,
  AssetUploadRequest,
  MediaServerPort,
  MediaServerProbeResult,
  MediaServerTarget,
} from '../../application/sync/ports/media-server.port';
import type { RemoteAlbum } from '../../domain/sync/collection';
import { AssetFileUnavailableError } from '../../domain/sync/sync-errors';
import type { AssetUploadResponse } from '../../domain/sync/upload-outcome';
import { SyncAgentConfigService } from '../config/sync-agent-config.service';

export class MediaServerRequestError extends Error {
  constructor(
    message: string,
    readonly statusCode?: number,
    readonly responseBody = '',
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'MediaServerRequestError';
  }
}

interface AlbumDto {
  id?: unknown;
  albumName?: unknown;
}

interface AlbumAssetResultDto {
  id?: unknown;
  success?: unknown;
  error?: unknown;
}

@Injectable()
export class MediaServerHttpAdapter implements MediaServerPort {
  constructor(private readonly config: SyncAgentConfigService) {}

  async probe(baseUrl: string): Promise<MediaServerProbeResult> {
    try {
      const response = await fetch(`${baseUrl}/api/server/ping`, {
        method: 'GET',
        headers: { accept: 'application/json' },
        signal: AbortSignal.timeout(this.config.probeTimeoutMs),
      });

      return response.status === 200
        ? { reachable: true, statusCode: response.status }
        : {
            reachable: false,
            statusCode: response.status,
            detail: `ping answered with status ${response.status}`,
          };
    } catch (error) {
      return { reachable: false, detail: describeTransportError(error) };
    }
  }

  async listAlbums(target: MediaServerTarget): Promise<RemoteAlbum[]> {
    const payload = await this.requestJson(target, 'GET', '/api/albums');

    if (!Array.isArray(payload)) {
      throw new MediaServerRequestError('Album listing did not return an array.', 200);
    }

    return payload.flatMap((item: AlbumDto) =>
      typeof item?.id === 'string' && typeof item.albumName === 'string'
        ? [{ id: item.id, albumName: item.albumName }]
        : [],
    );
  }

  async addAssetsToAlbum(
    target: MediaServerTarget,
    albumId: string,
    assetIds: string[],
  ): Promise<AlbumAssetLinkResult[]> {
    const payload = await this.requestJson(
      target,
      'PUT',
      `/api/albums/${encodeURIComponent(albumId)}/assets`,
      { ids: assetIds },
    );

    if (!Array.isArray(payload)) {
      return assetIds.map((id) => ({ id, success: true }));
    }

    return payload.flatMap((item: AlbumAssetResultDto) =>
      typeof item?.id === 'string'
        ? [{
            id: item.id,
            success: item.success !== false,
            error: typeof item.error === 'string' ? item.error : undefined,
          }]
        : [],
    );
  }

  async uploadAsset(
    target: MediaServerTarget,
    request: AssetUploadRequest,
  ): Promise<AssetUploadResponse> {
    let handle: FileHandle;
    try {
      handle = await open(request.file.path, 'r');
    } catch (error) {
      throw new AssetFileUnavailableError(request.file.path, { cause: error });
    }

    try {
      let bytes: Buffer;
      try {
        bytes = await handle.readFile();
      } catch (error) {
        throw new AssetFileUnavailableError(request.file.path, { cause: error });
      }

      const form = new FormData();
      form.append('assetData', new Blob([bytes]), request.file.name);
      form.append('deviceAssetId', request.fields.deviceAssetId);
      form.append('deviceId', request.fields.deviceId);
      form.append('fileCreatedAt', request.fields.fileCreatedAt);
      form.append('fileModifiedAt', request.fields.fileModifiedAt);
      form.append('isFavorite', String(request.fields.isFavorite));

      let response: Response;
      try {
        response = await fetch(`${target.baseUrl}/api/assets`, {
          method: 'POST',
          headers: this.buildHeaders(target),
          body: form,
          signal: AbortSignal.timeout(this.config.uploadTimeoutMs),
        });
      } catch (error) {
        throw new MediaServerRequestError(
          `Unable to reach media server for upload (${describeTransportError(error)}).`,
          undefined,
          '',
          { cause: error },
        );
      }

      return {
        statusCode: response.status,
        body: await this.readJson(response),
      };
    } finally {
      await handle.close();
    }
  }

  private async requestJson(
    target: MediaServerTarget,
    method: 'GET' | 'PUT',
    path: string,
    body?: unknown,
  ): Promise<unknown> {
    const headers = this.buildHeaders(target);
    if (body !== undefined) {
      headers['content-type'] = 'application/json';
    }

    let response: Response;
    try {
      response = await fetch(`${target.baseUrl}${path}`, {
        method,
        headers,
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: AbortSignal.timeout(this.config.metadataTimeoutMs),
      });
    } catch (error) {
      throw new MediaServerRequestError(
        `Unable to reach media server for ${method} ${path} (${describeTransportError(error)}).`,
        undefined,
        '',
        { cause: error },
      );
    }

    if (!response.ok) {
      const text = await response.text().catch(() => '');
      throw new MediaServerRequestError(
        `${method} ${path} failed with status ${response.status}${describeResponseBody(text)}.`,
        response.status,
        text,
      );
    }

    return this.readJson(response);
  }

  private buildHeaders(target: MediaServerTarget): Record<string, string> {
    return {
      'x-api-key': target.apiKey,
      accept: 'application/json',
    };
  }

  private async readJson(response: Response): Promise<unknown> {
    try {
      return (await response.json()) as unknown;
    } catch {
      return {};
    }
  }
}

function describeTransportError(error: unknown): string {
  if (error instanceof Error) {
    return error.name === 'TimeoutError' ? 'request timed out' : error.message;
  }
  return 'unknown error';
}

const MAX_BODY_DETAIL_LENGTH = 200;

// Prefers the server's JSON `message`; falls back to the raw text.
function describeResponseBody(text: string): string {
  const trimmed = text.trim();
  if (trimmed.length === 0) {
    return '';
  }

  const detail = readServerMessage(trimmed) ?? trimmed;
  return ` (${detail.slice(0, MAX_BODY_DETAIL_LENGTH)})`;
}

function readServerMessage(text: string): string | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return undefined;
  }

  return typeof parsed === 'object' &&
    parsed !== null &&
    'message' in parsed &&
    typeof parsed.message === 'string'
    ? parsed.message
    : undefined;
}
