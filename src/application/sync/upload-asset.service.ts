import { Inject, Injectable, Logger } from '@nestjs/common';
import { createJsonLogEntry } from '../../shared';
import type { CandidateFile } from '../../domain/sync/candidate-file';
import { AssetFileUnavailableError } from '../../domain/sync/sync-errors';
import { buildAssetUploadFields } from '../../domain/sync/upload-identity';
import { classifyUploadResponse, type UploadOutcome } from '../../domain/sync/upload-outcome';
import { SyncAgentConfigService } from '../../infrastructure/config/sync-agent-config.service';
import {
  MEDIA_SERVER_PORT,
  type MediaServerPort,
  type MediaServerTarget,
} from './ports/media-server.port';

@Injectable()
export class UploadAssetService {
  private readonly logger = new Logger(UploadAssetService.name);

  constructor(
    @Inject(MEDIA_SERVER_PORT)
    private readonly mediaServer: MediaServerPort,
    private readonly config: SyncAgentConfigService,
  ) {}

  async upload(target: MediaServerTarget, file: CandidateFile, runId: string): Promise<UploadOutcome> {
    const fields = buildAssetUploadFields(file, this.config.deviceId);

    this.logger.log(JSON.stringify(createJsonLogEntry({
      level: 'info',
      service: 'sync-agent',
      message: 'Uploading file.',
      correlationId: runId,
      fileName: file.name,
      metadata: { deviceAssetId: fields.deviceAssetId, sizeBytes: file.sizeBytes },
    })));

    let outcome: UploadOutcome;
    try {
      const response = await this.mediaServer.uploadAsset(target, { file, fields });
      outcome = classifyUploadResponse(response);
    } catch (error) {
      outcome = {
        kind: 'failed',
        failure: error instanceof AssetFileUnavailableError
          ? { reason: 'file-unavailable', message: error.message }
          : { reason: 'transport', message: error instanceof Error ? error.message : String(error) },
      };
    }

    this.logOutcome(outcome, file, runId);
    return outcome;
  }

  private logOutcome(outcome: UploadOutcome, file: CandidateFile, runId: string): void {
    switch (outcome.kind) {
      case 'created':
      case 'deduplicated':
        this.logger.log(JSON.stringify(createJsonLogEntry({
          level: 'info',
          service: 'sync-agent',
          message: outcome.kind === 'created' ? 'Asset created.' : 'Asset already known to the server.',
          correlationId: runId,
          fileName: file.name,
          assetId: outcome.assetId,
        })));
        return;
      case 'rejected-duplicate':
        this.logger.warn(JSON.stringify(createJsonLogEntry({
          level: 'warn',
          service: 'sync-agent',
          message: 'Duplicate on server.',
          correlationId: runId,
          fileName: file.name,
          assetId: outcome.assetId,
          metadata: { assetIdKnown: outcome.assetId !== undefined },
        })));
        return;
      case 'failed':
        this.logger.error(JSON.stringify(createJsonLogEntry({
          level: 'error',
          service: 'sync-agent',
          message: 'Upload failed; file left for the next run.',
          correlationId: runId,
          fileName: file.name,
          metadata: {
            reason: outcome.failure.reason,
            statusCode: outcome.failure.statusCode,
          },
          error: outcome.failure.message,
        })));
        return;
    }
  }
}
