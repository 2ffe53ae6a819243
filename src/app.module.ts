import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { LinkAssetToCollectionService } from './application/sync/link-asset-to-collection.service';
import { CANDIDATE_FILE_SOURCE_PORT } from './application/sync/ports/candidate-file-source.port';
import { MEDIA_SERVER_PORT } from './application/sync/ports/media-server.port';
import {
  PROGRESS_KEY_STRATEGY_PORT,
  type ProgressKeyStrategyPort,
} from './application/sync/ports/progress-key-strategy.port';
import { PROGRESS_STORE_PORT } from './application/sync/ports/progress-store.port';
import { ResolveCollectionService } from './application/sync/resolve-collection.service';
import { RunSyncUseCase } from './application/sync/run-sync.use-case';
import { SelectEndpointService } from './application/sync/select-endpoint.service';
import { UploadAssetService } from './application/sync/upload-asset.service';
import {
  SYNC_AGENT_ENV_FILE_PATHS,
  SyncAgentConfigService,
  validateSyncAgentEnvironment,
} from './infrastructure/config/sync-agent-config.service';
import { LocalCandidateFileSourceAdapter } from './infrastructure/filesystem/local-candidate-file-source.adapter';
import { MediaServerHttpAdapter } from './infrastructure/http/media-server-http.adapter';
import { JsonFileProgressStoreAdapter } from './infrastructure/persistence/json-file-progress-store.adapter';
import { ContentHashProgressKeyStrategy } from './infrastructure/progress-keys/content-hash-progress-key.strategy';
import { FileNameProgressKeyStrategy } from './infrastructure/progress-keys/file-name-progress-key.strategy';
import { SyncPollerService } from './presentation/workers/sync-poller.service';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      cache: true,
      envFilePath: SYNC_AGENT_ENV_FILE_PATHS,
      validate: validateSyncAgentEnvironment,
    }),
  ],
  providers: [
    SyncAgentConfigService,
    MediaServerHttpAdapter,
    {
      provide: MEDIA_SERVER_PORT,
      useExisting: MediaServerHttpAdapter,
    },
    JsonFileProgressStoreAdapter,
    {
      provide: PROGRESS_STORE_PORT,
      useExisting: JsonFileProgressStoreAdapter,
    },
    LocalCandidateFileSourceAdapter,
    {
      provide: CANDIDATE_FILE_SOURCE_PORT,
      useExisting: LocalCandidateFileSourceAdapter,
    },
    FileNameProgressKeyStrategy,
    ContentHashProgressKeyStrategy,
    {
      provide: PROGRESS_KEY_STRATEGY_PORT,
      inject: [SyncAgentConfigService, FileNameProgressKeyStrategy, ContentHashProgressKeyStrategy],
      useFactory: (
        config: SyncAgentConfigService,
        byFileName: FileNameProgressKeyStrategy,
        byContentHash: ContentHashProgressKeyStrategy,
      ): ProgressKeyStrategyPort =>
        config.progressKeyStrategy === 'content-hash' ? byContentHash : byFileName,
    },
    SelectEndpointService,
    ResolveCollectionService,
    UploadAssetService,
    LinkAssetToCollectionService,
    RunSyncUseCase,
    SyncPollerService,
  ],
})
export class AppModule {}
