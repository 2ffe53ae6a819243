import { Inject, Injectable, Logger } from '@nestjs/common';
import { createJsonLogEntry, ensureCorrelationId } from '../../shared';
import { sortByModifiedAt, type CandidateFile } from '../../domain/sync/candidate-file';
import type { ResolvedCollection } from '../../domain/sync/collection';
import { ProgressRecord } from '../../domain/sync/progress-record';
import {
  ProgressPersistenceError,
  SyncAbortError,
  SyncConfigurationError,
} from '../../domain/sync/sync-errors';
import {
  createSyncRun,
  finishSyncRun,
  transitionSyncRun,
  type SyncRunReport,
  type SyncRunState,
} from '../../domain/sync/sync-run';
import { settleUpload } from '../../domain/sync/upload-outcome';
import { SyncAgentConfigService } from '../../infrastructure/config/sync-agent-config.service';
import { LinkAssetToCollectionService } from './link-asset-to-collection.service';
import {
  CANDIDATE_FILE_SOURCE_PORT,
  type CandidateFileSourcePort,
} from './ports/candidate-file-source.port';
import type { MediaServerTarget } from './ports/media-server.port';
import {
  PROGRESS_KEY_STRATEGY_PORT,
  type ProgressKeyStrategyPort,
} from './ports/progress-key-strategy.port';
import { PROGRESS_STORE_PORT, type ProgressStorePort } from './ports/progress-store.port';
import { ResolveCollectionService } from './resolve-collection.service';
import { SelectEndpointService } from './select-endpoint.service';
import { UploadAssetService } from './upload-asset.service';

export interface RunSyncInput {
  runId?: string;
}

interface ProcessingContext {
  runId: string;
  target: MediaServerTarget;
  collection: ResolvedCollection;
  progress: ProgressRecord;
}

@Injectable()
export class RunSyncUseCase {
  private readonly logger = new Logger(RunSyncUseCase.name);

  constructor(
    @Inject(CANDIDATE_FILE_SOURCE_PORT)
    private readonly candidateFiles: CandidateFileSourcePort,
    @Inject(PROGRESS_STORE_PORT)
    private readonly progressStore: ProgressStorePort,
    @Inject(PROGRESS_KEY_STRATEGY_PORT)
    private readonly progressKeys: ProgressKeyStrategyPort,
    private readonly endpointSelector: SelectEndpointService,
    private readonly collectionResolver: ResolveCollectionService,
    private readonly assetUploader: UploadAssetService,
    private readonly collectionLinker: LinkAssetToCollectionService,
    private readonly config: SyncAgentConfigService,
  ) {}

  async execute(input: RunSyncInput = {}): Promise<SyncRunReport> {
    const runId = ensureCorrelationId(input.runId);
    let run = createSyncRun(runId);

    try {
      const sourceDir = this.config.sourceDir;
      if (!(await this.candidateFiles.directoryExists(sourceDir))) {
        throw new SyncConfigurationError(`Source directory ${sourceDir} does not exist.`);
      }

      const endpoint = await this.endpointSelector.select(
        { primaryUrl: this.config.primaryUrl, fallbackUrl: this.config.fallbackUrl },
        runId,
      );
      run = transitionSyncRun(run, 'endpoint-selected', { endpoint });

      const target: MediaServerTarget = { baseUrl: endpoint.baseUrl, apiKey: this.config.apiKey };
      const collection = await this.collectionResolver.resolve(target, this.config.collectionName, runId);
      run = transitionSyncRun(run, 'collection-resolved', { collection });

      const progress = await this.loadProgress(runId);
      run = transitionSyncRun(run, 'processing');

      const candidates = sortByModifiedAt(
        await this.candidateFiles.listCandidates(sourceDir, this.config.supportedExtensions),
      );
      run.counters.candidates = candidates.length;

      for (const file of candidates) {
        await this.processFile(file, { runId, target, collection, progress }, run);
      }

      run = transitionSyncRun(run, 'done');
    } catch (error) {
      if (!(error instanceof SyncAbortError)) {
        throw error;
      }

      run = transitionSyncRun(run, 'aborted', {
        abort: { kind: error.kind, message: error.message },
      });
      this.logger.error(JSON.stringify(createJsonLogEntry({
        level: 'error',
        service: 'sync-agent',
        message: 'Sync run aborted.',
        correlationId: runId,
        endpoint: run.endpoint?.baseUrl,
        metadata: { kind: error.kind, ...run.counters },
        error,
      })));
      return finishSyncRun(run);
    }

    this.logger.log(JSON.stringify(createJsonLogEntry({
      level: 'info',
      service: 'sync-agent',
      message: run.counters.processed > 0
        ? `Sync run completed; processed ${run.counters.processed} file(s).`
        : 'Sync run completed; nothing new to upload.',
      correlationId: runId,
      endpoint: run.endpoint?.baseUrl,
      collectionId: run.collection?.id,
      metadata: { ...run.counters },
    })));
    return finishSyncRun(run);
  }

  private async processFile(
    file: CandidateFile,
    context: ProcessingContext,
    run: SyncRunState,
  ): Promise<void> {
    let key: string;
    try {
      key = await this.progressKeys.keyFor(file);
    } catch (error) {
      run.counters.failed += 1;
      this.logger.error(JSON.stringify(createJsonLogEntry({
        level: 'error',
        service: 'sync-agent',
        message: 'Unable to compute progress key; file left for the next run.',
        correlationId: context.runId,
        fileName: file.name,
        metadata: { strategy: this.progressKeys.name },
        error,
      })));
      return;
    }

    if (context.progress.has(key)) {
      run.counters.skipped += 1;
      return;
    }

    const outcome = await this.assetUploader.upload(context.target, file, context.runId);
    const settlement = settleUpload(outcome);
    if (!settlement.settled) {
      run.counters.failed += 1;
      return;
    }

    if (settlement.assetId) {
      const link = await this.collectionLinker.link(
        context.target,
        context.collection,
        settlement.assetId,
        context.runId,
      );
      if (!link.linked) {
        run.counters.unlinked += 1;
      }
    } else {
      run.counters.unlinked += 1;
      this.logger.warn(JSON.stringify(createJsonLogEntry({
        level: 'warn',
        service: 'sync-agent',
        message: 'Server reported a duplicate without its asset id; marking settled without album link.',
        correlationId: context.runId,
        fileName: file.name,
        collectionId: context.collection.id,
      })));
    }

    context.progress.add(key);
    await this.persistProgress(context.progress, file);
    run.counters.processed += 1;
  }

  private async loadProgress(runId: string): Promise<ProgressRecord> {
    const snapshot = await this.progressStore.load();
    if (snapshot.warning) {
      this.logger.warn(JSON.stringify(createJsonLogEntry({
        level: 'warn',
        service: 'sync-agent',
        message: 'Progress store could not be read; starting from an empty record.',
        correlationId: runId,
        metadata: { detail: snapshot.warning },
      })));
    }

    return ProgressRecord.from(snapshot.keys);
  }

  private async persistProgress(progress: ProgressRecord, file: CandidateFile): Promise<void> {
    try {
      await this.progressStore.save(progress.entries());
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ProgressPersistenceError(
        `Unable to record ${file.name} in the progress store (${reason}).`,
        { cause: error },
      );
    }
  }
}
