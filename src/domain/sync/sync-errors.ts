export type SyncAbortKind = 'configuration' | 'connectivity' | 'resolution' | 'persistence';

export abstract class SyncAbortError extends Error {
  abstract readonly kind: SyncAbortKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class SyncConfigurationError extends SyncAbortError {
  readonly kind = 'configuration';
}

export class NoReachableEndpointError extends SyncAbortError {
  readonly kind = 'connectivity';
}

export class CollectionLookupError extends SyncAbortError {
  readonly kind = 'resolution';
}

export class CollectionNotFoundError extends SyncAbortError {
  readonly kind = 'resolution';

  constructor(readonly collectionName: string) {
    super(
      `Album "${collectionName}" was not found on the media server. Create it there before running the sync.`,
    );
  }
}

export class ProgressPersistenceError extends SyncAbortError {
  readonly kind = 'persistence';
}

export class AssetFileUnavailableError extends Error {
  constructor(
    readonly filePath: string,
    options?: { cause?: unknown },
  ) {
    super(`File ${filePath} could not be opened for upload.`, options);
    this.name = 'AssetFileUnavailableError';
  }
}
