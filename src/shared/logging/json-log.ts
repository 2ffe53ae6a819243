export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface SerializedError {
  name: string;
  message: string;
  stack?: string;
  cause?: SerializedError;
}

export interface JsonLogEntry {
  timestamp: string;
  level: LogLevel;
  service: string;
  message: string;
  correlationId: string;
  fileName?: string;
  assetId?: string;
  collectionId?: string;
  endpoint?: string;
  metadata?: Record<string, unknown>;
  error?: SerializedError;
}

export interface CreateJsonLogEntryInput {
  level: LogLevel;
  service: string;
  message: string;
  correlationId: string;
  fileName?: string;
  assetId?: string;
  collectionId?: string;
  endpoint?: string;
  metadata?: Record<string, unknown>;
  error?: unknown;
  timestamp?: string;
}

const MAX_CAUSE_DEPTH = 3;

/** Follows `cause` a few levels; sync errors wrap the fs or fetch failure beneath them. */
export function serializeError(error: unknown, depth = 0): SerializedError | undefined {
  if (error === undefined || error === null) {
    return undefined;
  }

  if (typeof error === 'string') {
    return { name: 'Error', message: error };
  }

  if (!(error instanceof Error)) {
    return { name: 'UnknownError', message: describeUnknown(error) };
  }

  const serialized: SerializedError = {
    name: error.name,
    message: error.message,
    stack: error.stack,
  };
  if (error.cause !== undefined && depth < MAX_CAUSE_DEPTH) {
    serialized.cause = serializeError(error.cause, depth + 1);
  }
  return serialized;
}

function describeUnknown(value: unknown): string {
  let serialized: string | undefined;
  try {
    serialized = JSON.stringify(value);
  } catch {
    serialized = undefined;
  }
  return serialized ?? String(value);
}

export function createJsonLogEntry(input: CreateJsonLogEntryInput): JsonLogEntry {
  return {
    timestamp: input.timestamp ?? new Date().toISOString(),
    level: input.level,
    service: input.service,
    message: input.message,
    correlationId: input.correlationId,
    fileName: input.fileName,
    assetId: input.assetId,
    collectionId: input.collectionId,
    endpoint: input.endpoint,
    metadata: input.metadata,
    error: serializeError(input.error),
  };
}
