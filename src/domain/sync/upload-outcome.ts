export type UploadFailureReason =
  | 'http-status'
  | 'missing-asset-id'
  | 'transport'
  | 'file-unavailable';

export interface UploadFailure {
  reason: UploadFailureReason;
  message: string;
  statusCode?: number;
}

export type UploadOutcome =
  | { kind: 'created'; assetId: string }
  | { kind: 'deduplicated'; assetId: string }
  | { kind: 'rejected-duplicate'; assetId?: string }
  | { kind: 'failed'; failure: UploadFailure };

export interface AssetUploadResponse {
  statusCode: number;
  body: unknown;
}

export type UploadSettlement =
  | { settled: true; assetId?: string }
  | { settled: false; failure: UploadFailure };

export function classifyUploadResponse(response: AssetUploadResponse): UploadOutcome {
  const assetId = readAssetId(response.body);

  switch (response.statusCode) {
    case 201:
      return assetId
        ? { kind: 'created', assetId }
        : missingAssetId(response.statusCode);
    case 200:
      return assetId
        ? { kind: 'deduplicated', assetId }
        : missingAssetId(response.statusCode);
    case 409:
      return assetId ? { kind: 'rejected-duplicate', assetId } : { kind: 'rejected-duplicate' };
    default:
      return {
        kind: 'failed',
        failure: {
          reason: 'http-status',
          statusCode: response.statusCode,
          message: `Upload rejected with status ${response.statusCode}${describeBody(response.body)}.`,
        },
      };
  }
}

/**
 * Created, deduplicated and rejected duplicates all mean the asset exists
 * remotely; only a failure leaves the file to be retried next run.
 */
export function settleUpload(outcome: UploadOutcome): UploadSettlement {
  if (outcome.kind === 'failed') {
    return { settled: false, failure: outcome.failure };
  }

  return outcome.assetId ? { settled: true, assetId: outcome.assetId } : { settled: true };
}

export function readAssetId(body: unknown): string | undefined {
  if (typeof body !== 'object' || body === null || !('id' in body)) {
    return undefined;
  }

  const { id } = body;
  return typeof id === 'string' && id.trim().length > 0 ? id : undefined;
}

function missingAssetId(statusCode: number): UploadOutcome {
  return {
    kind: 'failed',
    failure: {
      reason: 'missing-asset-id',
      statusCode,
      message: `Server answered ${statusCode} without an asset id.`,
    },
  };
}

function describeBody(body: unknown): string {
  if (typeof body === 'object' && body !== null && 'message' in body) {
    const { message } = body;
    if (typeof message === 'string' && message.length > 0) {
      return ` (${message})`;
    }
  }
  return '';
}
