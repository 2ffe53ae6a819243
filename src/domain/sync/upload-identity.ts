import type { CandidateFile } from './candidate-file';

export interface AssetUploadFields {
  deviceAssetId: string;
  deviceId: string;
  fileCreatedAt: string;
  fileModifiedAt: string;
  isFavorite: boolean;
}

/**
 * Stable across runs for an unchanged file, so the server recognizes a
 * resubmission even when the local progress store has been lost.
 */
export function buildUploadIdentity(file: Pick<CandidateFile, 'name' | 'sizeBytes' | 'modifiedAtMs'>): string {
  return `${file.name}-${file.sizeBytes}-${Math.floor(file.modifiedAtMs / 1000)}`;
}

export function toUtcIsoString(epochMs: number): string {
  return new Date(epochMs).toISOString();
}

export function buildAssetUploadFields(file: CandidateFile, deviceId: string): AssetUploadFields {
  return {
    deviceAssetId: buildUploadIdentity(file),
    deviceId,
    fileCreatedAt: toUtcIsoString(file.createdAtMs),
    fileModifiedAt: toUtcIsoString(file.modifiedAtMs),
    isFavorite: false,
  };
}
