export interface CandidateFile {
  path: string;
  name: string;
  sizeBytes: number;
  createdAtMs: number;
  modifiedAtMs: number;
}

export const DEFAULT_SUPPORTED_EXTENSIONS = ['.png', '.jpg', '.jpeg', '.webp'] as const;

export function normalizeExtension(value: string): string {
  const normalized = value.trim().toLowerCase();
  if (normalized.length === 0) {
    return normalized;
  }
  return normalized.startsWith('.') ? normalized : `.${normalized}`;
}

export function parseSupportedExtensions(raw: string | undefined): string[] {
  const fallback = [...DEFAULT_SUPPORTED_EXTENSIONS];
  if (!raw || raw.trim().length === 0) {
    return fallback;
  }

  const values = raw
    .split(',')
    .map((value) => normalizeExtension(value))
    .filter((value) => value.length > 1);

  return values.length > 0 ? Array.from(new Set(values)) : fallback;
}

export function hasSupportedExtension(fileName: string, extensions: readonly string[]): boolean {
  const lowered = fileName.toLowerCase();
  return extensions.some((extension) => lowered.endsWith(normalizeExtension(extension)));
}

/**
 * Oldest modification first. Array sort is stable, so files sharing a
 * modification time keep the order the directory listing returned them in.
 */
export function sortByModifiedAt(files: readonly CandidateFile[]): CandidateFile[] {
  return [...files].sort((a, b) => a.modifiedAtMs - b.modifiedAtMs);
}
