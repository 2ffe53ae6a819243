import path from 'node:path';
import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { ProgressKeyStrategyName } from '../../application/sync/ports/progress-key-strategy.port';
import { parseSupportedExtensions } from '../../domain/sync/candidate-file';

const DEFAULTS = {
  progressFile: '.sync-progress.json',
  deviceId: 'media-sync-agent',
  supportedExtensions: '.png,.jpg,.jpeg,.webp',
  progressKeyStrategy: 'filename',
  probeTimeoutMs: 2000,
  metadataTimeoutMs: 10_000,
  uploadTimeoutMs: 60_000,
  runIntervalMs: 0,
} as const;

const PROGRESS_KEY_STRATEGIES: readonly ProgressKeyStrategyName[] = ['filename', 'content-hash'];

export const SYNC_AGENT_ENV_FILE_PATHS = ['.env.local', '.env'];

@Injectable()
export class SyncAgentConfigService {
  constructor(private readonly config: ConfigService) {}

  get sourceDir(): string {
    return this.config.getOrThrow<string>('SYNC_SOURCE_DIR');
  }

  get apiKey(): string {
    return this.config.getOrThrow<string>('MEDIA_SERVER_API_KEY');
  }

  get primaryUrl(): string {
    return this.config.getOrThrow<string>('MEDIA_SERVER_PRIMARY_URL');
  }

  get fallbackUrl(): string | undefined {
    const value = this.config.get<string>('MEDIA_SERVER_FALLBACK_URL')?.trim();
    return value ? value : undefined;
  }

  get collectionName(): string {
    return this.config.getOrThrow<string>('MEDIA_SERVER_ALBUM_NAME');
  }

  get progressFile(): string {
    return this.config.get<string>('SYNC_PROGRESS_FILE', DEFAULTS.progressFile);
  }

  get deviceId(): string {
    return this.config.get<string>('SYNC_DEVICE_ID', DEFAULTS.deviceId);
  }

  get supportedExtensions(): string[] {
    return parseSupportedExtensions(
      this.config.get<string>('SYNC_SUPPORTED_EXTENSIONS', DEFAULTS.supportedExtensions),
    );
  }

  get progressKeyStrategy(): ProgressKeyStrategyName {
    return this.config.get<ProgressKeyStrategyName>(
      'SYNC_PROGRESS_KEY_STRATEGY',
      DEFAULTS.progressKeyStrategy,
    );
  }

  get probeTimeoutMs(): number {
    return this.config.get<number>('SYNC_PROBE_TIMEOUT_MS', DEFAULTS.probeTimeoutMs);
  }

  get metadataTimeoutMs(): number {
    return this.config.get<number>('SYNC_METADATA_TIMEOUT_MS', DEFAULTS.metadataTimeoutMs);
  }

  get uploadTimeoutMs(): number {
    return this.config.get<number>('SYNC_UPLOAD_TIMEOUT_MS', DEFAULTS.uploadTimeoutMs);
  }

  /** 0 runs once and exits. */
  get runIntervalMs(): number {
    return this.config.get<number>('SYNC_INTERVAL_MS', DEFAULTS.runIntervalMs);
  }
}

export function validateSyncAgentEnvironment(
  raw: Record<string, unknown>,
): Record<string, unknown> {
  const env = { ...raw };

  env.SYNC_SOURCE_DIR = path.resolve(requiredString(raw.SYNC_SOURCE_DIR, 'SYNC_SOURCE_DIR'));
  env.MEDIA_SERVER_API_KEY = requiredString(raw.MEDIA_SERVER_API_KEY, 'MEDIA_SERVER_API_KEY');
  env.MEDIA_SERVER_PRIMARY_URL = httpUrl(
    requiredString(raw.MEDIA_SERVER_PRIMARY_URL, 'MEDIA_SERVER_PRIMARY_URL'),
    'MEDIA_SERVER_PRIMARY_URL',
  );
  const fallbackUrl = optionalString(raw.MEDIA_SERVER_FALLBACK_URL);
  env.MEDIA_SERVER_FALLBACK_URL = fallbackUrl
    ? httpUrl(fallbackUrl, 'MEDIA_SERVER_FALLBACK_URL')
    : undefined;
  env.MEDIA_SERVER_ALBUM_NAME = requiredString(raw.MEDIA_SERVER_ALBUM_NAME, 'MEDIA_SERVER_ALBUM_NAME');
  env.SYNC_PROGRESS_FILE = path.resolve(
    optionalString(raw.SYNC_PROGRESS_FILE) ?? DEFAULTS.progressFile,
  );
  env.SYNC_DEVICE_ID = optionalString(raw.SYNC_DEVICE_ID) ?? DEFAULTS.deviceId;
  env.SYNC_SUPPORTED_EXTENSIONS =
    optionalString(raw.SYNC_SUPPORTED_EXTENSIONS) ?? DEFAULTS.supportedExtensions;
  env.SYNC_PROGRESS_KEY_STRATEGY = progressKeyStrategy(raw.SYNC_PROGRESS_KEY_STRATEGY);
  env.SYNC_PROBE_TIMEOUT_MS = toPositiveInt(
    raw.SYNC_PROBE_TIMEOUT_MS,
    DEFAULTS.probeTimeoutMs,
    'SYNC_PROBE_TIMEOUT_MS',
  );
  env.SYNC_METADATA_TIMEOUT_MS = toPositiveInt(
    raw.SYNC_METADATA_TIMEOUT_MS,
    DEFAULTS.metadataTimeoutMs,
    'SYNC_METADATA_TIMEOUT_MS',
  );
  env.SYNC_UPLOAD_TIMEOUT_MS = toPositiveInt(
    raw.SYNC_UPLOAD_TIMEOUT_MS,
    DEFAULTS.uploadTimeoutMs,
    'SYNC_UPLOAD_TIMEOUT_MS',
  );
  env.SYNC_INTERVAL_MS = toNonNegativeInt(raw.SYNC_INTERVAL_MS, DEFAULTS.runIntervalMs, 'SYNC_INTERVAL_MS');

  return env;
}

function requiredString(value: unknown, name: string): string {
  const normalized = optionalString(value);
  if (!normalized) {
    throw new Error(`[sync-agent] ${name} is required.`);
  }
  return normalized;
}

function optionalString(value: unknown): string | undefined {
  if (typeof value !== 'string') {
    return undefined;
  }

  const normalized = value.trim();
  return normalized.length > 0 ? normalized : undefined;
}

function httpUrl(value: string, name: string): string {
  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch {
    throw new Error(`[sync-agent] ${name} must be an absolute http(s) URL.`);
  }

  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new Error(`[sync-agent] ${name} must be an absolute http(s) URL.`);
  }

  return value.replace(/\/+$/, '');
}

function progressKeyStrategy(value: unknown): ProgressKeyStrategyName {
  const normalized = optionalString(value)?.toLowerCase();
  if (normalized === undefined) {
    return DEFAULTS.progressKeyStrategy;
  }

  const match = PROGRESS_KEY_STRATEGIES.find((strategy) => strategy === normalized);
  if (!match) {
    throw new Error(
      `[sync-agent] SYNC_PROGRESS_KEY_STRATEGY must be one of: ${PROGRESS_KEY_STRATEGIES.join(', ')}.`,
    );
  }
  return match;
}

function toPositiveInt(value: unknown, fallback: number, name: string): number {
  const parsed = toInt(value, fallback);

  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new Error(`[sync-agent] ${name} must be a positive integer.`);
  }

  return Math.trunc(parsed);
}

function toNonNegativeInt(value: unknown, fallback: number, name: string): number {
  const parsed = toInt(value, fallback);

  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new Error(`[sync-agent] ${name} must be zero or a positive integer.`);
  }

  return Math.trunc(parsed);
}

function toInt(value: unknown, fallback: number): number {
  if (value === undefined || value === null || value === '') {
    return fallback;
  }

  return typeof value === 'number' ? value : Number.parseInt(String(value), 10);
}
