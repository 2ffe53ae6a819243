import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { Injectable } from '@nestjs/common';
import type {
  ProgressStorePort,
  ProgressStoreSnapshot,
} from '../../application/sync/ports/progress-store.port';
import { SyncAgentConfigService } from '../config/sync-agent-config.service';

@Injectable()
export class JsonFileProgressStoreAdapter implements ProgressStorePort {
  constructor(private readonly config: SyncAgentConfigService) {}

  async load(): Promise<ProgressStoreSnapshot> {
    const filePath = this.config.progressFile;
    let raw: string;

    try {
      raw = await readFile(filePath, 'utf8');
    } catch (error) {
      if (isMissingFileError(error)) {
        return { keys: [] };
      }
      const reason = error instanceof Error ? error.message : String(error);
      return { keys: [], warning: `Progress store ${filePath} is unreadable (${reason}).` };
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      return { keys: [], warning: `Progress store ${filePath} is not valid JSON.` };
    }

    if (!Array.isArray(parsed)) {
      return { keys: [], warning: `Progress store ${filePath} does not hold a JSON array.` };
    }

    const keys = parsed.filter((value): value is string => typeof value === 'string');
    if (keys.length !== parsed.length) {
      return {
        keys,
        warning: `Progress store ${filePath} had ${parsed.length - keys.length} non-string entries; they were ignored.`,
      };
    }

    return { keys };
  }

  /** Writes beside the store and renames over it, so a crash never leaves a half-written file. */
  async save(keys: readonly string[]): Promise<void> {
    const filePath = this.config.progressFile;
    const tempPath = `${filePath}.${process.pid}.tmp`;

    await mkdir(path.dirname(filePath), { recursive: true });
    try {
      await writeFile(tempPath, `${JSON.stringify(keys, null, 2)}\n`, 'utf8');
      await rename(tempPath, filePath);
    } catch (error) {
      await rm(tempPath, { force: true });
      throw error;
    }
  }
}

function isMissingFileError(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === 'ENOENT'
  );
}
