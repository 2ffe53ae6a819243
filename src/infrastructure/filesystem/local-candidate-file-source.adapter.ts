import { readdir, stat } from 'node:fs/promises';
import path from 'node:path';
import { Injectable, Logger } from '@nestjs/common';
import type { CandidateFileSourcePort } from '../../application/sync/ports/candidate-file-source.port';
import { hasSupportedExtension, type CandidateFile } from '../../domain/sync/candidate-file';

@Injectable()
export class LocalCandidateFileSourceAdapter implements CandidateFileSourcePort {
  private readonly logger = new Logger(LocalCandidateFileSourceAdapter.name);

  async directoryExists(directory: string): Promise<boolean> {
    try {
      return (await stat(directory)).isDirectory();
    } catch {
      return false;
    }
  }

  async listCandidates(directory: string, extensions: readonly string[]): Promise<CandidateFile[]> {
    const names = await readdir(directory);
    const candidates: CandidateFile[] = [];

    for (const name of names) {
      if (!hasSupportedExtension(name, extensions)) {
        continue;
      }

      const filePath = path.join(directory, name);
      try {
        // stat follows symbolic links; the link target decides.
        const stats = await stat(filePath);
        if (!stats.isFile()) {
          continue;
        }
        candidates.push({
          path: filePath,
          name,
          sizeBytes: stats.size,
          // Some filesystems report no birth time (0); fall back to the inode change time.
          createdAtMs: stats.birthtimeMs > 0 ? stats.birthtimeMs : stats.ctimeMs,
          modifiedAtMs: stats.mtimeMs,
        });
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        this.logger.warn(`Skipping ${name}: unable to read file metadata (${reason}).`);
      }
    }

    return candidates;
  }
}
