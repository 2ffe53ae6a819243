import { createHash } from 'node:crypto';
import { readFile } from 'node:fs/promises';
import { Injectable } from '@nestjs/common';
import type { ProgressKeyStrategyPort } from '../../application/sync/ports/progress-key-strategy.port';
import type { CandidateFile } from '../../domain/sync/candidate-file';

@Injectable()
export class ContentHashProgressKeyStrategy implements ProgressKeyStrategyPort {
  readonly name = 'content-hash';

  async keyFor(file: CandidateFile): Promise<string> {
    const buffer = await readFile(file.path);
    return `sha256:${createHash('sha256').update(buffer).digest('hex')}`;
  }
}
