import { Injectable } from '@nestjs/common';
import type { ProgressKeyStrategyPort } from '../../application/sync/ports/progress-key-strategy.port';
import type { CandidateFile } from '../../domain/sync/candidate-file';

// Two files with the same name in different places count as one entity.
@Injectable()
export class FileNameProgressKeyStrategy implements ProgressKeyStrategyPort {
  readonly name = 'filename';

  async keyFor(file: CandidateFile): Promise<string> {
    return file.name;
  }
}
