import type { CandidateFile } from '../../../domain/sync/candidate-file';

export const PROGRESS_KEY_STRATEGY_PORT = Symbol('PROGRESS_KEY_STRATEGY_PORT');

export type ProgressKeyStrategyName = 'filename' | 'content-hash';

export interface ProgressKeyStrategyPort {
  readonly name: ProgressKeyStrategyName;
  keyFor(file: CandidateFile): Promise<string>;
}
