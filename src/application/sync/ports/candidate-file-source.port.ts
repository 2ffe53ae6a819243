import type { CandidateFile } from '../../../domain/sync/candidate-file';

export const CANDIDATE_FILE_SOURCE_PORT = Symbol('CANDIDATE_FILE_SOURCE_PORT');

export interface CandidateFileSourcePort {
  directoryExists(directory: string): Promise<boolean>;
  /** Returned in directory enumeration order. */
  listCandidates(directory: string, extensions: readonly string[]): Promise<CandidateFile[]>;
}
