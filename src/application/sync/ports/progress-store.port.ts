export const PROGRESS_STORE_PORT = Symbol('PROGRESS_STORE_PORT');

export interface ProgressStoreSnapshot {
  keys: string[];
  warning?: string;
}

export interface ProgressStorePort {
  load(): Promise<ProgressStoreSnapshot>;
  save(keys: readonly string[]): Promise<void>;
}
