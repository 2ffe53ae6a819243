import type { ResolvedCollection } from './collection';
import type { SyncAbortKind } from './sync-errors';

export type SyncRunPhase =
  | 'idle'
  | 'endpoint-selected'
  | 'collection-resolved'
  | 'processing'
  | 'done'
  | 'aborted';

export type EndpointRole = 'primary' | 'fallback';

export interface SelectedEndpoint {
  baseUrl: string;
  role: EndpointRole;
}

export interface SyncRunCounters {
  candidates: number;
  skipped: number;
  processed: number;
  failed: number;
  unlinked: number;
}

export interface SyncRunState {
  runId: string;
  phase: SyncRunPhase;
  startedAt: string;
  endpoint?: SelectedEndpoint;
  collection?: ResolvedCollection;
  counters: SyncRunCounters;
  abort?: { kind: SyncAbortKind; message: string };
}

export interface SyncRunReport extends SyncRunState {
  status: 'done' | 'aborted';
  finishedAt: string;
}

const ALLOWED_TRANSITIONS: Record<SyncRunPhase, readonly SyncRunPhase[]> = {
  idle: ['endpoint-selected', 'aborted'],
  'endpoint-selected': ['collection-resolved', 'aborted'],
  'collection-resolved': ['processing', 'aborted'],
  processing: ['done', 'aborted'],
  done: [],
  aborted: [],
};

export function createSyncRun(runId: string, startedAt = new Date().toISOString()): SyncRunState {
  return {
    runId,
    phase: 'idle',
    startedAt,
    counters: {
      candidates: 0,
      skipped: 0,
      processed: 0,
      failed: 0,
      unlinked: 0,
    },
  };
}

export function canTransition(from: SyncRunPhase, to: SyncRunPhase): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

export function transitionSyncRun(
  state: SyncRunState,
  to: SyncRunPhase,
  patch: Partial<Pick<SyncRunState, 'endpoint' | 'collection' | 'abort'>> = {},
): SyncRunState {
  if (!canTransition(state.phase, to)) {
    throw new Error(`Sync run ${state.runId} cannot move from "${state.phase}" to "${to}".`);
  }

  return {
    ...state,
    ...patch,
    phase: to,
  };
}

export function finishSyncRun(state: SyncRunState, finishedAt = new Date().toISOString()): SyncRunReport {
  if (state.phase !== 'done' && state.phase !== 'aborted') {
    throw new Error(`Sync run ${state.runId} is still "${state.phase}".`);
  }

  return {
    ...state,
    counters: { ...state.counters },
    status: state.phase,
    finishedAt,
  };
}
