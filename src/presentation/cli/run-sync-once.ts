import { Logger } from '@nestjs/common';
import { createJsonLogEntry } from '../../shared';
import type { RunSyncUseCase } from '../../application/sync/run-sync.use-case';

const logger = new Logger('RunSyncOnce');

/** Resolves to the process exit code: 0 for a completed run, 1 otherwise. */
export async function runSyncOnce(useCase: Pick<RunSyncUseCase, 'execute'>): Promise<number> {
  try {
    const report = await useCase.execute();
    return report.status === 'aborted' ? 1 : 0;
  } catch (error) {
    logger.error(JSON.stringify(createJsonLogEntry({
      level: 'error',
      service: 'sync-agent',
      message: 'Sync run failed unexpectedly.',
      correlationId: 'system',
      error,
    })));
    return 1;
  }
}
