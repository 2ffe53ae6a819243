import { Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { createJsonLogEntry } from '../../shared';
import { RunSyncUseCase } from '../../application/sync/run-sync.use-case';
import { SyncAgentConfigService } from '../../infrastructure/config/sync-agent-config.service';

@Injectable()
export class SyncPollerService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(SyncPollerService.name);
  private timer?: NodeJS.Timeout;
  private inFlight?: Promise<void>;

  constructor(
    private readonly runSyncUseCase: RunSyncUseCase,
    private readonly config: SyncAgentConfigService,
  ) {}

  onModuleInit(): void {
    const intervalMs = this.config.runIntervalMs;
    if (intervalMs <= 0) {
      return;
    }

    this.timer = setInterval(() => {
      void this.triggerRun();
    }, intervalMs);

    void this.triggerRun();
    this.logger.log(JSON.stringify(createJsonLogEntry({
      level: 'info',
      service: 'sync-agent',
      message: 'Sync poller started.',
      correlationId: 'system',
      metadata: {
        intervalMs,
      },
    })));
  }

  async onModuleDestroy(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
    await this.inFlight;
  }

  private triggerRun(): Promise<void> {
    // Runs never overlap; a tick that lands during a run is dropped.
    if (!this.inFlight) {
      this.inFlight = this.safeRun().finally(() => {
        this.inFlight = undefined;
      });
    }
    return this.inFlight;
  }

  private async safeRun(): Promise<void> {
    try {
      await this.runSyncUseCase.execute();
    } catch (error) {
      this.logger.error(JSON.stringify(createJsonLogEntry({
        level: 'error',
        service: 'sync-agent',
        message: 'Sync poller run failed unexpectedly.',
        correlationId: 'system',
        error,
      })));
    }
  }
}
