import { Inject, Injectable, Logger } from '@nestjs/common';
import { createJsonLogEntry } from '../../shared';
import { NoReachableEndpointError } from '../../domain/sync/sync-errors';
import type { SelectedEndpoint } from '../../domain/sync/sync-run';
import { MEDIA_SERVER_PORT, type MediaServerPort } from './ports/media-server.port';

export interface EndpointCandidates {
  primaryUrl?: string;
  fallbackUrl?: string;
}

/**
 * Only the primary endpoint is probed. A configured fallback is taken as
 * available without a round-trip; if it is down, the first real request fails.
 */
@Injectable()
export class SelectEndpointService {
  private readonly logger = new Logger(SelectEndpointService.name);

  constructor(@Inject(MEDIA_SERVER_PORT) private readonly mediaServer: MediaServerPort) {}

  async select(candidates: EndpointCandidates, runId: string): Promise<SelectedEndpoint> {
    let primaryDetail = 'primary endpoint not configured';

    if (candidates.primaryUrl) {
      this.logger.log(JSON.stringify(createJsonLogEntry({
        level: 'info',
        service: 'sync-agent',
        message: 'Probing primary media server endpoint.',
        correlationId: runId,
        endpoint: candidates.primaryUrl,
      })));

      const probe = await this.mediaServer.probe(candidates.primaryUrl);
      if (probe.reachable) {
        this.logger.log(JSON.stringify(createJsonLogEntry({
          level: 'info',
          service: 'sync-agent',
          message: 'Primary endpoint reachable; using it for this run.',
          correlationId: runId,
          endpoint: candidates.primaryUrl,
        })));
        return { baseUrl: candidates.primaryUrl, role: 'primary' };
      }

      primaryDetail = probe.detail ?? 'primary endpoint unreachable';
      this.logger.warn(JSON.stringify(createJsonLogEntry({
        level: 'warn',
        service: 'sync-agent',
        message: 'Primary endpoint probe failed.',
        correlationId: runId,
        endpoint: candidates.primaryUrl,
        metadata: { detail: primaryDetail, statusCode: probe.statusCode },
      })));
    }

    if (candidates.fallbackUrl) {
      this.logger.log(JSON.stringify(createJsonLogEntry({
        level: 'info',
        service: 'sync-agent',
        message: 'Switching to fallback endpoint.',
        correlationId: runId,
        endpoint: candidates.fallbackUrl,
      })));
      return { baseUrl: candidates.fallbackUrl, role: 'fallback' };
    }

    throw new NoReachableEndpointError(
      `No reachable media server endpoint (${primaryDetail}; no fallback configured).`,
    );
  }
}
