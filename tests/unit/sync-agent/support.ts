import type { CandidateFile } from '../../../src/domain/sync/candidate-file';
import type { SyncAgentConfigService } from '../../../src/infrastructure/config/sync-agent-config.service';

export type SyncConfigFields = Pick<
  SyncAgentConfigService,
  | 'sourceDir'
  | 'apiKey'
  | 'primaryUrl'
  | 'fallbackUrl'
  | 'collectionName'
  | 'supportedExtensions'
  | 'deviceId'
>;

export function createConfig(overrides: Partial<SyncConfigFields> = {}): SyncAgentConfigService {
  const fields: SyncConfigFields = {
    sourceDir: '/inbox',
    apiKey: 'test-api-key',
    primaryUrl: 'http://primary.test',
    fallbackUrl: undefined,
    collectionName: 'Screenshots',
    supportedExtensions: ['.png', '.jpg', '.jpeg', '.webp'],
    deviceId: 'test-device',
    ...overrides,
  };
  return fields as SyncAgentConfigService;
}

export function candidate(name: string, modifiedAtMs: number, sizeBytes = 10): CandidateFile {
  return {
    path: `/inbox/${name}`,
    name,
    sizeBytes,
    createdAtMs: modifiedAtMs,
    modifiedAtMs,
  };
}
