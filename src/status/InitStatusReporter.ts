import { getLoggerFor } from 'global-logger-factory';
import type { ClusterApiClient } from '../cluster/ClusterApiClient';
import { errorMessage } from '../errors/ProvisioningError';

export const INIT_STATUS = {
  eventUnknown: 'EID unknown',
  eventKnown: 'EID known',
  eventChanged: 'EID changed',
  tunnelDown: 'Tunnel down',
  queryingCredential: 'Querying credential',
  credentialRetrieved: 'Credential retrieved',
  startingConfigure: 'Starting configure',
  configureFailed: 'Failed to configure',
  configured: 'Configured',
} as const;

export type InitStatus = typeof INIT_STATUS[keyof typeof INIT_STATUS];

export interface StatusReporter {
  /** 尽力上报，永不抛错 */
  report(endpoint: string, status: InitStatus): Promise<void>;
}

/**
 * 向集群的 initStatus 接口上报设备初始化进度
 */
export class InitStatusReporter implements StatusReporter {
  private readonly logger = getLoggerFor(this);
  private readonly client: ClusterApiClient;

  public constructor(client: ClusterApiClient) {
    this.client = client;
  }

  public async report(endpoint: string, status: InitStatus): Promise<void> {
    try {
      await this.client.postInitStatus(endpoint, status);
      this.logger.debug(`initStatus reported: ${status}`);
    } catch (error: unknown) {
      this.logger.warn(`Could not report initStatus "${status}": ${errorMessage(error)}`);
    }
  }
}
