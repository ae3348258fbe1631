import { ContainerRegistryManagementClient } from '@azure/arm-containerregistry';
import type { TokenCredential } from '@azure/core-auth';
import { IRegistryUsageReader, RetryOptions } from '../types';
import { Logger } from '../logger';
import { withRetry } from '../utils/retry';

export interface RegistryUsageConfig extends RetryOptions {
  registryName: string;
  resourceGroup: string;
  subscriptionId: string;
  credential: TokenCredential;
}

const STORAGE_USAGE_NAME = 'Size';

/**
 * Reads registry storage quota usage from the management plane
 */
export class RegistryUsageReader implements IRegistryUsageReader {
  private readonly client: ContainerRegistryManagementClient;
  private readonly logger: Logger;
  private readonly config: RegistryUsageConfig;

  constructor(logger: Logger, config: RegistryUsageConfig) {
    this.logger = logger;
    this.config = config;
    this.client = new ContainerRegistryManagementClient(config.credential, config.subscriptionId);
  }

  async getStorageUsage(): Promise<number> {
    const { registryName, resourceGroup } = this.config;
    const result = await withRetry(
      `read usage of ${registryName}`,
      () => this.client.registries.listUsages(resourceGroup, registryName),
      this.logger,
      this.config
    );

    const usages = result.value ?? [];
    const storage = usages.find(usage => usage.name === STORAGE_USAGE_NAME) ?? usages[0];
    if (storage?.currentValue === undefined) {
      throw new Error(`No storage usage reported for registry ${registryName}`);
    }

    this.logger.debug(`[ACR] Storage usage of ${registryName}: ${storage.currentValue} ${storage.unit ?? ''}`.trim());
    return storage.currentValue;
  }
}
