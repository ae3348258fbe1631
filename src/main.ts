import type { TokenCredential } from '@azure/core-auth';
import { CleanupConfig, CleanupSummary } from './types';
import { Logger } from './logger';
import { AcrProvider } from './providers/acr';
import { RegistryUsageReader } from './providers/usage';
import { CleanupEngine } from './cleanup/engine';

/**
 * Build the registry clients for the configured registry and run one cleanup
 */
export async function runCleanup(
  config: CleanupConfig,
  credential: TokenCredential,
  logger: Logger
): Promise<CleanupSummary> {
  const retryOptions = { retry: config.retry, throttle: config.throttle };

  const client = new AcrProvider(logger, {
    registryName: config.registryName,
    credential,
    ...retryOptions,
  });

  let usageReader: RegistryUsageReader | undefined;
  if (config.subscriptionId) {
    usageReader = new RegistryUsageReader(logger, {
      registryName: config.registryName,
      resourceGroup: config.resourceGroup,
      subscriptionId: config.subscriptionId,
      credential,
      ...retryOptions,
    });
  } else {
    logger.verboseInfo('No subscription id configured, storage usage will not be reported');
  }

  const engine = new CleanupEngine(client, config, logger, usageReader);
  return engine.run();
}
