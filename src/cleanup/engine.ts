import {
  IRegistryClient,
  IRegistryUsageReader,
  CleanupConfig,
  CleanupSummary,
  DeletionPlan,
  DeletionResult,
} from '../types';
import { Logger } from '../logger';
import { fetchInventory } from './inventory';
import { createRetentionPolicy, evaluate } from './retention';
import { DeletionExecutor } from './executor';
import { Deadline } from '../utils/concurrency';
import { errorMessage } from '../utils/errors';
import { formatBytes, formatCount, formatImage } from '../utils/format';

/**
 * Fold per-item results into the run summary
 */
export function summarize(
  plan: DeletionPlan,
  results: DeletionResult[],
  skippedRepositories: string[] = []
): CleanupSummary {
  const failures = results.filter(result => result.status === 'failed');
  const skipped = results.filter(result => result.status === 'skipped').length;
  const succeeded = results.filter(result => result.status === 'deleted').length;

  return {
    attempted: results.length - skipped,
    succeeded,
    failed: failures.length,
    skipped,
    failures,
    results,
    plan,
    skippedRepositories,
  };
}

/**
 * A run succeeds only when every planned deletion went through and every repository was inspected
 */
export function isSuccessful(summary: CleanupSummary): boolean {
  return summary.failed === 0 && summary.skipped === 0 && summary.skippedRepositories.length === 0;
}

/**
 * Cleanup engine: inventory, retention evaluation, deletion, summary
 */
export class CleanupEngine {
  private readonly client: IRegistryClient;
  private readonly config: CleanupConfig;
  private readonly logger: Logger;
  private readonly usageReader?: IRegistryUsageReader;
  private readonly now: () => Date;

  constructor(
    client: IRegistryClient,
    config: CleanupConfig,
    logger: Logger,
    usageReader?: IRegistryUsageReader,
    now: () => Date = () => new Date()
  ) {
    this.client = client;
    this.config = config;
    this.logger = logger;
    this.usageReader = usageReader;
    this.now = now;
  }

  async run(): Promise<CleanupSummary> {
    const deadline = new Deadline(this.config.timeoutMinutes * 60 * 1000);

    let maxAgeDays = this.config.maxAgeDays;
    if (this.config.cleanupAll) {
      this.logger.warning('All images except the currently deployed ones will be deleted');
      maxAgeDays = 0;
    }
    const policy = createRetentionPolicy(maxAgeDays, this.config.deployedImages, this.config.excludeRepositories);

    this.logger.warning(
      `Dangling images and unused images older than ${maxAgeDays} days will be deleted from the ${this.client.loginServer} container registry`
    );

    // Discovery phase
    const inventory = await this.logger.group('Fetching inventory', () =>
      fetchInventory(this.client, this.logger, {
        excludedRepositories: policy.excludedRepositories,
        concurrency: this.config.listConcurrency,
        deadline,
      })
    );
    this.logger.info(`Discovered ${formatCount(inventory.manifests.length)} manifests`);

    // Evaluation phase
    const { plan, retained, warnings } = evaluate(inventory.manifests, policy, this.now());

    for (const warning of warnings) {
      this.logger.warning(`Ignoring deployed image ${warning.reference}: ${warning.message}`);
    }

    if (retained.length > 0) {
      this.logger.info(
        `The images below are older than ${maxAgeDays} days but they are in use, therefore they will not be deleted:`
      );
      for (const manifest of retained) {
        this.logger.info(`${this.client.loginServer}/${formatImage(manifest.repository, manifest.digest, manifest.tags)}`);
      }
    }

    if (plan.length === 0) {
      this.logger.info('No obsolete images found for deletion');
      return summarize(plan, [], inventory.skippedRepositories);
    }

    const dangling = plan.filter(item => item.reason === 'dangling').length;
    this.logger.warning(`A total of ${formatCount(dangling)} dangling images will be deleted`);
    this.logger.warning(`A total of ${formatCount(plan.length - dangling)} unused images will be deleted`);

    // Deletion phase
    const usageBefore = this.config.dryRun ? undefined : await this.readUsage();
    const executor = new DeletionExecutor(this.client, this.logger);
    const results = await this.logger.group('Deleting images', () =>
      executor.execute(plan, {
        dryRun: this.config.dryRun,
        concurrency: this.config.deleteConcurrency,
        deadline,
      })
    );
    const summary = summarize(plan, results, inventory.skippedRepositories);

    if (usageBefore !== undefined) {
      const usageAfter = await this.readUsage();
      if (usageAfter !== undefined) {
        summary.releasedBytes = Math.max(0, usageBefore - usageAfter);
        this.logger.info(
          `A total of ${formatBytes(summary.releasedBytes)} has been released from the ${this.config.registryName} container registry`
        );
      }
    }

    return summary;
  }

  private async readUsage(): Promise<number | undefined> {
    if (!this.usageReader) {
      return undefined;
    }
    try {
      const usage = await this.usageReader.getStorageUsage();
      this.logger.info(`The current quota usage on ${this.config.registryName} is ${formatBytes(usage)}`);
      return usage;
    } catch (error) {
      this.logger.warning(`Could not read registry usage: ${errorMessage(error)}`);
      return undefined;
    }
  }
}
