import { IRegistryClient, DeletionPlan, DeletionResult, PlanItem, NotFoundError } from '../types';
import { Logger } from '../logger';
import { Deadline, mapLimit } from '../utils/concurrency';
import { errorMessage } from '../utils/errors';
import { formatImage } from '../utils/format';

export interface ExecuteOptions {
  dryRun: boolean;
  concurrency: number;
  deadline?: Deadline;
}

/**
 * Applies a deletion plan. Items are independent: a failure is recorded
 * and the remaining items still run. Results are returned in plan order.
 */
export class DeletionExecutor {
  private readonly client: IRegistryClient;
  private readonly logger: Logger;

  constructor(client: IRegistryClient, logger: Logger) {
    this.client = client;
    this.logger = logger;
  }

  async execute(plan: DeletionPlan, options: ExecuteOptions): Promise<DeletionResult[]> {
    if (options.dryRun) {
      for (const item of plan) {
        this.logger.info(`DRY RUN: would delete ${this.describe(item)}`);
      }
      return plan.map(item => this.result(item, 'deleted', 'would delete'));
    }

    const deadline = options.deadline ?? Deadline.never();

    return mapLimit(plan, options.concurrency, async item => {
      if (deadline.isExpired()) {
        return this.result(item, 'skipped', 'deadline exceeded');
      }
      return this.deleteItem(item);
    });
  }

  private async deleteItem(item: PlanItem): Promise<DeletionResult> {
    this.logger.warning(`Deleting ${this.describe(item)}`);

    try {
      await this.untag(item);
    } catch (error) {
      const message = `Failed to untag ${item.repository}@${item.digest}: ${errorMessage(error)}`;
      this.logger.error(message);
      return this.result(item, 'failed', message);
    }

    try {
      await this.client.deleteManifest(item.repository, item.digest);
      return this.result(item, 'deleted', item.reason);
    } catch (error) {
      if (error instanceof NotFoundError) {
        this.logger.debug(`Manifest ${item.repository}@${item.digest} was already deleted`);
        return this.result(item, 'deleted', 'already deleted');
      }
      const message = `Failed to delete manifest ${item.repository}@${item.digest}: ${errorMessage(error)}`;
      this.logger.error(message);
      return this.result(item, 'failed', message);
    }
  }

  /**
   * Delete the item's tags that still point to its digest. A tag that was
   * moved to another manifest since the inventory was taken is left alone.
   */
  private async untag(item: PlanItem): Promise<void> {
    for (const tag of item.tags) {
      const current = await this.client.resolveTagToDigest(item.repository, tag);
      if (current !== item.digest) {
        this.logger.debug(
          current === undefined
            ? `Tag ${item.repository}:${tag} is already gone`
            : `Tag ${item.repository}:${tag} now points to ${current}, leaving it in place`
        );
        continue;
      }
      try {
        await this.client.deleteTag(item.repository, tag);
      } catch (error) {
        if (!(error instanceof NotFoundError)) {
          throw error;
        }
      }
    }
  }

  private describe(item: PlanItem): string {
    return `${item.reason} image ${formatImage(item.repository, item.digest, item.tags)}. Image is ${item.ageDays} days old.`;
  }

  private result(item: PlanItem, status: DeletionResult['status'], reason: string): DeletionResult {
    return { repository: item.repository, digest: item.digest, status, reason };
  }
}
