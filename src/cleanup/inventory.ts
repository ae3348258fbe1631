import { IRegistryClient, ImageManifest, AuthenticationError } from '../types';
import { Logger } from '../logger';
import { Deadline, mapLimit } from '../utils/concurrency';
import { errorMessage } from '../utils/errors';
import { matchesPattern } from '../utils/validation';

export interface InventoryOptions {
  excludedRepositories: readonly string[];
  concurrency: number;
  deadline?: Deadline;
}

export interface Inventory {
  manifests: ImageManifest[];
  repositories: string[];
  skippedRepositories: string[];
}

/**
 * Fetch every manifest of every repository not excluded by pattern.
 *
 * Authentication failures abort the whole fetch. Any other failure (retries
 * already exhausted) skips that repository only, as does every repository
 * not yet started when the deadline passes.
 */
export async function fetchInventory(
  client: IRegistryClient,
  logger: Logger,
  options: InventoryOptions
): Promise<Inventory> {
  const allRepositories = await client.listRepositories();
  const repositories = [...allRepositories]
    .filter(repository => {
      if (matchesPattern(repository, options.excludedRepositories)) {
        logger.verboseInfo(`Skipping excluded repository ${repository}`);
        return false;
      }
      return true;
    })
    .sort();

  logger.info(`Checking ${repositories.length} of ${allRepositories.length} repositories in ${client.loginServer}`);

  const deadline = options.deadline ?? Deadline.never();
  const listings = await mapLimit(repositories, options.concurrency, async repository => {
    if (deadline.isExpired()) {
      logger.warning(`Deadline exceeded, repository ${repository} was not inspected`);
      return undefined;
    }
    logger.info(`-> Checking repository ${repository}`);
    try {
      return await client.listManifests(repository);
    } catch (error) {
      if (error instanceof AuthenticationError) {
        throw error;
      }
      logger.error(`Failed to list manifests of ${repository}: ${errorMessage(error)}`);
      return undefined;
    }
  });

  const manifests: ImageManifest[] = [];
  const skippedRepositories: string[] = [];
  listings.forEach((listing, index) => {
    if (listing === undefined) {
      skippedRepositories.push(repositories[index]);
    } else {
      manifests.push(...listing);
    }
  });

  return { manifests, repositories, skippedRepositories };
}
