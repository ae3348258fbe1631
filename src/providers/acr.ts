import { ContainerRegistryClient, KnownContainerRegistryAudience } from '@azure/container-registry';
import type { TokenCredential } from '@azure/core-auth';
import { IRegistryClient, ImageManifest, NotFoundError, RetryOptions } from '../types';
import { Logger } from '../logger';
import { withRetry } from '../utils/retry';
import { classifyError } from '../utils/errors';

export interface AcrProviderConfig extends RetryOptions {
  registryName: string;
  credential: TokenCredential;
  audience?: string;
}

/**
 * Azure Container Registry client
 *
 * Pagination is handled by the SDK's async iterators. Every call goes through
 * withRetry, so callers only ever see the registry error taxonomy.
 */
export class AcrProvider implements IRegistryClient {
  public readonly loginServer: string;
  private readonly client: ContainerRegistryClient;
  private readonly logger: Logger;
  private readonly retryOptions: RetryOptions;

  constructor(logger: Logger, config: AcrProviderConfig) {
    this.logger = logger;
    this.loginServer = `${config.registryName.toLowerCase()}.azurecr.io`;
    this.retryOptions = { retry: config.retry, throttle: config.throttle };
    this.client = new ContainerRegistryClient(`https://${this.loginServer}`, config.credential, {
      audience: config.audience ?? KnownContainerRegistryAudience.AzureResourceManagerPublicCloud,
    });
  }

  async listRepositories(): Promise<string[]> {
    this.logger.debug(`[ACR] Listing repositories of ${this.loginServer}`);
    return withRetry(
      `list repositories of ${this.loginServer}`,
      async () => {
        const repositories: string[] = [];
        for await (const name of this.client.listRepositoryNames()) {
          repositories.push(name);
        }
        return repositories;
      },
      this.logger,
      this.retryOptions
    );
  }

  async listManifests(repository: string): Promise<ImageManifest[]> {
    this.logger.debug(`[ACR] Listing manifests of ${repository}`);
    return withRetry(
      `list manifests of ${repository}`,
      async () => {
        const manifests: ImageManifest[] = [];
        const pages = this.client.getRepository(repository).listManifestProperties({
          order: 'LastUpdatedOnDescending',
        });
        for await (const properties of pages) {
          manifests.push({
            repository,
            digest: properties.digest,
            tags: [...(properties.tags ?? [])],
            lastUpdatedOn: properties.lastUpdatedOn,
            sizeInBytes: properties.sizeInBytes,
          });
        }
        this.logger.debug(`[ACR] ${repository}: ${manifests.length} manifests`);
        return manifests;
      },
      this.logger,
      this.retryOptions
    );
  }

  async deleteManifest(repository: string, digest: string): Promise<void> {
    this.logger.debug(`[ACR] Deleting manifest ${repository}@${digest}`);
    await withRetry(
      `delete manifest ${repository}@${digest}`,
      () => this.client.getArtifact(repository, digest).delete(),
      this.logger,
      this.retryOptions
    );
  }

  async deleteTag(repository: string, tag: string): Promise<void> {
    this.logger.debug(`[ACR] Deleting tag ${repository}:${tag}`);
    await withRetry(
      `delete tag ${repository}:${tag}`,
      () => this.client.getArtifact(repository, tag).deleteTag(tag),
      this.logger,
      this.retryOptions
    );
  }

  async resolveTagToDigest(repository: string, tag: string): Promise<string | undefined> {
    try {
      const properties = await withRetry(
        `resolve tag ${repository}:${tag}`,
        () => this.client.getArtifact(repository, tag).getTagProperties(tag),
        this.logger,
        this.retryOptions
      );
      return properties.digest;
    } catch (error) {
      const classified = classifyError(error, `resolve tag ${repository}:${tag}`);
      if (classified instanceof NotFoundError) {
        this.logger.debug(`[ACR] Tag ${repository}:${tag} no longer exists`);
        return undefined;
      }
      throw classified;
    }
  }
}
