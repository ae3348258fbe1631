/**
 * Type definitions for the Azure Container Registry cleanup
 */

export type DeletionReason = 'dangling' | 'expired';

export type DeletionStatus = 'deleted' | 'failed' | 'skipped';

/**
 * Manifest snapshot as listed from the registry
 */
export interface ImageManifest {
  repository: string;
  digest: string;
  tags: readonly string[];
  lastUpdatedOn: Date;
  sizeInBytes?: number;
}

/**
 * Retention policy for a single run
 */
export interface RetentionPolicy {
  readonly maxAgeDays: number;
  /**
   * Image references pinned as deployed: `sha256:...`, `repo@sha256:...`,
   * `repo:tag`, optionally prefixed with the registry login server
   */
  readonly exclusions: readonly string[];
  readonly excludedRepositories: readonly string[];
}

export interface PlanItem {
  repository: string;
  digest: string;
  tags: readonly string[];
  reason: DeletionReason;
  ageDays: number;
  sizeInBytes?: number;
}

export type DeletionPlan = readonly PlanItem[];

export interface DeletionResult {
  repository: string;
  digest: string;
  status: DeletionStatus;
  reason: string;
}

/**
 * Registry client interface
 */
export interface IRegistryClient {
  /**
   * Registry login server, e.g. `myregistry.azurecr.io`
   */
  readonly loginServer: string;

  /**
   * List all repository names
   */
  listRepositories(): Promise<string[]>;

  /**
   * List every manifest of a repository, following pagination
   */
  listManifests(repository: string): Promise<ImageManifest[]>;

  /**
   * Delete a manifest by digest
   */
  deleteManifest(repository: string, digest: string): Promise<void>;

  /**
   * Delete a tag
   */
  deleteTag(repository: string, tag: string): Promise<void>;

  /**
   * Resolve a tag to the digest it currently points to, `undefined` if the tag does not exist
   */
  resolveTagToDigest(repository: string, tag: string): Promise<string | undefined>;
}

/**
 * Reads the storage a registry currently uses
 */
export interface IRegistryUsageReader {
  getStorageUsage(): Promise<number>;
}

/**
 * Cleanup configuration
 */
export interface CleanupConfig {
  registryName: string;
  resourceGroup: string;
  subscriptionId?: string;
  maxAgeDays: number;
  deployedImages: string[];
  cleanupAll: boolean;
  excludeRepositories: string[];
  dryRun: boolean;
  listConcurrency: number;
  deleteConcurrency: number;
  retry: number;
  throttle: number;
  timeoutMinutes: number;
  verbose: boolean;
}

/**
 * Cleanup summary
 */
export interface CleanupSummary {
  attempted: number;
  succeeded: number;
  failed: number;
  skipped: number;
  failures: DeletionResult[];
  results: DeletionResult[];
  plan: DeletionPlan;
  skippedRepositories: string[];
  releasedBytes?: number;
}

/**
 * Retry options for registry calls
 */
export interface RetryOptions {
  retry?: number;
  throttle?: number;
}

/**
 * Error types
 */
export class RegistryError extends Error {
  constructor(
    message: string,
    public readonly statusCode?: number,
    public readonly registryType?: string
  ) {
    super(message);
    this.name = 'RegistryError';
  }
}

export class AuthenticationError extends RegistryError {
  constructor(message: string, registryType?: string) {
    super(message, 401, registryType);
    this.name = 'AuthenticationError';
  }
}

export class NotFoundError extends RegistryError {
  constructor(message: string, registryType?: string) {
    super(message, 404, registryType);
    this.name = 'NotFoundError';
  }
}

/**
 * Retryable transport failure (timeouts, resets, throttling, 5xx)
 */
export class TransientNetworkError extends RegistryError {
  constructor(message: string, statusCode?: number, registryType?: string) {
    super(message, statusCode, registryType);
    this.name = 'TransientNetworkError';
  }
}

export class FatalRegistryError extends RegistryError {
  constructor(message: string, statusCode?: number, registryType?: string) {
    super(message, statusCode, registryType);
    this.name = 'FatalRegistryError';
  }
}

/**
 * Exclusion entry that could not be resolved to a digest
 */
export interface PolicyResolutionWarning {
  reference: string;
  message: string;
}
