import { CleanupConfig } from '../types';

const DIGEST_PATTERN = /^sha256:[a-f0-9]{64}$/i;
const REPOSITORY_PATTERN = /^[a-z0-9]+(?:[._/-][a-z0-9]+)*$/;
const TAG_PATTERN = /^[\w][\w.-]{0,127}$/;

/**
 * Parsed image reference. `repository` is absent for a bare digest,
 * which pins that digest in every repository.
 */
export type ImageReference =
  | { kind: 'digest'; repository?: string; digest: string }
  | { kind: 'tag'; repository: string; tag: string };

/**
 * Strip a leading registry host (`myregistry.azurecr.io/`, `localhost:5000/`)
 */
function stripRegistryHost(name: string): string {
  const slash = name.indexOf('/');
  if (slash === -1) {
    return name;
  }
  const head = name.slice(0, slash);
  if (head.includes('.') || head.includes(':') || head === 'localhost') {
    return name.slice(slash + 1);
  }
  return name;
}

/**
 * Parse `sha256:...`, `[registry/]repo[:tag]@sha256:...` or `[registry/]repo:tag`
 */
export function parseImageReference(reference: string): ImageReference {
  const value = reference.trim();

  if (DIGEST_PATTERN.test(value)) {
    return { kind: 'digest', digest: value.toLowerCase() };
  }

  const at = value.indexOf('@');
  if (at !== -1) {
    let repository = stripRegistryHost(value.slice(0, at));
    const digest = value.slice(at + 1);
    // `repo:tag@sha256:...` pins the digest, the tag is informational
    const tagColon = repository.lastIndexOf(':');
    if (tagColon > repository.lastIndexOf('/')) {
      if (!TAG_PATTERN.test(repository.slice(tagColon + 1))) {
        throw new Error(`Image reference format ${reference} is not valid`);
      }
      repository = repository.slice(0, tagColon);
    }
    if (!REPOSITORY_PATTERN.test(repository) || !DIGEST_PATTERN.test(digest)) {
      throw new Error(`Image reference format ${reference} is not valid`);
    }
    return { kind: 'digest', repository, digest: digest.toLowerCase() };
  }

  const colon = value.lastIndexOf(':');
  if (colon > value.lastIndexOf('/')) {
    const repository = stripRegistryHost(value.slice(0, colon));
    const tag = value.slice(colon + 1);
    if (REPOSITORY_PATTERN.test(repository) && TAG_PATTERN.test(tag)) {
      return { kind: 'tag', repository, tag };
    }
  }

  throw new Error(`Image reference format ${reference} is not valid`);
}

/**
 * Wildcard match supporting `*` and `?`
 */
export function matchesPattern(value: string, patterns: readonly string[]): boolean {
  return patterns.some(pattern => {
    const escaped = pattern.replace(/[.+^${}()|[\]\\]/g, '\\$&');
    const regex = new RegExp('^' + escaped.replace(/\*/g, '.*').replace(/\?/g, '.') + '$');
    return regex.test(value);
  });
}

/**
 * Split a comma or newline separated input
 */
export function parseList(input: string | undefined): string[] {
  if (!input) {
    return [];
  }
  return input
    .split(/[,\n]/)
    .map(item => item.trim())
    .filter(item => item !== '');
}

/**
 * Parse an integer input, falling back to a default when empty
 */
export function parseIntegerInput(name: string, value: string | undefined, defaultValue?: number): number {
  if (value === undefined || value.trim() === '') {
    if (defaultValue === undefined) {
      throw new Error(`${name} is required`);
    }
    return defaultValue;
  }
  if (!/^-?\d+$/.test(value.trim())) {
    throw new Error(`${name} must be an integer, got "${value}"`);
  }
  return parseInt(value, 10);
}

/**
 * Validate the format of the deployed image references
 */
export function validateImageReferences(references: readonly string[]): void {
  for (const reference of references) {
    parseImageReference(reference);
  }
}

/**
 * Validate cleanup configuration
 */
export function validateCleanupConfig(config: Partial<CleanupConfig>): void {
  if (!config.registryName) {
    throw new Error('registry-name is required');
  }

  if (!/^[a-zA-Z0-9]{5,50}$/.test(config.registryName)) {
    throw new Error(`registry-name must be 5-50 alphanumeric characters, got "${config.registryName}"`);
  }

  if (!config.resourceGroup) {
    throw new Error('resource-group is required');
  }

  if (config.maxAgeDays !== undefined && config.maxAgeDays < 0) {
    throw new Error('max-age-days must be a non-negative number');
  }

  if (config.retry !== undefined && config.retry < 0) {
    throw new Error('retry must be a non-negative number');
  }

  if (config.throttle !== undefined && config.throttle < 0) {
    throw new Error('throttle must be a non-negative number');
  }

  if (config.listConcurrency !== undefined && config.listConcurrency < 1) {
    throw new Error('list-concurrency must be at least 1');
  }

  if (config.deleteConcurrency !== undefined && config.deleteConcurrency < 1) {
    throw new Error('delete-concurrency must be at least 1');
  }

  if (config.timeoutMinutes !== undefined && config.timeoutMinutes < 1) {
    throw new Error('timeout-minutes must be at least 1');
  }

  if (config.deployedImages) {
    validateImageReferences(config.deployedImages);
  }
}
