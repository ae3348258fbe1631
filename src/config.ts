import * as core from '@actions/core';
import { CleanupConfig } from './types';
import { parseIntegerInput, parseList, validateCleanupConfig } from './utils/validation';
import { Logger } from './logger';

/**
 * Repositories holding images used by jobs, whose pods only exist while the
 * job runs, plus chart and test repositories
 */
export const DEFAULT_EXCLUDED_REPOSITORIES = [
  'helm-charts*',
  'e2e-tests*',
  'ingress-nginx/kube-webhook-certgen',
  'multiarch/qemu-user-static',
  'busybox',
];

/**
 * Unparsed settings, as read from action inputs or command-line options
 */
export interface RawInputs {
  registryName: string;
  resourceGroup: string;
  maxAgeDays?: string;
  deployedImages?: string;
  cleanupAll?: boolean;
  dryRun?: boolean;
  excludeRepositories?: string;
  listConcurrency?: string;
  deleteConcurrency?: string;
  retry?: string;
  throttle?: string;
  timeoutMinutes?: string;
  subscriptionId?: string;
  verbose?: boolean;
}

export type ParsedInputs = {
  config: CleanupConfig;
  logger: Logger;
};

function parseBoolean(val?: string): boolean {
  return val?.toLowerCase() === 'true' || val === '1';
}

export function buildCleanupConfig(raw: RawInputs, env: NodeJS.ProcessEnv = {}): CleanupConfig {
  const cleanupAll = raw.cleanupAll ?? false;

  const config: CleanupConfig = {
    registryName: raw.registryName.trim(),
    resourceGroup: raw.resourceGroup.trim(),
    subscriptionId: raw.subscriptionId || env.AZURE_SUBSCRIPTION_ID || undefined,
    maxAgeDays: cleanupAll ? 0 : parseIntegerInput('max-age-days', raw.maxAgeDays),
    deployedImages: parseList(raw.deployedImages),
    cleanupAll,
    excludeRepositories:
      raw.excludeRepositories === undefined || raw.excludeRepositories.trim() === ''
        ? [...DEFAULT_EXCLUDED_REPOSITORIES]
        : parseList(raw.excludeRepositories),
    dryRun: raw.dryRun ?? false,
    listConcurrency: parseIntegerInput('list-concurrency', raw.listConcurrency, 4),
    deleteConcurrency: parseIntegerInput('delete-concurrency', raw.deleteConcurrency, 4),
    retry: parseIntegerInput('retry', raw.retry, 3),
    throttle: parseIntegerInput('throttle', raw.throttle, 1000),
    timeoutMinutes: parseIntegerInput('timeout-minutes', raw.timeoutMinutes, 60),
    verbose: raw.verbose ?? false,
  };

  validateCleanupConfig(config);
  return config;
}

/**
 * Read the action inputs
 */
export function getInputs(): ParsedInputs {
  const cleanupAll = core.getBooleanInput('cleanup-all');
  const raw: RawInputs = {
    registryName: core.getInput('registry-name', { required: true }),
    resourceGroup: core.getInput('resource-group', { required: true }),
    maxAgeDays: cleanupAll ? core.getInput('max-age-days') : core.getInput('max-age-days', { required: true }),
    deployedImages: core.getInput('deployed-images'),
    cleanupAll,
    dryRun: core.getBooleanInput('dry-run'),
    excludeRepositories: core.getInput('exclude-repositories'),
    listConcurrency: core.getInput('list-concurrency'),
    deleteConcurrency: core.getInput('delete-concurrency'),
    retry: core.getInput('retry'),
    throttle: core.getInput('throttle'),
    timeoutMinutes: core.getInput('timeout-minutes'),
    subscriptionId: core.getInput('subscription-id'),
    verbose: core.getBooleanInput('verbose'),
  };

  const debugMode =
    core.isDebug() ||
    parseBoolean(process.env.ACTIONS_STEP_DEBUG) ||
    parseBoolean(process.env.ACTIONS_RUNNER_DEBUG) ||
    parseBoolean(process.env.RUNNER_DEBUG);

  const config = buildCleanupConfig(raw, process.env);
  const logger = new Logger(config.verbose, debugMode);

  return { config, logger };
}
