#!/usr/bin/env node
import { Command } from 'commander';
import { buildCleanupConfig, DEFAULT_EXCLUDED_REPOSITORIES } from './config';
import { createCredential } from './credentials';
import { runCleanup } from './main';
import { isSuccessful } from './cleanup/engine';
import { ConsoleSink, Logger } from './logger';
import { errorMessage } from './utils/errors';

interface CliOptions {
  dryRun: boolean;
  cleanupAll: boolean;
  excludeRepositories: string;
  listConcurrency: string;
  deleteConcurrency: string;
  retry: string;
  throttle: string;
  timeoutMinutes: string;
  subscriptionId?: string;
  verbose: boolean;
  debug: boolean;
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('acr-cleanup')
    .description(
      'Clean up an Azure container registry by deleting dangling images and images older than a number of days that are not deployed'
    )
    .argument('<registry-name>', 'registry name, without .azurecr.io')
    .argument('<resource-group>', 'resource group of the registry')
    .argument('<max-age-days>', 'delete tagged images last updated more than this many days ago')
    .argument('[deployed-images]', 'comma-separated image references that must be kept', '')
    .option('--dry-run', 'report what would be deleted without deleting', false)
    .option('--cleanup-all', 'delete every image that is not deployed, regardless of age', false)
    .option('--exclude-repositories <patterns>', 'comma-separated repository patterns never inspected', DEFAULT_EXCLUDED_REPOSITORIES.join(','))
    .option('--list-concurrency <n>', 'repositories listed at once', '4')
    .option('--delete-concurrency <n>', 'deletions issued at once', '4')
    .option('--retry <n>', 'retries for transient registry errors', '3')
    .option('--throttle <ms>', 'base backoff delay between retries', '1000')
    .option('--timeout-minutes <n>', 'deadline for the whole run', '60')
    .option('--subscription-id <id>', 'subscription of the registry, enables storage usage reporting')
    .option('--verbose', 'verbose output', false)
    .option('--debug', 'debug output', false)
    .action(async (registryName: string, resourceGroup: string, maxAgeDays: string, deployedImages: string, options: CliOptions) => {
      const logger = new Logger(options.verbose, options.debug, new ConsoleSink());
      try {
        const config = buildCleanupConfig(
          {
            registryName,
            resourceGroup,
            maxAgeDays,
            deployedImages,
            cleanupAll: options.cleanupAll,
            dryRun: options.dryRun,
            excludeRepositories: options.excludeRepositories,
            listConcurrency: options.listConcurrency,
            deleteConcurrency: options.deleteConcurrency,
            retry: options.retry,
            throttle: options.throttle,
            timeoutMinutes: options.timeoutMinutes,
            subscriptionId: options.subscriptionId,
            verbose: options.verbose,
          },
          process.env
        );

        const summary = await runCleanup(config, createCredential(), logger);
        logger.info(
          `Cleanup complete: ${summary.attempted} attempted, ${summary.succeeded} succeeded, ${summary.failed} failed, ${summary.skipped} skipped`
        );
        for (const failure of summary.failures) {
          logger.error(failure.reason);
        }
        for (const repository of summary.skippedRepositories) {
          logger.error(`Repository ${repository} could not be inspected`);
        }

        if (!isSuccessful(summary)) {
          process.exitCode = 1;
        }
      } catch (error) {
        logger.error(errorMessage(error));
        process.exitCode = 1;
      }
    });

  return program;
}

if (require.main === module) {
  void createProgram().parseAsync(process.argv);
}
