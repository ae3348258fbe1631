import * as core from '@actions/core';
import { getInputs } from './config';
import { createCredential } from './credentials';
import { runCleanup } from './main';
import { isSuccessful } from './cleanup/engine';
import { setOutputs } from './outputs';

/**
 * Main entry point for the action
 */
async function run(): Promise<void> {
  try {
    const { config, logger } = getInputs();

    const summary = await runCleanup(config, createCredential(), logger);

    setOutputs(summary, config.dryRun);

    logger.info(
      `Cleanup complete: ${summary.attempted} attempted, ${summary.succeeded} succeeded, ${summary.failed} failed, ${summary.skipped} skipped`
    );

    for (const failure of summary.failures) {
      logger.warning(`  - ${failure.reason}`);
    }
    for (const repository of summary.skippedRepositories) {
      logger.warning(`  - repository ${repository} could not be inspected`);
    }

    if (!isSuccessful(summary)) {
      core.setFailed(
        `Cleanup completed with ${summary.failed} failed deletions, ${summary.skipped} skipped deletions and ${summary.skippedRepositories.length} uninspected repositories`
      );
    }
  } catch (error) {
    if (error instanceof Error) {
      core.setFailed(error.message);
    } else {
      core.setFailed('Unknown error occurred');
    }
  }
}

void run();
