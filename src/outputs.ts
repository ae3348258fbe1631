import * as core from '@actions/core';
import { CleanupSummary } from './types';

/**
 * Set the action outputs. A dry run deletes nothing, so its "would delete"
 * results are not reported as deleted.
 */
export function setOutputs(summary: CleanupSummary, dryRun: boolean): void {
  const deleted = dryRun ? [] : summary.results.filter(result => result.status === 'deleted');

  core.setOutput('deleted-count', deleted.length);
  core.setOutput('failed-count', summary.failed);
  core.setOutput('skipped-count', summary.skipped);
  core.setOutput('deleted-digests', deleted.map(result => `${result.repository}@${result.digest}`).join(','));
  core.setOutput('released-bytes', summary.releasedBytes ?? 0);
}
