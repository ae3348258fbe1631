import * as core from '@actions/core';
import { setOutputs } from '../outputs';
import { CleanupSummary, DeletionResult } from '../types';

jest.mock('@actions/core');

const mockedCore = core as jest.Mocked<typeof core>;

const digestA = `sha256:${'a'.repeat(64)}`;
const digestB = `sha256:${'b'.repeat(64)}`;

describe('setOutputs', () => {
  const deleted: DeletionResult = { repository: 'api', digest: digestA, status: 'deleted', reason: 'dangling' };
  const failed: DeletionResult = { repository: 'web', digest: digestB, status: 'failed', reason: 'locked' };
  const summary: CleanupSummary = {
    attempted: 2,
    succeeded: 1,
    failed: 1,
    skipped: 0,
    failures: [failed],
    results: [deleted, failed],
    plan: [],
    skippedRepositories: [],
    releasedBytes: 1500,
  };

  beforeEach(() => {
    jest.clearAllMocks();
  });

  it('should report the deleted images', () => {
    setOutputs(summary, false);

    expect(mockedCore.setOutput).toHaveBeenCalledWith('deleted-count', 1);
    expect(mockedCore.setOutput).toHaveBeenCalledWith('failed-count', 1);
    expect(mockedCore.setOutput).toHaveBeenCalledWith('skipped-count', 0);
    expect(mockedCore.setOutput).toHaveBeenCalledWith('deleted-digests', `api@${digestA}`);
    expect(mockedCore.setOutput).toHaveBeenCalledWith('released-bytes', 1500);
  });

  it('should report nothing deleted in a dry run', () => {
    const wouldDelete: DeletionResult = { ...deleted, reason: 'would delete' };

    setOutputs({ ...summary, failed: 0, failures: [], results: [wouldDelete], releasedBytes: undefined }, true);

    expect(mockedCore.setOutput).toHaveBeenCalledWith('deleted-count', 0);
    expect(mockedCore.setOutput).toHaveBeenCalledWith('deleted-digests', '');
    expect(mockedCore.setOutput).toHaveBeenCalledWith('released-bytes', 0);
  });
});
