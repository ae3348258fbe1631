import * as core from '@actions/core';
import chalk from 'chalk';
import { ConsoleSink, Logger } from '../logger';

jest.mock('@actions/core');

const mockedCore = core as jest.Mocked<typeof core>;

describe('Logger', () => {
  let log: jest.SpyInstance;
  let warn: jest.SpyInstance;
  let error: jest.SpyInstance;

  beforeEach(() => {
    jest.clearAllMocks();
    log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    error = jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('with the console sink', () => {
    const plain = new chalk.Instance({ level: 0 });

    it('should print plain lines with levels', async () => {
      const logger = new Logger(false, false, new ConsoleSink(plain));

      logger.info('Discovered 3 manifests');
      logger.warning('A total of 3 dangling images will be deleted');
      logger.error('Failed to delete manifest');
      const result = await logger.group('Fetching inventory', async () => 42);

      expect(result).toBe(42);
      expect(log.mock.calls).toEqual([['Discovered 3 manifests'], ['Fetching inventory']]);
      expect(warn.mock.calls).toEqual([['warning A total of 3 dangling images will be deleted']]);
      expect(error.mock.calls).toEqual([['error Failed to delete manifest']]);
      expect(mockedCore.warning).not.toHaveBeenCalled();
      expect(mockedCore.group).not.toHaveBeenCalled();
    });

    it('should drop debug lines outside debug mode', () => {
      const logger = new Logger(true, false, new ConsoleSink(plain));

      logger.debug('Listing manifests of api');

      expect(log).not.toHaveBeenCalled();
      expect(mockedCore.debug).not.toHaveBeenCalled();
    });

    it('should print debug lines with a prefix in debug mode', () => {
      const logger = new Logger(false, true, new ConsoleSink(plain));

      logger.debug('Listing manifests of api');

      expect(log.mock.calls).toEqual([['[DEBUG] Listing manifests of api']]);
    });
  });

  describe('with the actions sink', () => {
    it('should write through @actions/core', async () => {
      mockedCore.group.mockImplementation(async (_name, fn) => fn());
      const logger = new Logger();

      logger.warning('careful');
      logger.debug('details');
      logger.verboseInfo('hidden');
      await logger.group('Deleting images', async () => undefined);

      expect(mockedCore.warning).toHaveBeenCalledWith('careful');
      expect(mockedCore.debug).toHaveBeenCalledWith('details');
      expect(mockedCore.info).not.toHaveBeenCalled();
      expect(mockedCore.group).toHaveBeenCalledWith('Deleting images', expect.any(Function));
      expect(log).not.toHaveBeenCalled();
    });
  });
});
