import {
  parseImageReference,
  matchesPattern,
  parseList,
  parseIntegerInput,
  validateCleanupConfig,
} from '../utils/validation';

const digest = `sha256:${'a'.repeat(64)}`;

describe('validation', () => {
  describe('parseImageReference', () => {
    it('should parse a bare digest', () => {
      expect(parseImageReference(digest)).toEqual({ kind: 'digest', digest });
    });

    it('should parse a repository digest with or without the registry host', () => {
      expect(parseImageReference(`team/api@${digest}`)).toEqual({ kind: 'digest', repository: 'team/api', digest });
      expect(parseImageReference(`myregistry.azurecr.io/team/api@${digest}`)).toEqual({
        kind: 'digest',
        repository: 'team/api',
        digest,
      });
    });

    it('should lowercase the digest', () => {
      expect(parseImageReference(`api@sha256:${'A'.repeat(64)}`)).toEqual({
        kind: 'digest',
        repository: 'api',
        digest,
      });
    });

    it('should parse a tag reference', () => {
      expect(parseImageReference('api:v1.2.3')).toEqual({ kind: 'tag', repository: 'api', tag: 'v1.2.3' });
      expect(parseImageReference('localhost:5000/api:latest')).toEqual({ kind: 'tag', repository: 'api', tag: 'latest' });
    });

    it('should pin the digest of a reference carrying both tag and digest', () => {
      expect(parseImageReference(`myregistry.azurecr.io/team/api:v1.2.3@${digest}`)).toEqual({
        kind: 'digest',
        repository: 'team/api',
        digest,
      });
      expect(parseImageReference(`localhost:5000/api:latest@${digest}`)).toEqual({
        kind: 'digest',
        repository: 'api',
        digest,
      });
      expect(() => parseImageReference(`api:-bad@${digest}`)).toThrow(`Image reference format api:-bad@${digest} is not valid`);
    });

    it('should reject references without tag or digest', () => {
      expect(() => parseImageReference('api')).toThrow('Image reference format api is not valid');
      expect(() => parseImageReference('myregistry.azurecr.io/api')).toThrow('is not valid');
    });

    it('should reject malformed digests', () => {
      expect(() => parseImageReference('api@sha256:1234')).toThrow('Image reference format api@sha256:1234 is not valid');
    });
  });

  describe('matchesPattern', () => {
    it('should match exact names and wildcards', () => {
      expect(matchesPattern('busybox', ['busybox'])).toBe(true);
      expect(matchesPattern('helm-charts/api', ['helm-charts*'])).toBe(true);
      expect(matchesPattern('api-v1', ['api-v?'])).toBe(true);
      expect(matchesPattern('busybox2', ['busybox'])).toBe(false);
    });

    it('should treat dots literally', () => {
      expect(matchesPattern('axb', ['a.b'])).toBe(false);
      expect(matchesPattern('a.b', ['a.b'])).toBe(true);
    });
  });

  describe('parseList', () => {
    it('should split on commas and newlines', () => {
      expect(parseList('a, b\nc,,')).toEqual(['a', 'b', 'c']);
      expect(parseList('')).toEqual([]);
      expect(parseList(undefined)).toEqual([]);
    });
  });

  describe('parseIntegerInput', () => {
    it('should parse integers and fall back to the default', () => {
      expect(parseIntegerInput('retry', '5', 3)).toBe(5);
      expect(parseIntegerInput('retry', '', 3)).toBe(3);
    });

    it('should reject non-integers and missing required values', () => {
      expect(() => parseIntegerInput('max-age-days', '3.5')).toThrow('max-age-days must be an integer, got "3.5"');
      expect(() => parseIntegerInput('max-age-days', undefined)).toThrow('max-age-days is required');
    });
  });

  describe('validateCleanupConfig', () => {
    it('should require a valid registry name', () => {
      expect(() => validateCleanupConfig({})).toThrow('registry-name is required');
      expect(() => validateCleanupConfig({ registryName: 'my-registry', resourceGroup: 'rg' })).toThrow(
        'registry-name must be 5-50 alphanumeric characters'
      );
    });

    it('should require a resource group', () => {
      expect(() => validateCleanupConfig({ registryName: 'myregistry' })).toThrow('resource-group is required');
    });

    it('should reject negative and zero limits', () => {
      const base = { registryName: 'myregistry', resourceGroup: 'rg' };

      expect(() => validateCleanupConfig({ ...base, maxAgeDays: -1 })).toThrow('max-age-days must be a non-negative number');
      expect(() => validateCleanupConfig({ ...base, deleteConcurrency: 0 })).toThrow('delete-concurrency must be at least 1');
      expect(() => validateCleanupConfig({ ...base, timeoutMinutes: 0 })).toThrow('timeout-minutes must be at least 1');
    });

    it('should validate deployed image references', () => {
      expect(() =>
        validateCleanupConfig({ registryName: 'myregistry', resourceGroup: 'rg', deployedImages: ['api'] })
      ).toThrow('Image reference format api is not valid');
      expect(() =>
        validateCleanupConfig({
          registryName: 'myregistry',
          resourceGroup: 'rg',
          deployedImages: [`myregistry.azurecr.io/api:v1@${digest}`],
        })
      ).not.toThrow();
    });
  });
});
