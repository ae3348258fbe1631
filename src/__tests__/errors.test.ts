import { RestError } from '@azure/core-rest-pipeline';
import { CredentialUnavailableError } from '@azure/identity';
import { classifyError, errorMessage } from '../utils/errors';
import {
  AuthenticationError,
  NotFoundError,
  TransientNetworkError,
  FatalRegistryError,
  RegistryError,
} from '../types';

describe('classifyError', () => {
  it('should return registry errors unchanged', () => {
    const error = new NotFoundError('gone');

    expect(classifyError(error, 'delete')).toBe(error);
  });

  it.each([
    [401, AuthenticationError],
    [403, AuthenticationError],
    [404, NotFoundError],
    [408, TransientNetworkError],
    [429, TransientNetworkError],
    [503, TransientNetworkError],
    [400, FatalRegistryError],
  ])('should classify HTTP %i', (statusCode, expected) => {
    const classified = classifyError(new RestError('request failed', { statusCode }), 'list repositories');

    expect(classified).toBeInstanceOf(expected);
    expect(classified.message).toBe('list repositories: request failed');
  });

  it('should keep the status code', () => {
    const classified = classifyError(new RestError('busy', { statusCode: 503 }), 'delete');

    expect(classified.statusCode).toBe(503);
    expect(classified.registryType).toBe('acr');
  });

  it('should treat connection failures as transient', () => {
    expect(classifyError(new RestError('socket hang up', { code: 'ECONNRESET' }), 'list')).toBeInstanceOf(
      TransientNetworkError
    );

    const nodeError = Object.assign(new Error('connect ETIMEDOUT'), { code: 'ETIMEDOUT' });
    expect(classifyError(nodeError, 'list')).toBeInstanceOf(TransientNetworkError);
  });

  it('should treat missing credentials as an authentication error', () => {
    const classified = classifyError(new CredentialUnavailableError('no credential'), 'list repositories');

    expect(classified).toBeInstanceOf(AuthenticationError);
    expect(classified.statusCode).toBe(401);
  });

  it('should treat anything else as fatal', () => {
    expect(classifyError(new Error('bad'), 'list')).toBeInstanceOf(FatalRegistryError);
    expect(classifyError('bad', 'list').message).toBe('list: bad');
  });

  it('should keep the class hierarchy', () => {
    expect(new TransientNetworkError('x')).toBeInstanceOf(RegistryError);
    expect(new FatalRegistryError('x').name).toBe('FatalRegistryError');
  });
});

describe('errorMessage', () => {
  it('should read the message of an error', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage(42)).toBe('Unknown error');
  });
});
