import { isRestError } from '@azure/core-rest-pipeline';
import {
  AuthenticationError as IdentityAuthenticationError,
  CredentialUnavailableError,
} from '@azure/identity';
import {
  RegistryError,
  AuthenticationError,
  NotFoundError,
  TransientNetworkError,
  FatalRegistryError,
} from '../types';

const REGISTRY_TYPE = 'acr';

const TRANSIENT_ERROR_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'EAI_AGAIN',
  'EPIPE',
  'REQUEST_SEND_ERROR',
]);

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}

function errorCode(error: Error): string | undefined {
  if ('code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Map an error thrown by the Azure SDK onto the registry error taxonomy
 */
export function classifyError(error: unknown, context: string): RegistryError {
  if (error instanceof RegistryError) {
    return error;
  }

  if (error instanceof IdentityAuthenticationError || error instanceof CredentialUnavailableError) {
    return new AuthenticationError(`${context}: ${error.message}`, REGISTRY_TYPE);
  }

  if (isRestError(error)) {
    const status = error.statusCode;
    if (status === 401 || status === 403) {
      return new AuthenticationError(`${context}: ${error.message}`, REGISTRY_TYPE);
    }
    if (status === 404) {
      return new NotFoundError(`${context}: ${error.message}`, REGISTRY_TYPE);
    }
    if (status === 408 || status === 429 || (status !== undefined && status >= 500)) {
      return new TransientNetworkError(`${context}: ${error.message}`, status, REGISTRY_TYPE);
    }
    if (status === undefined && error.code !== undefined && TRANSIENT_ERROR_CODES.has(error.code)) {
      return new TransientNetworkError(`${context}: ${error.message}`, undefined, REGISTRY_TYPE);
    }
    return new FatalRegistryError(`${context}: ${error.message}`, status, REGISTRY_TYPE);
  }

  if (error instanceof Error) {
    const code = errorCode(error);
    if (error.name === 'AbortError' || (code !== undefined && TRANSIENT_ERROR_CODES.has(code))) {
      return new TransientNetworkError(`${context}: ${error.message}`, undefined, REGISTRY_TYPE);
    }
    return new FatalRegistryError(`${context}: ${error.message}`, undefined, REGISTRY_TYPE);
  }

  return new FatalRegistryError(`${context}: ${String(error)}`, undefined, REGISTRY_TYPE);
}
