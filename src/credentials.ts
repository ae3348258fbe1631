import type { TokenCredential } from '@azure/core-auth';
import { DefaultAzureCredential, EnvironmentCredential } from '@azure/identity';

/**
 * Service principal variables read by EnvironmentCredential
 */
const SERVICE_PRINCIPAL_VARIABLES = ['AZURE_CLIENT_ID', 'AZURE_TENANT_ID'];

/**
 * Pick the credential for the registry clients: the service principal from the
 * environment when one is configured, otherwise the default Azure chain
 * (workload identity, managed identity, Azure CLI login).
 */
export function createCredential(env: NodeJS.ProcessEnv = process.env): TokenCredential {
  const hasServicePrincipal =
    SERVICE_PRINCIPAL_VARIABLES.every(name => Boolean(env[name])) &&
    Boolean(env.AZURE_CLIENT_SECRET || env.AZURE_CLIENT_CERTIFICATE_PATH);

  return hasServicePrincipal ? new EnvironmentCredential() : new DefaultAzureCredential();
}
