/** Package name reported in the `User-Agent` header and used as the logger name. */
export const SDK_NAME = 'vault-secrets-client';

/** Package version reported in the `User-Agent` header. Bump together with package.json. */
export const SDK_VERSION = '0.1.0';

/** Service API version sent as the `api-version` query parameter on every request. */
export const DEFAULT_API_VERSION = '7.5';

/** OAuth scope requested from the credential by the bearer-token policy. */
export const DEFAULT_SCOPE = 'https://vault.azure.net/.default';

/** Collection prefix for secret resources, relative to the endpoint. */
export const SECRETS_PATH = 'secrets';
