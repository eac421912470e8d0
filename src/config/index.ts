export { type ResolvedClientConfig, resolveClientConfig, type SecretClientOptions } from './client.js';
export { type EnvConfig, loadEnvConfig } from './env.js';
