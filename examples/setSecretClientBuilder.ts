/**
 * Sets a secret with a builder-configured client and the staged call shape.
 *
 * Reads VAULT_URL, VAULT_TOKEN and optionally VAULT_API_VERSION and VAULT_SECRETS_LOG_LEVEL.
 */
import { Context, createLogger, decodeSecret, loadEnvConfig, SecretClient, StaticTokenCredential } from '../src/index.js';

async function main(): Promise<Error | null> {
  const [errConfig, config] = loadEnvConfig();
  if (errConfig) {
    return errConfig;
  }

  const logger = createLogger({ level: config.logLevel });
  if (!config.token) {
    return new Error('error VAULT_TOKEN is required');
  }

  const builder = SecretClient.builder(config.url, new StaticTokenCredential(config.token))
    .withRetry({ limit: 3, timeout: 500 })
    .withLogger(logger);
  const [errClient, client] = (config.apiVersion ? builder.withApiVersion(config.apiVersion) : builder).build();
  if (errClient) {
    return errClient;
  }

  const context = Context.empty().withEntry('example', 'setSecretClientBuilder');
  const [errSend, response] = await client
    .setSecretBuilder('secret-name', 'secret-value')
    .withContext(context)
    .withProperties({ enabled: false })
    .send();
  if (errSend) {
    return errSend;
  }

  const [errDecode, secret] = await decodeSecret(response);
  if (errDecode) {
    return errDecode;
  }

  logger.info({ name: secret.name, version: secret.version }, 'set secret');
  return null;
}

const err = await main();
if (err) {
  createLogger({ level: 'error' }).error({ err }, 'example failed');
  process.exitCode = 1;
}
