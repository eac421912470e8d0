/**
 * Sets a secret with an options-configured client and the options-object call shape.
 *
 * Reads VAULT_URL, VAULT_TOKEN and optionally VAULT_API_VERSION and VAULT_SECRETS_LOG_LEVEL.
 */
import { createLogger, decodeSecret, loadEnvConfig, SecretClient, StaticTokenCredential } from '../src/index.js';

async function main(): Promise<Error | null> {
  const [errConfig, config] = loadEnvConfig();
  if (errConfig) {
    return errConfig;
  }

  const logger = createLogger({ level: config.logLevel });
  if (!config.token) {
    return new Error('error VAULT_TOKEN is required');
  }

  const [errClient, client] = SecretClient.create(config.url, new StaticTokenCredential(config.token), {
    apiVersion: config.apiVersion,
    retry: 3,
    logger,
  });
  if (errClient) {
    return errClient;
  }

  const [errSend, response] = await client.setSecret('secret-name', 'secret-value', {
    contentType: 'text/plain',
    tags: { owner: 'examples' },
  });
  if (errSend) {
    return errSend;
  }

  const [errDecode, secret] = await decodeSecret(response);
  if (errDecode) {
    return errDecode;
  }

  logger.info({ name: secret.name, version: secret.version, tags: secret.tags }, 'set secret');
  return null;
}

const err = await main();
if (err) {
  createLogger({ level: 'error' }).error({ err }, 'example failed');
  process.exitCode = 1;
}
