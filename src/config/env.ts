import type { LevelWithSilent } from 'pino';
import { z } from 'zod';
import { ConfigError } from '../error/configError.js';
import { ValidationError } from '../error/validationError.js';
import type { SafeWrap } from '../utils/wrap.js';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const satisfies readonly LevelWithSilent[];

const envSchema = z.object({
  VAULT_URL: z.string().url(),
  VAULT_TOKEN: z.string().min(1).optional(),
  VAULT_API_VERSION: z.string().min(1).optional(),
  VAULT_SECRETS_LOG_LEVEL: z.enum(LOG_LEVELS).default('silent'),
});

/** Settings read from the environment by the example programs and CLI-style callers. */
export interface EnvConfig {
  /** Service endpoint, from `VAULT_URL`. */
  url: string;
  /** Static bearer token, from `VAULT_TOKEN`. */
  token?: string;
  /** API version override, from `VAULT_API_VERSION`. */
  apiVersion?: string;
  /** From `VAULT_SECRETS_LOG_LEVEL`, `silent` when unset. */
  logLevel: LevelWithSilent;
}

/**
 * Reads and validates the environment. Empty strings count as unset.
 *
 * @example
 * const [err, config] = loadEnvConfig();
 * if (err) throw err;
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): SafeWrap<ConfigError, EnvConfig> {
  const present = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value !== ''));
  const result = envSchema.safeParse(present);
  if (!result.success) {
    const cause = new ValidationError('error validating environment', result.error.issues);
    return [new ConfigError('error loading environment configuration', env.VAULT_URL ?? '', { cause }), null];
  }

  const { VAULT_URL, VAULT_TOKEN, VAULT_API_VERSION, VAULT_SECRETS_LOG_LEVEL } = result.data;
  return [
    null,
    {
      url: VAULT_URL,
      token: VAULT_TOKEN,
      apiVersion: VAULT_API_VERSION,
      logLevel: VAULT_SECRETS_LOG_LEVEL,
    },
  ];
}
