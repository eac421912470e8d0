import { type DestinationStream, type LevelWithSilent, type Logger, pino } from 'pino';
import { SDK_NAME } from './constants.js';

export type { Logger };

/** Options for {@link createLogger}. */
export interface LoggerOptions {
  /** @default 'silent' */
  level?: LevelWithSilent;
  /** Where log lines go. Defaults to stdout. */
  destination?: DestinationStream;
}

/**
 * Creates the SDK logger. It is silent unless a level is given, and bearer tokens in logged
 * request headers are redacted.
 */
export function createLogger({ level = 'silent', destination }: LoggerOptions = {}): Logger {
  const options = {
    name: SDK_NAME,
    level,
    redact: {
      paths: ['headers.authorization', 'headers.cookie'],
      censor: '[redacted]',
    },
  };

  return destination ? pino(options, destination) : pino(options);
}
