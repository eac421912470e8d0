import type { Context } from '../context/context.js';
import type { SecretProperties } from '../models/secret.js';
import type { FetchResponse } from '../types/request.js';
import type { SafeWrapAsync } from '../utils/wrap.js';
import { mergeSetSecretOptions, type SetSecretOptions } from './compose.js';

/** Sends a set-secret call; supplied by the client. */
export type SetSecretSend = (name: string, value: string, options: SetSecretOptions) => SafeWrapAsync<Error, FetchResponse>;

/**
 * Staged form of set secret, returned by `SecretClient.setSecretBuilder`.
 *
 * Every `with*` method returns a new builder, so a partially configured builder can be reused.
 * Nothing is sent until {@link SetSecretBuilder.send}.
 *
 * @example
 * const [err, response] = await client
 *   .setSecretBuilder('secret-name', 'secret-value')
 *   .withProperties({ enabled: false })
 *   .send();
 */
export class SetSecretBuilder {
  readonly #name: string;
  readonly #value: string;
  readonly #options: Readonly<SetSecretOptions>;
  readonly #send: SetSecretSend;

  constructor(name: string, value: string, send: SetSecretSend, options: SetSecretOptions = {}) {
    this.#name = name;
    this.#value = value;
    this.#send = send;
    this.#options = Object.freeze(mergeSetSecretOptions(options));
  }

  get name(): string {
    return this.#name;
  }

  get value(): string {
    return this.#value;
  }

  withProperties(properties: SecretProperties): SetSecretBuilder {
    return this.withOptions({ properties });
  }

  withContentType(contentType: string): SetSecretBuilder {
    return this.withOptions({ contentType });
  }

  withTags(tags: Record<string, string>): SetSecretBuilder {
    return this.withOptions({ tags });
  }

  withContext(context: Context): SetSecretBuilder {
    return this.withOptions({ context });
  }

  /** Applies every set field of `options` over the fields gathered so far. */
  withOptions(options: SetSecretOptions): SetSecretBuilder {
    return new SetSecretBuilder(this.#name, this.#value, this.#send, mergeSetSecretOptions(this.#options, options));
  }

  /** Copy of the options gathered so far. */
  options(): SetSecretOptions {
    return { ...this.#options };
  }

  /** Sends the call. */
  send(): SafeWrapAsync<Error, FetchResponse> {
    return this.#send(this.#name, this.#value, this.options());
  }
}
