import { z } from 'zod';
import type { FetchResponse } from '../types/request.js';
import { getResponseData } from '../utils/getResponseData.js';
import { validator } from '../utils/validator.js';
import type { SafeWrapAsync } from '../utils/wrap.js';

/** Mutable attributes of a secret. */
export const secretPropertiesSchema = z.object({
  enabled: z.boolean().optional(),
});

export type SecretProperties = z.infer<typeof secretPropertiesSchema>;

/** A stored secret as the service returns it. `value` is absent on listing responses. */
export const secretSchema = z.object({
  name: z.string(),
  version: z.string(),
  value: z.string().optional(),
  properties: secretPropertiesSchema.optional(),
  contentType: z.string().optional(),
  tags: z.record(z.string()).optional(),
});

export type Secret = z.infer<typeof secretSchema>;

/** Body of a set-secret request. */
export interface SetSecretRequest {
  value: string;
  properties?: SecretProperties;
  contentType?: string;
  tags?: Record<string, string>;
}

/** Default body that option fields are overlaid on. */
export const DEFAULT_SET_SECRET_REQUEST: Readonly<SetSecretRequest> = Object.freeze({ value: '' });

/**
 * Decodes a set/get-secret response into a {@link Secret}.
 * A shape mismatch is returned with a `ValidationError` in the cause chain.
 */
export async function decodeSecret(response: FetchResponse): SafeWrapAsync<Error, Secret> {
  const [errData, data] = await getResponseData(response);
  if (errData) {
    return [new Error('error reading secret response', { cause: errData }), null];
  }

  const [errValidate, secret] = await validator(data, secretSchema);
  if (errValidate) {
    return [new Error('error validating secret response', { cause: errValidate }), null];
  }

  return [null, secret];
}
