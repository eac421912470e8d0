export {
  DEFAULT_SET_SECRET_REQUEST,
  decodeSecret,
  type Secret,
  type SecretProperties,
  type SetSecretRequest,
  secretPropertiesSchema,
  secretSchema,
} from './secret.js';
