export { SecretClient, SecretClientBuilder } from './client.js';
export {
  buildSetSecretRequest,
  type ComposedCall,
  composeSetSecret,
  mergeSetSecretOptions,
  SET_SECRET_OPERATION,
  type SetSecretOptions,
} from './compose.js';
export { SetSecretBuilder, type SetSecretSend } from './setSecretBuilder.js';
