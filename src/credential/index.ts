export { type AccessToken, type GetTokenOptions, StaticTokenCredential, type TokenCredential } from './credential.js';
