/**
 * @pamkey/pam-client
 *
 * PAM logon and cached SSH key retrieval
 */

export {
  HttpPamClient,
  LOGON_PATH,
  SSH_KEYS_CACHE_PATH,
  normalizeBaseUrl,
  unquoteToken,
  toKeyBundle,
} from './http-client.js';

export { cachedKeysResponseSchema, type CachedKeysResponse } from './schema.js';

export type { PamClient, HttpPamClientOptions } from './types.js';
