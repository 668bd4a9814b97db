/**
 * PAM Client Types
 */

import type { PamCredentials, Session, KeyBundle } from '@pamkey/core';

/**
 * Capability for talking to the PAM service. The HTTP implementation is
 * HttpPamClient; tests substitute their own.
 */
export interface PamClient {
  /** Log on once; throws AuthError on any non-200 answer */
  authenticate(credentials: PamCredentials): Promise<Session>;
  /** Fetch the cached session SSH keys; throws FetchError on any non-200 answer */
  fetchKeys(session: Session): Promise<KeyBundle>;
}

export interface HttpPamClientOptions {
  /** Abort each request after this many ms (default: no timeout) */
  timeoutMs?: number;
  /** Fetch implementation (default: global fetch) */
  fetch?: typeof fetch;
}
