/**
 * HTTP client for the PAM logon and cached SSH key endpoints
 */

import {
  AuthError,
  FetchError,
  InvalidResponseError,
  createLogger,
  truncate,
  type KeyBundle,
  type PamCredentials,
  type Session,
} from '@pamkey/core';
import { cachedKeysResponseSchema, type CachedKeysResponse } from './schema.js';
import type { HttpPamClientOptions, PamClient } from './types.js';

export const LOGON_PATH = '/PasswordVault/API/auth/RADIUS/Logon/';
export const SSH_KEYS_CACHE_PATH = '/PasswordVault/API/Users/Secret/SSHKeys/Cache/';

const TOKEN_LOG_CHARS = 10;
const PUBLIC_KEY_HINT_CHARS = 30;

const log = createLogger('Client');

interface RawResponse {
  status: number;
  body: string;
}

export function normalizeBaseUrl(baseUrl: string): string {
  return baseUrl.replace(/\/+$/, '');
}

/**
 * The logon endpoint returns the token as a JSON string literal
 */
export function unquoteToken(body: string): string {
  return body.replace(/^"+|"+$/g, '');
}

export function toKeyBundle(data: CachedKeysResponse): KeyBundle {
  return {
    expirationTime: new Date(data.expirationTime * 1000),
    publicKeyHint: data.publicKey ? data.publicKey.slice(0, PUBLIC_KEY_HINT_CHARS) : undefined,
    keys: data.value.map((key) => ({
      format: key.format,
      algorithm: key.keyAlg,
      privateKey: key.privateKey,
    })),
  };
}

export class HttpPamClient implements PamClient {
  private timeout?: number;
  private fetchImpl?: typeof fetch;

  constructor(options?: HttpPamClientOptions) {
    this.timeout = options?.timeoutMs;
    this.fetchImpl = options?.fetch;
  }

  async authenticate(credentials: PamCredentials): Promise<Session> {
    const baseUrl = normalizeBaseUrl(credentials.baseUrl);

    let response: RawResponse;
    try {
      response = await this.post(`${baseUrl}${LOGON_PATH}`, {
        username: credentials.username,
        password: credentials.password,
        type: 'radius',
        secureMode: 'true',
      });
    } catch (error) {
      throw new AuthError(0, describeError(error), `Check that ${baseUrl} is reachable`);
    }

    if (response.status !== 200) {
      throw new AuthError(response.status, response.body);
    }

    const token = unquoteToken(response.body);
    if (!token) {
      throw new AuthError(response.status, response.body, 'PAM returned an empty session token');
    }

    log.debug(`Authentication successful. Session token: ${truncate(token, TOKEN_LOG_CHARS)}`);
    return { baseUrl, token };
  }

  async fetchKeys(session: Session): Promise<KeyBundle> {
    let response: RawResponse;
    try {
      response = await this.post(`${session.baseUrl}${SSH_KEYS_CACHE_PATH}`, {}, {
        Authorization: session.token,
      });
    } catch (error) {
      throw new FetchError(0, describeError(error), `Check that ${session.baseUrl} is reachable`);
    }

    if (response.status !== 200) {
      throw new FetchError(response.status, response.body);
    }

    let json: unknown;
    try {
      json = JSON.parse(response.body);
    } catch (error) {
      throw new InvalidResponseError(describeError(error), response.body);
    }

    const parsed = cachedKeysResponseSchema.safeParse(json);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new InvalidResponseError(issues, response.body);
    }

    const bundle = toKeyBundle(parsed.data);
    log.debug(`Got ${bundle.keys.length} key(s), expires ${bundle.expirationTime.toISOString()}`);
    return bundle;
  }

  private async post(
    url: string,
    body: unknown,
    headers: Record<string, string> = {},
  ): Promise<RawResponse> {
    const controller = new AbortController();
    const timeoutId = this.timeout !== undefined
      ? setTimeout(() => controller.abort(), this.timeout)
      : undefined;

    try {
      const doFetch = this.fetchImpl ?? fetch;
      const response = await doFetch(url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Accept: 'application/json',
          ...headers,
        },
        body: JSON.stringify(body),
        signal: controller.signal,
      });

      return { status: response.status, body: await response.text() };
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
