/**
 * HttpPamClient Tests
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { AuthError, FetchError, InvalidResponseError } from '@pamkey/core';
import {
  HttpPamClient,
  normalizeBaseUrl,
  unquoteToken,
} from '../src/http-client.js';

const credentials = {
  baseUrl: 'https://pam.example.test',
  username: 'operator',
  password: 'test-password',
};

const session = { baseUrl: 'https://pam.example.test', token: 'test-token-0123456789' };

function keysBody(value: Array<{ format: string; keyAlg: string; privateKey: string }>, publicKey?: string) {
  return JSON.stringify({ expirationTime: 1700000000, publicKey, value });
}

describe('HttpPamClient', () => {
  let originalFetch: typeof global.fetch;

  beforeEach(() => {
    originalFetch = global.fetch;
    vi.spyOn(console, 'debug').mockImplementation(() => {});
  });

  afterEach(() => {
    global.fetch = originalFetch;
  });

  describe('authenticate', () => {
    it('should return the unquoted token as the session', async () => {
      global.fetch = vi.fn().mockResolvedValue(new Response('"test-token-abc"', { status: 200 }));

      const result = await new HttpPamClient().authenticate(credentials);

      expect(result).toEqual({ baseUrl: 'https://pam.example.test', token: 'test-token-abc' });
    });

    it('should post the RADIUS logon request', async () => {
      const fetchMock = vi.fn().mockResolvedValue(new Response('"tok"', { status: 200 }));
      global.fetch = fetchMock;

      await new HttpPamClient().authenticate({ ...credentials, baseUrl: 'https://pam.example.test/' });

      expect(fetchMock).toHaveBeenCalledTimes(1);
      const [url, init] = fetchMock.mock.calls[0] ?? [];
      expect(url).toBe('https://pam.example.test/PasswordVault/API/auth/RADIUS/Logon/');
      expect(init.method).toBe('POST');
      expect(init.headers).toEqual({
        'Content-Type': 'application/json',
        Accept: 'application/json',
      });
      expect(JSON.parse(init.body)).toEqual({
        username: 'operator',
        password: 'test-password',
        type: 'radius',
        secureMode: 'true',
      });
    });

    it('should fail with status and body on 401', async () => {
      global.fetch = vi.fn().mockResolvedValue(new Response('{"ErrorMessage":"denied"}', { status: 401 }));

      const error = await new HttpPamClient().authenticate(credentials).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(AuthError);
      expect(error).toMatchObject({ status: 401, body: '{"ErrorMessage":"denied"}' });
    });

    it('should not retry a failed logon', async () => {
      global.fetch = vi.fn().mockResolvedValue(new Response('nope', { status: 500 }));

      await expect(new HttpPamClient().authenticate(credentials)).rejects.toThrow(AuthError);
      expect(global.fetch).toHaveBeenCalledTimes(1);
    });

    it('should report network failures as AuthError with status 0', async () => {
      global.fetch = vi.fn().mockRejectedValue(new TypeError('fetch failed'));

      const error = await new HttpPamClient().authenticate(credentials).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(AuthError);
      expect(error).toMatchObject({ status: 0, body: 'fetch failed' });
    });

    it('should reject an empty token', async () => {
      global.fetch = vi.fn().mockResolvedValue(new Response('""', { status: 200 }));

      await expect(new HttpPamClient().authenticate(credentials)).rejects.toThrow(AuthError);
    });

    it('should use an injected fetch implementation', async () => {
      const injected = vi.fn().mockResolvedValue(new Response('"injected"', { status: 200 }));
      global.fetch = vi.fn();

      const result = await new HttpPamClient({ fetch: injected }).authenticate(credentials);

      expect(result.token).toBe('injected');
      expect(injected).toHaveBeenCalledTimes(1);
      expect(global.fetch).not.toHaveBeenCalled();
    });

    it('should abort when the timeout elapses', async () => {
      global.fetch = vi.fn().mockImplementation((_url: string, init: RequestInit) =>
        new Promise((_resolve, reject) => {
          init.signal?.addEventListener('abort', () => reject(new Error('This operation was aborted')));
        }),
      );

      const error = await new HttpPamClient({ timeoutMs: 10 }).authenticate(credentials).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(AuthError);
      expect(error).toMatchObject({ status: 0, body: 'This operation was aborted' });
    });
  });

  describe('fetchKeys', () => {
    it('should send the token and an empty JSON body', async () => {
      const fetchMock = vi.fn().mockResolvedValue(new Response(keysBody([]), { status: 200 }));
      global.fetch = fetchMock;

      await new HttpPamClient().fetchKeys(session);

      const [url, init] = fetchMock.mock.calls[0] ?? [];
      expect(url).toBe('https://pam.example.test/PasswordVault/API/Users/Secret/SSHKeys/Cache/');
      expect(init.method).toBe('POST');
      expect(init.body).toBe('{}');
      expect(init.headers.Authorization).toBe('test-token-0123456789');
    });

    it('should map key records in order', async () => {
      global.fetch = vi.fn().mockResolvedValue(new Response(keysBody([
        { format: 'RAW', keyAlg: 'RSA', privateKey: 'rsa-key' },
        { format: 'RAW', keyAlg: 'ED25519', privateKey: 'ed-key' },
      ], 'ssh-ed25519 AAAAC3NzaC1lZDI1NTE5AAAAIExampleExampleExample'), { status: 200 }));

      const bundle = await new HttpPamClient().fetchKeys(session);

      expect(bundle.expirationTime.toISOString()).toBe('2023-11-14T22:13:20.000Z');
      expect(bundle.publicKeyHint).toBe('ssh-ed25519 AAAAC3NzaC1lZDI1NT');
      expect(bundle.keys).toEqual([
        { format: 'RAW', algorithm: 'RSA', privateKey: 'rsa-key' },
        { format: 'RAW', algorithm: 'ED25519', privateKey: 'ed-key' },
      ]);
    });

    it('should accept an empty key list', async () => {
      global.fetch = vi.fn().mockResolvedValue(new Response(keysBody([]), { status: 200 }));

      const bundle = await new HttpPamClient().fetchKeys(session);

      expect(bundle.keys).toEqual([]);
      expect(bundle.publicKeyHint).toBeUndefined();
    });

    it('should fail with status and body on non-200', async () => {
      global.fetch = vi.fn().mockResolvedValue(new Response('expired', { status: 403 }));

      const error = await new HttpPamClient().fetchKeys(session).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(FetchError);
      expect(error).toMatchObject({ status: 403, body: 'expired' });
      expect(global.fetch).toHaveBeenCalledTimes(1);
    });

    it('should reject a body that is not JSON', async () => {
      global.fetch = vi.fn().mockResolvedValue(new Response('<html>', { status: 200 }));

      await expect(new HttpPamClient().fetchKeys(session)).rejects.toThrow(InvalidResponseError);
    });

    it('should reject a payload without a value array', async () => {
      global.fetch = vi.fn().mockResolvedValue(new Response('{"expirationTime":1}', { status: 200 }));

      const error = await new HttpPamClient().fetchKeys(session).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(InvalidResponseError);
      expect(error).toMatchObject({ status: 200, body: '{"expirationTime":1}' });
    });

    it('should reject a key format that is not a plain name', async () => {
      const body = keysBody([{ format: 'RAW/X', keyAlg: 'RSA', privateKey: 'rsa-key' }]);
      global.fetch = vi.fn().mockResolvedValue(new Response(body, { status: 200 }));

      const error = await new HttpPamClient().fetchKeys(session).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(InvalidResponseError);
      expect(error).toMatchObject({
        message: 'Unexpected SSH key response: value.0.format: must contain only letters, digits, "_" or "-"',
      });
    });

    it('should reject a key algorithm that climbs out of the key directory', async () => {
      const body = keysBody([{ format: 'RAW', keyAlg: 'x/../../escaped', privateKey: 'rsa-key' }]);
      global.fetch = vi.fn().mockResolvedValue(new Response(body, { status: 200 }));

      await expect(new HttpPamClient().fetchKeys(session)).rejects.toThrow(InvalidResponseError);
    });

    it('should reject an expiration time outside the date range', async () => {
      global.fetch = vi.fn().mockResolvedValue(new Response('{"expirationTime":1e15,"value":[]}', { status: 200 }));

      const error = await new HttpPamClient().fetchKeys(session).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(InvalidResponseError);
      expect(error).toMatchObject({ message: 'Unexpected SSH key response: expirationTime: is not a valid date' });
    });

    it('should reject a fractional expiration time', async () => {
      global.fetch = vi.fn().mockResolvedValue(new Response('{"expirationTime":1.5,"value":[]}', { status: 200 }));

      await expect(new HttpPamClient().fetchKeys(session)).rejects.toThrow(InvalidResponseError);
    });
  });
});

describe('normalizeBaseUrl', () => {
  it('should drop trailing slashes', () => {
    expect(normalizeBaseUrl('https://pam.example.test//')).toBe('https://pam.example.test');
    expect(normalizeBaseUrl('https://pam.example.test')).toBe('https://pam.example.test');
  });
});

describe('unquoteToken', () => {
  it('should strip surrounding quotes only', () => {
    expect(unquoteToken('"abc"')).toBe('abc');
    expect(unquoteToken('abc')).toBe('abc');
    expect(unquoteToken('"a"b"')).toBe('a"b');
  });
});
