/**
 * PAM session and SSH key types
 */

// ========== PAM ==========

export interface PamCredentials {
  /** PAM base URL, e.g. https://pam.example.com */
  baseUrl: string;
  username: string;
  password: string;
}

/**
 * Authenticated PAM session. Held by the caller and passed to every
 * request that needs it; never written to disk.
 */
export interface Session {
  baseUrl: string;
  token: string;
}

// ========== Keys ==========

export interface KeyRecord {
  /** Key encoding as reported by PAM, e.g. "RAW" or "PPK" */
  readonly format: string;
  /** Key algorithm as reported by PAM, e.g. "RSA" or "ED25519" */
  readonly algorithm: string;
  /** PEM / OpenSSH private key text */
  readonly privateKey: string;
}

/**
 * One cached-key response from PAM
 */
export interface KeyBundle {
  readonly expirationTime: Date;
  /** Leading characters of the public key, for display only */
  readonly publicKeyHint?: string;
  readonly keys: readonly KeyRecord[];
}

// ========== Installation ==========

export type InstallResult =
  | {
      viaAgent: true;
      /** Path the key was staged at; the file no longer exists */
      keyPath: string;
      record: KeyRecord;
    }
  | {
      viaAgent: false;
      /** Owner-only key file left for manual use */
      keyPath: string;
      record: KeyRecord;
      warning: string;
    };

/**
 * A key that could be neither loaded nor left on disk
 */
export interface KeyInstallFailure {
  record: KeyRecord;
  error: string;
}

// ========== Run ==========

export type KeyFetchState =
  | 'unauthenticated'
  | 'authenticated'
  | 'fetched'
  | 'purging'
  | 'installing'
  | 'done'
  | 'failed';

export interface FetchSummary {
  expirationTime: Date;
  publicKeyHint?: string;
  /** Stale key files removed before installing */
  purged: string[];
  results: InstallResult[];
  failures: KeyInstallFailure[];
}
