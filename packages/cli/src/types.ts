/**
 * CLI / Orchestrator Types
 */

import type { InstallResult, KeyInstallFailure, KeyRecord, Logger } from '@pamkey/core';
import type { PamClient } from '@pamkey/pam-client';

/**
 * Anything that can install one key; KeyInstaller in production
 */
export interface KeyInstallTarget {
  installKey(prefix: string, record: KeyRecord, expirationTime: Date): Promise<InstallResult>;
}

export interface SessionKeyFetcherHooks {
  onPurged?: (paths: string[]) => void;
  onKeyInstalled?: (result: InstallResult) => void;
  onKeyFailed?: (failure: KeyInstallFailure) => void;
  onError?: (error: Error) => void;
}

export interface SessionKeyFetcherConfig {
  client: PamClient;
  installer: KeyInstallTarget;
  /** Returns the `<home>/.ssh/<key name>` prefix; called once per run */
  resolvePrefix: () => string;
  /** Removes stale `<prefix>_*` files (default: purgeStaleKeys) */
  purge?: (prefix: string) => Promise<string[]>;
  hooks?: SessionKeyFetcherHooks;
  logger?: Logger;
}
