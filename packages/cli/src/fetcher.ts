import {
  KeyFetchStateMachine,
  createLogger,
  type FetchSummary,
  type InstallResult,
  type KeyFetchEvent,
  type KeyFetchState,
  type Logger,
  type PamCredentials,
} from '@pamkey/core';
import type { PamClient } from '@pamkey/pam-client';
import { purgeStaleKeys } from '@pamkey/key-installer';
import type {
  KeyInstallTarget,
  SessionKeyFetcherConfig,
  SessionKeyFetcherHooks,
} from './types.js';

/**
 * Session Key Fetcher
 *
 * Runs authenticate → fetch → purge → install once. Everything up to the
 * purge is all-or-nothing; each key install after that stands on its own,
 * and a key that fails is recorded in `failures` instead of ending the run.
 */
export class SessionKeyFetcher {
  private client: PamClient;
  private installer: KeyInstallTarget;
  private resolvePrefix: () => string;
  private purge: (prefix: string) => Promise<string[]>;
  private hooks: SessionKeyFetcherHooks;
  private log: Logger;
  private stateMachine = new KeyFetchStateMachine();

  constructor(config: SessionKeyFetcherConfig) {
    this.client = config.client;
    this.installer = config.installer;
    this.resolvePrefix = config.resolvePrefix;
    this.purge = config.purge ?? purgeStaleKeys;
    this.hooks = config.hooks ?? {};
    this.log = config.logger ?? createLogger('Fetcher');
  }

  getState(): KeyFetchState {
    return this.stateMachine.getState();
  }

  async run(credentials: PamCredentials): Promise<FetchSummary> {
    this.stateMachine = new KeyFetchStateMachine();

    try {
      const session = await this.client.authenticate(credentials);
      this.advance({ type: 'AUTHENTICATED' });

      const bundle = await this.client.fetchKeys(session);
      this.advance({ type: 'FETCHED', keyCount: bundle.keys.length });
      this.log.info(
        `Fetched ${bundle.keys.length} key(s) expiring ${bundle.expirationTime.toISOString()}` +
        ` publickey='${bundle.publicKeyHint ?? 'n/a'}..'`,
      );

      const prefix = this.resolvePrefix();

      this.advance({ type: 'PURGE_STARTED' });
      const purged = await this.purge(prefix);
      for (const path of purged) {
        this.log.debug(`Deleted old key file: ${path}`);
      }
      this.hooks.onPurged?.(purged);

      const results: FetchSummary['results'] = [];
      const failures: FetchSummary['failures'] = [];
      for (const [index, record] of bundle.keys.entries()) {
        this.advance({ type: 'INSTALL_STARTED', index });
        let result: InstallResult;
        try {
          result = await this.installer.installKey(prefix, record, bundle.expirationTime);
        } catch (error) {
          const failure = { record, error: error instanceof Error ? error.message : String(error) };
          this.log.warn(`Could not install ${record.format} ${record.algorithm} key: ${failure.error}`);
          failures.push(failure);
          this.hooks.onKeyFailed?.(failure);
          continue;
        }
        results.push(result);
        this.hooks.onKeyInstalled?.(result);
      }

      this.advance({ type: 'COMPLETE' });

      return {
        expirationTime: bundle.expirationTime,
        publicKeyHint: bundle.publicKeyHint,
        purged,
        results,
        failures,
      };
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      this.stateMachine.transition({ type: 'FAIL', error: err });
      this.hooks.onError?.(err);
      throw err;
    }
  }

  private advance(event: KeyFetchEvent): void {
    const result = this.stateMachine.transition(event);
    if (!result.success) {
      throw new Error(`SessionKeyFetcher: ${result.error}`);
    }
  }
}
