import { mkdir, open, stat, unlink } from 'node:fs/promises';
import { dirname } from 'node:path';
import {
  createLogger,
  type InstallResult,
  type KeyRecord,
  type Logger,
} from '@pamkey/core';
import { isNotFound, keyFilePath } from './key-path.js';
import type { KeyInstallerConfig, SshAgent } from './types.js';

export const KEY_FILE_MODE = 0o600;
const KEY_DIR_MODE = 0o700;

/**
 * Key Installer
 *
 * Stages each key in an owner-only file, hands it to the SSH agent and
 * removes the file once the agent holds the key. When the agent is not
 * available the file stays behind for manual use.
 */
export class KeyInstaller {
  private agent: SshAgent;
  private log: Logger;

  constructor(config: KeyInstallerConfig) {
    this.agent = config.agent;
    this.log = config.logger ?? createLogger('Installer');
  }

  async installKey(prefix: string, record: KeyRecord, expirationTime: Date): Promise<InstallResult> {
    const keyPath = keyFilePath(prefix, record);

    await this.writeKeyFile(dirname(prefix), keyPath, record.privateKey);
    this.log.info(
      `Wrote SSH ${record.algorithm} key with expires='${expirationTime.toISOString()}' to ${keyPath}`,
    );
    await this.logFileMode(keyPath);

    let registered: boolean;
    let failureDetail = 'agent did not accept the key';
    try {
      registered = await this.agent.tryRegister(keyPath);
    } catch (error) {
      // The key file is the only copy; keep it whatever went wrong.
      registered = false;
      failureDetail = error instanceof Error ? error.message : String(error);
    }

    if (registered) {
      await this.removeKeyFile(keyPath);
      return { viaAgent: true, keyPath, record };
    }

    const warning =
      `Could not add key to SSH agent (${failureDetail}). ` +
      `Key file ${keyPath} was left for manual usage. It contains sensitive key material: ` +
      'protect it and remove it when no longer needed.';
    this.log.warn(warning);
    return { viaAgent: false, keyPath, record, warning };
  }

  /**
   * Permissions are restricted before any key material reaches the file.
   */
  private async writeKeyFile(keyDir: string, keyPath: string, privateKey: string): Promise<void> {
    await mkdir(keyDir, { recursive: true, mode: KEY_DIR_MODE });

    const handle = await open(keyPath, 'w', KEY_FILE_MODE);
    try {
      await handle.chmod(KEY_FILE_MODE);
      await handle.writeFile(privateKey, 'utf-8');
    } finally {
      await handle.close();
    }
  }

  private async removeKeyFile(keyPath: string): Promise<void> {
    try {
      await unlink(keyPath);
      this.log.info(`Key file ${keyPath} deleted.`);
    } catch (error) {
      if (!isNotFound(error)) {
        throw error;
      }
      this.log.debug(`Key file ${keyPath} was already removed.`);
    }
  }

  private async logFileMode(keyPath: string): Promise<void> {
    const info = await stat(keyPath);
    this.log.debug(`${keyPath} mode=${(info.mode & 0o777).toString(8)} size=${info.size}`);
  }
}
