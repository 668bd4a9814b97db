import { spawn } from 'node:child_process';
import { createLogger, type Logger } from '@pamkey/core';
import type { SshAgent, SshAddAgentConfig } from './types.js';

export function buildSshAddArgs(keyPath: string, lifetimeSeconds?: number): string[] {
  const args: string[] = [];
  if (lifetimeSeconds !== undefined) {
    args.push('-t', String(Math.max(1, Math.floor(lifetimeSeconds))));
  }
  args.push(keyPath);
  return args;
}

/**
 * SSH agent reached through `ssh-add`. Agent discovery (SSH_AUTH_SOCK) is
 * left to ssh-add itself.
 */
export class SshAddAgent implements SshAgent {
  private config: SshAddAgentConfig;
  private log: Logger;

  constructor(config?: SshAddAgentConfig, logger?: Logger) {
    this.config = config ?? {};
    this.log = logger ?? createLogger('Agent');
  }

  tryRegister(keyPath: string): Promise<boolean> {
    const command = this.config.command ?? 'ssh-add';
    const args = buildSshAddArgs(keyPath, this.config.lifetimeSeconds);

    return new Promise((resolve) => {
      const proc = spawn(command, args, {
        stdio: ['ignore', 'pipe', 'pipe'],
      });

      let stdout = '';
      let stderr = '';
      // A failed spawn may emit both 'error' and 'close'
      let settled = false;
      proc.stdout.on('data', (data) => {
        stdout += data.toString();
      });
      proc.stderr.on('data', (data) => {
        stderr += data.toString();
      });

      proc.on('close', (code) => {
        if (settled) {
          return;
        }
        settled = true;
        if (code === 0) {
          // ssh-add reports "Identity added" on stderr
          this.log.info(`Added key to SSH agent: ${(stdout + stderr).trim()}`);
          resolve(true);
        } else {
          this.log.error(`Failed to add key to SSH agent: ${stderr.trim() || `${command} exited with code ${code}`}`);
          resolve(false);
        }
      });

      proc.on('error', (error) => {
        if (settled) {
          return;
        }
        settled = true;
        this.log.error(`Failed to run ${command}: ${error.message}`);
        resolve(false);
      });
    });
  }
}
