/**
 * Key Installer Types
 */

import type { Logger } from '@pamkey/core';

/**
 * Capability for loading a key file into a running SSH agent.
 * Resolves false when the agent is unreachable or refuses the key.
 */
export interface SshAgent {
  tryRegister(keyPath: string): Promise<boolean>;
}

export interface SshAddAgentConfig {
  /** ssh-add binary (default: ssh-add on PATH) */
  command?: string;
  /** Passed as `ssh-add -t`; the agent forgets the key after this many seconds */
  lifetimeSeconds?: number;
}

export interface KeyInstallerConfig {
  agent: SshAgent;
  logger?: Logger;
}
