/**
 * @pamkey/key-installer
 *
 * Loads fetched SSH keys into the SSH agent, or leaves them in owner-only files
 */

export { KeyInstaller, KEY_FILE_MODE } from './key-installer.js';

export { SshAddAgent, buildSshAddArgs } from './ssh-agent.js';

export {
  DEFAULT_KEY_NAME,
  resolveKeyPathPrefix,
  keyFilePath,
  purgeStaleKeys,
} from './key-path.js';

export type { SshAgent, SshAddAgentConfig, KeyInstallerConfig } from './types.js';
