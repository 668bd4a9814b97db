/**
 * @pamkey/cli
 *
 * Orchestration and command-line surface for session SSH key retrieval
 */

export { SessionKeyFetcher } from './fetcher.js';
export { runCli, type CliDependencies } from './main.js';
export {
  parseArgs,
  resolveCliConfig,
  loadEnvFile,
  loadEnvFiles,
  envFileCandidates,
  usage,
  ENV_VARS,
  type CliArgs,
  type CliConfig,
} from './config.js';
export { TerminalPrompter, type Prompter, type TerminalPrompterOptions } from './prompt.js';
export type {
  KeyInstallTarget,
  SessionKeyFetcherConfig,
  SessionKeyFetcherHooks,
} from './types.js';
