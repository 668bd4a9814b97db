/**
 * pam-ssh-key entry logic, kept free of process globals so it can be tested
 */

import { userInfo } from 'node:os';
import {
  ConfigError,
  InterruptError,
  PamKeyError,
  createLogger,
  setDebugLogging,
  type Logger,
} from '@pamkey/core';
import { HttpPamClient, type PamClient } from '@pamkey/pam-client';
import {
  KeyInstaller,
  SshAddAgent,
  resolveKeyPathPrefix,
  type SshAddAgentConfig,
  type SshAgent,
} from '@pamkey/key-installer';
import { parseArgs, resolveCliConfig, usage } from './config.js';
import { SessionKeyFetcher } from './fetcher.js';
import { TerminalPrompter, type Prompter } from './prompt.js';

export interface CliDependencies {
  env: NodeJS.ProcessEnv;
  client: PamClient;
  prompter: Prompter;
  createAgent: (config: SshAddAgentConfig) => SshAgent;
  defaultUsername: () => string;
  logger: Logger;
}

/**
 * Returns the process exit code
 */
export async function runCli(argv: string[], deps: Partial<CliDependencies> = {}): Promise<number> {
  const env = deps.env ?? process.env;
  const log = deps.logger ?? createLogger('CLI');
  let terminal: TerminalPrompter | undefined;

  try {
    const args = parseArgs(argv);
    if (args.help) {
      console.log(usage());
      return 0;
    }

    const config = resolveCliConfig(args, env);
    setDebugLogging(config.debug);

    console.log(`Authenticating to ${config.baseUrl}`);

    const prompter = deps.prompter ?? (terminal = new TerminalPrompter());
    const username = config.username
      ?? await prompter.askUsername((deps.defaultUsername ?? (() => userInfo().username))());
    const password = await prompter.askPassword(username);
    if (!password) {
      throw new ConfigError('No password set. Exiting.');
    }
    terminal?.close();

    const agentConfig: SshAddAgentConfig = { lifetimeSeconds: config.agentLifetimeSeconds };
    const agent = deps.createAgent ? deps.createAgent(agentConfig) : new SshAddAgent(agentConfig);

    const fetcher = new SessionKeyFetcher({
      client: deps.client ?? new HttpPamClient(),
      installer: new KeyInstaller({ agent }),
      resolvePrefix: () => resolveKeyPathPrefix(env, config.keyName),
    });

    const summary = await fetcher.run({ baseUrl: config.baseUrl, username, password });

    const inAgent = summary.results.filter((result) => result.viaAgent).length;
    const onDisk = summary.results.length - inAgent;
    const failed = summary.failures.length;
    log.info(
      `Done: ${inAgent} key(s) in SSH agent, ${onDisk} key file(s) left on disk` +
      (failed > 0 ? `, ${failed} key(s) failed` : ''),
    );
    // Nothing usable came out of a non-empty bundle
    return failed > 0 && summary.results.length === 0 ? 1 : 0;
  } catch (error) {
    if (error instanceof InterruptError) {
      console.error(`\n${error.message}`);
    } else if (error instanceof PamKeyError) {
      const { code, message, hint } = error.toErrorMessage();
      log.debug(`Error code: ${code}`);
      log.error(hint ? `${message} ${hint}` : message);
    } else {
      log.error(error instanceof Error ? error.message : String(error));
    }
    return 1;
  } finally {
    terminal?.close();
  }
}
