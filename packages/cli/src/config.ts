/**
 * CLI Configuration
 *
 * Flags win over environment variables. `.env` files from the working
 * directory and from beside the pam-ssh-key script are loaded into the
 * environment first when present.
 */

import { config as loadDotenv } from 'dotenv';
import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { ConfigError, createLogger } from '@pamkey/core';
import { DEFAULT_KEY_NAME } from '@pamkey/key-installer';

export const ENV_VARS = {
  baseUrl: 'PAM_BASEURL',
  username: 'PAM_USERNAME',
  keyName: 'PAM_KEY_NAME',
  agentLifetime: 'PAM_AGENT_LIFETIME',
  debug: 'DEBUG',
} as const;

export interface CliArgs {
  server?: string;
  username?: string;
  agentLifetime?: string;
  help: boolean;
}

export interface CliConfig {
  baseUrl: string;
  /** Unset means: ask interactively */
  username?: string;
  keyName: string;
  /** Seconds the agent keeps the key (default: until the agent exits) */
  agentLifetimeSeconds?: number;
  debug: boolean;
}

const FLAG_ALIASES: Record<string, keyof Omit<CliArgs, 'help'>> = {
  '-s': 'server',
  '--server': 'server',
  '-u': 'username',
  '--username': 'username',
  '-t': 'agentLifetime',
  '--agent-lifetime': 'agentLifetime',
};

export function parseArgs(argv: string[]): CliArgs {
  const result: CliArgs = { help: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';

    if (arg === '-h' || arg === '--help') {
      result.help = true;
      continue;
    }

    const eq = arg.indexOf('=');
    const flag = arg.startsWith('--') && eq > 0 ? arg.slice(0, eq) : arg;
    const key = FLAG_ALIASES[flag];
    if (!key) {
      throw new ConfigError(`Unknown argument: ${arg}`, 'Run with --help for usage');
    }

    let value: string | undefined;
    if (flag !== arg) {
      value = arg.slice(eq + 1);
    } else {
      value = argv[i + 1];
      i++;
    }
    if (value === undefined || value === '') {
      throw new ConfigError(`Missing value for ${flag}`, 'Run with --help for usage');
    }
    result[key] = value;
  }

  return result;
}

export function resolveCliConfig(args: CliArgs, env: NodeJS.ProcessEnv): CliConfig {
  const baseUrl = args.server || env[ENV_VARS.baseUrl];
  if (!baseUrl) {
    throw new ConfigError(
      'Base URL for PAM required.',
      `Set it either via --server param or ${ENV_VARS.baseUrl} env.`,
    );
  }

  const lifetime = args.agentLifetime || env[ENV_VARS.agentLifetime];
  let agentLifetimeSeconds: number | undefined;
  if (lifetime) {
    agentLifetimeSeconds = Number(lifetime);
    if (!Number.isInteger(agentLifetimeSeconds) || agentLifetimeSeconds <= 0) {
      throw new ConfigError(
        `Invalid agent lifetime: ${lifetime}`,
        'Use a positive number of seconds',
      );
    }
  }

  return {
    baseUrl,
    username: args.username || env[ENV_VARS.username] || undefined,
    keyName: env[ENV_VARS.keyName] || DEFAULT_KEY_NAME,
    agentLifetimeSeconds,
    debug: Boolean(env[ENV_VARS.debug]),
  };
}

/**
 * Load `.env` into process.env without overriding variables already set
 */
export function loadEnvFile(path: string = resolve(process.cwd(), '.env')): boolean {
  if (!existsSync(path)) {
    return false;
  }
  const result = loadDotenv({ path });
  if (result.error) {
    throw new ConfigError(`Could not load ${path}: ${result.error.message}`);
  }
  createLogger('Config').debug(`Loaded environment from ${path}`);
  return true;
}

/**
 * `.env` locations in load order; a variable from an earlier file wins.
 */
export function envFileCandidates(scriptDir: string, cwd: string = process.cwd()): string[] {
  return [...new Set([resolve(cwd, '.env'), resolve(scriptDir, '.env')])];
}

/**
 * Returns the files that were found and loaded
 */
export function loadEnvFiles(paths: string[]): string[] {
  return paths.filter((path) => loadEnvFile(path));
}

export function usage(): string {
  return `
Fetch a session SSH key from PAM and add it to the SSH agent.

Usage: pam-ssh-key [options]

Options:
  -s, --server <url>            PAM base URL, e.g. https://pam.example.com (env: ${ENV_VARS.baseUrl})
  -u, --username <name>         PAM username; prompted for when unset (env: ${ENV_VARS.username})
  -t, --agent-lifetime <sec>    Remove the key from the agent after this many seconds (env: ${ENV_VARS.agentLifetime})
  -h, --help                    Show this help

Environment:
  ${ENV_VARS.keyName}    Key file name under ~/.ssh (default: ${DEFAULT_KEY_NAME})
  ${ENV_VARS.debug}           Any value enables debug logging

Variables are also read from .env in the current directory, then from .env
next to the pam-ssh-key script. Variables already set are never overridden.

Keys that the SSH agent refuses are left in ~/.ssh/<key name>_<format>_<algorithm>.
`;
}
