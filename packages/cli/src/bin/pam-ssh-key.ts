#!/usr/bin/env node
/**
 * pam-ssh-key CLI
 *
 * Fetches the cached session SSH key from PAM and adds it to the SSH agent.
 */

import { dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { envFileCandidates, loadEnvFiles } from '../config.js';
import { runCli } from '../main.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

process.on('SIGINT', () => {
  console.error('\nInterrupted.');
  process.exit(1);
});

let exitCode: number;
try {
  loadEnvFiles(envFileCandidates(__dirname));
  exitCode = await runCli(process.argv.slice(2));
} catch (error) {
  console.error(error instanceof Error ? error.message : String(error));
  exitCode = 1;
}
process.exit(exitCode);
