/**
 * SshAddAgent Tests
 *
 * These don't need a running agent: `true` and `false` stand in for ssh-add.
 */

import { describe, it, expect } from 'vitest';
import type { Logger } from '@pamkey/core';
import { SshAddAgent, buildSshAddArgs } from '../src/ssh-agent.js';

function recordingLogger(): Logger & { lines: string[] } {
  const lines: string[] = [];
  return {
    lines,
    debug: (message) => lines.push(`debug ${message}`),
    info: (message) => lines.push(`info ${message}`),
    warn: (message) => lines.push(`warn ${message}`),
    error: (message) => lines.push(`error ${message}`),
  };
}

describe('buildSshAddArgs', () => {
  it('should pass only the key path by default', () => {
    expect(buildSshAddArgs('/h/.ssh/id_pam_session_raw_rsa')).toEqual(['/h/.ssh/id_pam_session_raw_rsa']);
  });

  it('should add a lifetime when given', () => {
    expect(buildSshAddArgs('/k', 3600)).toEqual(['-t', '3600', '/k']);
  });

  it('should round the lifetime down and keep it positive', () => {
    expect(buildSshAddArgs('/k', 59.9)).toEqual(['-t', '59', '/k']);
    expect(buildSshAddArgs('/k', -5)).toEqual(['-t', '1', '/k']);
  });
});

describe('SshAddAgent', () => {
  it('should report success when the command exits 0', async () => {
    const logger = recordingLogger();
    const agent = new SshAddAgent({ command: 'true' }, logger);

    await expect(agent.tryRegister('/tmp/does-not-matter')).resolves.toBe(true);
    expect(logger.lines[0]?.startsWith('info Added key to SSH agent:')).toBe(true);
  });

  it('should report failure when the command exits non-zero', async () => {
    const logger = recordingLogger();
    const agent = new SshAddAgent({ command: 'false' }, logger);

    await expect(agent.tryRegister('/tmp/does-not-matter')).resolves.toBe(false);
    expect(logger.lines).toEqual(['error Failed to add key to SSH agent: false exited with code 1']);
  });

  it('should report failure when the command cannot be started', async () => {
    const logger = recordingLogger();
    const agent = new SshAddAgent({ command: 'pamkey-no-such-ssh-add' }, logger);

    await expect(agent.tryRegister('/tmp/does-not-matter')).resolves.toBe(false);
    expect(logger.lines[0]).toContain('error Failed to run pamkey-no-such-ssh-add');
  });
});
