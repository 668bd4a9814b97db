import { readdir, unlink } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';
import { EnvironmentError, type KeyRecord } from '@pamkey/core';

export const DEFAULT_KEY_NAME = 'id_pam_session';

/**
 * `<home>/.ssh/<keyName>`; every key file of a run is named `<prefix>_<format>_<algorithm>`.
 */
export function resolveKeyPathPrefix(
  env: NodeJS.ProcessEnv = process.env,
  keyName: string = DEFAULT_KEY_NAME,
): string {
  const home = env['HOME'] || env['USERPROFILE'];
  if (!home) {
    throw new EnvironmentError(
      "Could not determine current user's home directory.",
      'Check your HOME/USERPROFILE environment variables.',
    );
  }
  return join(home, '.ssh', keyName);
}

/**
 * Throws when format or algorithm would place the file outside the prefix directory.
 */
export function keyFilePath(prefix: string, record: KeyRecord): string {
  const path = `${prefix}_${record.format.toLowerCase()}_${record.algorithm.toLowerCase()}`;
  if (dirname(path) !== dirname(prefix)) {
    throw new Error(
      `Key format '${record.format}' / algorithm '${record.algorithm}' cannot be used in a file name`,
    );
  }
  return path;
}

/**
 * Delete every `<prefix>_*` file. Returns the deleted paths; a missing
 * directory or no matches yields an empty list.
 */
export async function purgeStaleKeys(prefix: string): Promise<string[]> {
  if (!prefix) {
    throw new Error('purgeStaleKeys: prefix must be set');
  }

  const dir = dirname(prefix);
  const namePrefix = `${basename(prefix)}_`;

  let entries: string[];
  try {
    entries = await readdir(dir);
  } catch (error) {
    if (isNotFound(error)) {
      return [];
    }
    throw error;
  }

  const removed: string[] = [];
  for (const entry of entries.filter((name) => name.startsWith(namePrefix)).sort()) {
    const path = join(dir, entry);
    try {
      await unlink(path);
      removed.push(path);
    } catch (error) {
      // Already gone
      if (!isNotFound(error)) {
        throw error;
      }
    }
  }
  return removed;
}

export function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
