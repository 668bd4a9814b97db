/**
 * Console logging with a bracketed scope prefix, e.g. `[PamKey:Client] ...`.
 * Debug lines are dropped unless enabled (the CLI turns them on via DEBUG).
 */

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

let debugEnabled = Boolean(process.env['DEBUG']);

export function setDebugLogging(enabled: boolean): void {
  debugEnabled = enabled;
}

export function createLogger(scope: string): Logger {
  const prefix = `[PamKey:${scope}]`;
  return {
    debug: (message) => {
      if (debugEnabled) {
        console.debug(`${prefix} ${message}`);
      }
    },
    info: (message) => console.log(`${prefix} ${message}`),
    warn: (message) => console.warn(`${prefix} ${message}`),
    error: (message) => console.error(`${prefix} ${message}`),
  };
}
