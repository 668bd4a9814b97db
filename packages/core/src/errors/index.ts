/**
 * PAM Key Error Codes
 */
export const ErrorCodes = {
  CONFIG_INVALID: 'CONFIG_INVALID',
  ENVIRONMENT: 'ENVIRONMENT',
  AUTH_FAILED: 'AUTH_FAILED',
  FETCH_FAILED: 'FETCH_FAILED',
  INVALID_RESPONSE: 'INVALID_RESPONSE',
  INTERRUPTED: 'INTERRUPTED',
} as const;

export type ErrorCode = typeof ErrorCodes[keyof typeof ErrorCodes];

/**
 * Base class for PAM key errors
 */
export class PamKeyError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly hint?: string,
  ) {
    super(message);
    this.name = 'PamKeyError';
  }

  toErrorMessage() {
    return {
      code: this.code,
      message: this.message,
      hint: this.hint,
    };
  }
}

/**
 * Error: Required setting missing or unusable
 */
export class ConfigError extends PamKeyError {
  constructor(message: string, hint?: string, code: ErrorCode = ErrorCodes.CONFIG_INVALID) {
    super(code, message, hint);
    this.name = 'ConfigError';
  }
}

/**
 * Error: Process environment lacks something we need (e.g. home directory)
 */
export class EnvironmentError extends ConfigError {
  constructor(message: string, hint?: string) {
    super(message, hint, ErrorCodes.ENVIRONMENT);
    this.name = 'EnvironmentError';
  }
}

/**
 * Error: PAM rejected the logon request
 */
export class AuthError extends PamKeyError {
  constructor(
    public readonly status: number,
    public readonly body: string,
    hint?: string,
  ) {
    super(
      ErrorCodes.AUTH_FAILED,
      `Authentication failed. Status=${status}, response: ${body}`,
      hint ?? 'Check your username, password and second factor',
    );
    this.name = 'AuthError';
  }
}

/**
 * Error: PAM did not return cached SSH keys
 */
export class FetchError extends PamKeyError {
  constructor(
    public readonly status: number,
    public readonly body: string,
    hint?: string,
    code: ErrorCode = ErrorCodes.FETCH_FAILED,
    message?: string,
  ) {
    super(
      code,
      message ?? `Failed to get SSH key. Status=${status}, response: ${body}`,
      hint,
    );
    this.name = 'FetchError';
  }
}

/**
 * Error: PAM answered 200 but the payload is not a key bundle
 */
export class InvalidResponseError extends FetchError {
  constructor(reason: string, body: string) {
    super(
      200,
      body,
      'The PAM server may be running an unsupported API version',
      ErrorCodes.INVALID_RESPONSE,
      `Unexpected SSH key response: ${reason}`,
    );
    this.name = 'InvalidResponseError';
  }
}

/**
 * Error: Operator cancelled the run
 */
export class InterruptError extends PamKeyError {
  constructor(message: string = 'Interrupted.') {
    super(ErrorCodes.INTERRUPTED, message);
    this.name = 'InterruptError';
  }
}
