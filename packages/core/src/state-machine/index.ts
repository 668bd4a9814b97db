import type { KeyFetchState } from '../types/index.js';

// ========== Transition Table ==========

const KEY_FETCH_TRANSITIONS: Record<KeyFetchState, KeyFetchState[]> = {
  unauthenticated: ['authenticated', 'failed'],
  authenticated: ['fetched', 'failed'],
  fetched: ['purging', 'failed'],
  purging: ['installing', 'done', 'failed'],
  installing: ['installing', 'done', 'failed'],
  done: [],
  failed: [],
};

export function isTerminalKeyFetchState(state: KeyFetchState): boolean {
  return KEY_FETCH_TRANSITIONS[state].length === 0;
}

export function isValidKeyFetchTransition(
  from: KeyFetchState,
  to: KeyFetchState,
): boolean {
  return KEY_FETCH_TRANSITIONS[from].includes(to);
}

// ========== Events ==========

export type KeyFetchEvent =
  | { type: 'AUTHENTICATED' }
  | { type: 'FETCHED'; keyCount: number }
  | { type: 'PURGE_STARTED' }
  | { type: 'INSTALL_STARTED'; index: number }
  | { type: 'COMPLETE' }
  | { type: 'FAIL'; error: Error };

export interface KeyFetchTransitionResult {
  success: boolean;
  newState: KeyFetchState;
  error?: string;
}

// ========== State Machine ==========

/**
 * Tracks one authenticate → fetch → purge → install run.
 * Nothing is retried: once failed, the run stays failed.
 */
export class KeyFetchStateMachine {
  private state: KeyFetchState = 'unauthenticated';

  getState(): KeyFetchState {
    return this.state;
  }

  isTerminal(): boolean {
    return isTerminalKeyFetchState(this.state);
  }

  transition(event: KeyFetchEvent): KeyFetchTransitionResult {
    const targetState = this.getTargetState(event);

    if (!targetState) {
      return {
        success: false,
        newState: this.state,
        error: `Invalid event ${event.type} for state ${this.state}`,
      };
    }

    if (!isValidKeyFetchTransition(this.state, targetState)) {
      return {
        success: false,
        newState: this.state,
        error: `Invalid transition from ${this.state} to ${targetState}`,
      };
    }

    this.state = targetState;
    return {
      success: true,
      newState: this.state,
    };
  }

  private getTargetState(event: KeyFetchEvent): KeyFetchState | null {
    switch (event.type) {
      case 'AUTHENTICATED':
        return this.state === 'unauthenticated' ? 'authenticated' : null;

      case 'FETCHED':
        return this.state === 'authenticated' ? 'fetched' : null;

      case 'PURGE_STARTED':
        return this.state === 'fetched' ? 'purging' : null;

      case 'INSTALL_STARTED':
        return this.state === 'purging' || this.state === 'installing'
          ? 'installing'
          : null;

      case 'COMPLETE':
        return this.state === 'purging' || this.state === 'installing'
          ? 'done'
          : null;

      case 'FAIL':
        return isTerminalKeyFetchState(this.state) ? null : 'failed';

      default:
        return null;
    }
  }
}
