/**
 * @pamkey/core
 *
 * Shared types, error taxonomy and run state machine
 */

// Types
export * from './types/index.js';

// Utils
export * from './utils/index.js';

// State Machine
export {
  KeyFetchStateMachine,
  isTerminalKeyFetchState,
  isValidKeyFetchTransition,
  type KeyFetchEvent,
  type KeyFetchTransitionResult,
} from './state-machine/index.js';

// Errors
export * from './errors/index.js';
