/**
 * State Management - Public API
 *
 * Barrel exports for state caching and listener fan-out.
 */

export {
  StateManager,
  type StateCallback,
  type StateEvent,
  type UnsubscribeFunction,
} from './StateManager.mjs';
