/**
 * State Manager for the Miniserver client
 *
 * Caches the last value per control/state and fans state events out to
 * listeners in registration order.
 */

import type {
  Logger,
  StateCallback,
  StateEvent,
  UnsubscribeFunction,
} from '../types.mjs';

// Re-export types for module consumers
export type { StateCallback, StateEvent, UnsubscribeFunction };

// ============================================================================
// StateManager Class
// ============================================================================

export class StateManager {
  private values: Map<string, Map<string, unknown>> = new Map();
  private listeners: StateCallback[] = [];
  private logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger;
  }

  /**
   * Add a state listener; returns a function that removes it again
   */
  addListener(callback: StateCallback): UnsubscribeFunction {
    this.listeners.push(callback);
    this.logger.debug(`Added state listener (${this.listeners.length} total)`);
    return () => {
      this.removeListener(callback);
    };
  }

  /**
   * Remove a state listener
   */
  removeListener(callback: StateCallback): boolean {
    const index = this.listeners.indexOf(callback);
    if (index === -1) return false;

    this.listeners.splice(index, 1);
    return true;
  }

  get listenerCount(): number {
    return this.listeners.length;
  }

  /**
   * Cached value of a control, or of one of its named states
   */
  getValue(controlUuid: string, state: string = ''): unknown {
    return this.values.get(controlUuid)?.get(state);
  }

  hasValue(controlUuid: string, state: string = ''): boolean {
    return this.values.get(controlUuid)?.has(state) ?? false;
  }

  /**
   * Cache the event's value and notify every listener
   */
  apply(event: StateEvent): void {
    let controlValues = this.values.get(event.controlUuid);
    if (!controlValues) {
      controlValues = new Map();
      this.values.set(event.controlUuid, controlValues);
    }
    controlValues.set(event.state, event.value);

    this.triggerListeners(event);
  }

  /**
   * Drop every cached value
   */
  clear(): void {
    this.values.clear();
  }

  private triggerListeners(event: StateEvent): void {
    // Copy so listeners may unsubscribe while being notified
    for (const callback of [...this.listeners]) {
      try {
        const result = callback(event);
        if (result instanceof Promise) {
          result.catch((error: unknown) => {
            this.logger.error(`Error in state listener for ${event.controlUuid}:`, error);
          });
        }
      } catch (error) {
        this.logger.error(`Error in state listener for ${event.controlUuid}:`, error);
      }
    }
  }
}
