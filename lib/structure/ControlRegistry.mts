/**
 * Control Registry
 *
 * Flat map of every control and subcontrol, in registration order, plus a
 * reverse index from state references to the state they belong to.
 * Replaced wholesale on every structure load.
 */

import type { Control } from '../types.mjs';

export interface StateReference {
  controlUuid: string;
  state: string;
}

export class ControlRegistry {
  private controls: Map<string, Control> = new Map();
  private stateRefs: Map<string, StateReference> = new Map();

  /**
   * Replace the registry contents. The first control with a given uuid wins;
   * the uuids that were dropped are returned.
   */
  replace(controls: Control[]): string[] {
    const next = new Map<string, Control>();
    const refs = new Map<string, StateReference>();
    const duplicates: string[] = [];

    for (const control of controls) {
      if (next.has(control.uuid)) {
        duplicates.push(control.uuid);
        continue;
      }
      next.set(control.uuid, control);

      for (const [state, ref] of Object.entries(control.states)) {
        if (typeof ref === 'string' && ref !== control.uuid && !refs.has(ref)) {
          refs.set(ref, { controlUuid: control.uuid, state });
        }
      }
    }

    this.controls = next;
    this.stateRefs = refs;
    return duplicates;
  }

  get(uuid: string): Control | undefined {
    return this.controls.get(uuid);
  }

  has(uuid: string): boolean {
    return this.controls.has(uuid);
  }

  /**
   * Control and state name a state reference points at
   */
  resolveStateRef(ref: string): StateReference | undefined {
    return this.stateRefs.get(ref);
  }

  asMap(): ReadonlyMap<string, Control> {
    return this.controls;
  }

  get size(): number {
    return this.controls.size;
  }
}
