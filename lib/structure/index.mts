/**
 * Structure - Public API
 *
 * Barrel exports for structure discovery.
 */

export { StructureLoader, parseStructure } from './StructureLoader.mjs';
export { ControlRegistry, type StateReference } from './ControlRegistry.mjs';
