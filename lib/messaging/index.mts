/**
 * Messaging - Public API
 *
 * Barrel exports for frame decoding and command encoding.
 */

export { MessageHandler, type StateEvent } from './MessageHandler.mjs';

export {
  buildCommandPath,
  buildStatePath,
  resolveAddress,
  toRequestPath,
  type CommandValue,
} from './Commands.mjs';
