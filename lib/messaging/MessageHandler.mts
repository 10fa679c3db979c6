/**
 * Message Handler for the Miniserver streaming channel
 *
 * Decodes frames into state events and hands them to the state manager.
 * A frame is a flat JSON object mapping control (or state) ids to values.
 */

import { TextDecoder } from 'node:util';
import { z } from 'zod';
import { ProtocolError, parseJson } from '../MiniserverProtocol.mjs';
import type { ControlRegistry } from '../structure/ControlRegistry.mjs';
import type { StateManager } from '../state/StateManager.mjs';
import type { Logger, StateEvent } from '../types.mjs';

// Re-export types for module consumers
export type { StateEvent };

const FrameSchema = z.record(z.unknown());

// ============================================================================
// MessageHandler Class
// ============================================================================

export class MessageHandler {
  private registry: ControlRegistry;
  private stateManager: StateManager;
  private logger: Logger;
  private utf8 = new TextDecoder('utf-8', { fatal: true });

  constructor(registry: ControlRegistry, stateManager: StateManager, logger: Logger) {
    this.registry = registry;
    this.stateManager = stateManager;
    this.logger = logger;
  }

  /**
   * Process a raw frame from the channel. Frames that cannot be decoded
   * are dropped; the dispatched events are returned.
   */
  processFrame(data: Buffer, isBinary: boolean): StateEvent[] {
    const text = this.decodeFrame(data, isBinary);
    if (text === undefined) return [];
    return this.processText(text);
  }

  /**
   * Process a text frame
   */
  processText(text: string): StateEvent[] {
    let frame: Record<string, unknown>;
    try {
      frame = this.parseFrame(text);
    } catch (error) {
      if (error instanceof ProtocolError) {
        this.logger.debug(`Dropped frame: ${error.message}`);
        return [];
      }
      throw error;
    }

    const events = this.toEvents(frame);
    for (const event of events) {
      this.stateManager.apply(event);
    }
    return events;
  }

  /**
   * Map a decoded frame onto registered controls and state references
   */
  toEvents(frame: Record<string, unknown>): StateEvent[] {
    const events: StateEvent[] = [];

    for (const [key, value] of Object.entries(frame)) {
      if (this.registry.has(key)) {
        events.push({ controlUuid: key, state: '', value });
        continue;
      }

      const ref = this.registry.resolveStateRef(key);
      if (ref) {
        events.push({ controlUuid: ref.controlUuid, state: ref.state, value });
      }
    }

    return events;
  }

  private decodeFrame(data: Buffer, isBinary: boolean): string | undefined {
    if (!isBinary) {
      return data.toString('utf8');
    }

    try {
      return this.utf8.decode(data);
    } catch {
      this.logger.debug(`Dropped non UTF-8 binary frame (${data.length} bytes)`);
      return undefined;
    }
  }

  private parseFrame(text: string): Record<string, unknown> {
    const payload = parseJson(text);
    const frame = FrameSchema.safeParse(payload);
    if (!frame.success) {
      throw new ProtocolError('Frame is not a JSON object', payload);
    }
    return frame.data;
  }
}
