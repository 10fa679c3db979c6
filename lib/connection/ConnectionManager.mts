/**
 * Connection Manager for the Miniserver streaming channel
 *
 * Handles WebSocket lifecycle:
 * - Channel establishment
 * - Heartbeat pings
 * - Frame delivery
 * - Close detection (deliberate vs. unexpected)
 *
 * Reconnecting is left to the owner, which has to refresh the token first.
 */

import WebSocket from 'ws';
import { PROTOCOL_CONFIG, TransportError } from '../MiniserverProtocol.mjs';
import type { ConnectionState, Logger } from '../types.mjs';

// Re-export types for module consumers
export type { ConnectionState };

// ============================================================================
// Module-specific Types (callbacks)
// ============================================================================

/** Callback for a received frame */
export type OnFrameFn = (data: Buffer, isBinary: boolean) => void;

/** Callback for connection state change */
export type OnStateChangeFn = (state: ConnectionState) => void;

/** Callback for channel close; shouldReconnect is false for deliberate closes */
export type OnCloseFn = (code: number, reason: string, shouldReconnect: boolean) => void;

export interface ConnectionOptions {
  verifySsl: boolean;
  heartbeatInterval?: number;
  logger: Logger;
}

function toBuffer(data: WebSocket.RawData): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(data);
}

// ============================================================================
// ConnectionManager Class
// ============================================================================

export class ConnectionManager {
  private ws: WebSocket | null = null;
  private state: ConnectionState = 'disconnected';
  private closingDeliberately: boolean = false;
  private heartbeatTimer: ReturnType<typeof setInterval> | null = null;
  private readonly verifySsl: boolean;
  private readonly heartbeatInterval: number;
  private readonly logger: Logger;

  private onFrame?: OnFrameFn;
  private onStateChange?: OnStateChangeFn;
  private onClose?: OnCloseFn;

  constructor(options: ConnectionOptions) {
    this.verifySsl = options.verifySsl;
    this.heartbeatInterval = options.heartbeatInterval ?? PROTOCOL_CONFIG.TIMEOUTS.HEARTBEAT;
    this.logger = options.logger;
  }

  /**
   * Set callback for received frames
   */
  setOnFrame(callback: OnFrameFn): void {
    this.onFrame = callback;
  }

  /**
   * Set callback for state changes
   */
  setOnStateChange(callback: OnStateChangeFn): void {
    this.onStateChange = callback;
  }

  /**
   * Set callback for channel close
   */
  setOnClose(callback: OnCloseFn): void {
    this.onClose = callback;
  }

  /**
   * Get current connection state
   */
  getState(): ConnectionState {
    return this.state;
  }

  /**
   * Check if the channel is open
   */
  isConnected(): boolean {
    return this.ws !== null && this.ws.readyState === WebSocket.OPEN;
  }

  /**
   * Open the channel. Resolves once it is open.
   *
   * @throws TransportError if the channel fails before opening
   */
  open(url: string): Promise<void> {
    if (this.ws) {
      return Promise.reject(new TransportError('Channel already open'));
    }

    return new Promise((resolve, reject) => {
      let opened = false;
      this.closingDeliberately = false;
      this.setState('connecting');

      const ws = new WebSocket(url, {
        perMessageDeflate: false,
        rejectUnauthorized: this.verifySsl,
      });
      this.ws = ws;

      ws.on('open', () => {
        opened = true;
        this.logger.info('Streaming channel open');
        this.setState('connected');
        this.startHeartbeat(ws);
        resolve();
      });

      ws.on('message', (data: WebSocket.RawData, isBinary: boolean) => {
        this.onFrame?.(toBuffer(data), isBinary);
      });

      ws.on('error', (err: Error) => {
        if (!opened) {
          reject(new TransportError(`Unable to open streaming channel: ${err.message}`, err));
          return;
        }
        this.logger.warn(`Streaming channel error: ${err.message}`);
      });

      ws.on('close', (code: number, reason: Buffer) => {
        const reasonStr = reason.toString() || 'No reason';
        this.stopHeartbeat();
        if (this.ws === ws) {
          this.ws = null;
        }
        this.setState('disconnected');

        if (!opened) {
          reject(new TransportError(`Streaming channel closed before opening (${code})`));
          return;
        }

        const shouldReconnect = !this.closingDeliberately;
        this.logger.info(`Streaming channel closed. Code: ${code}, Reason: ${reasonStr}`);
        this.onClose?.(code, reasonStr, shouldReconnect);
      });
    });
  }

  /**
   * Close the channel and wait until it is closed. Safe to call repeatedly.
   */
  async close(): Promise<void> {
    const ws = this.ws;
    if (!ws) return;

    this.closingDeliberately = true;
    this.stopHeartbeat();

    if (ws.readyState === WebSocket.CLOSED) {
      this.ws = null;
      return;
    }

    this.setState('closing');
    await new Promise<void>((resolve) => {
      ws.once('close', () => resolve());
      if (ws.readyState === WebSocket.CONNECTING) {
        ws.terminate();
      } else if (ws.readyState === WebSocket.OPEN) {
        ws.close();
      }
    });
  }

  private setState(state: ConnectionState): void {
    this.state = state;
    this.onStateChange?.(state);
  }

  /**
   * Ping the Miniserver periodically. A ping still unanswered at the next
   * tick terminates the socket, which surfaces as an unexpected close.
   */
  private startHeartbeat(ws: WebSocket): void {
    this.stopHeartbeat();

    let pongReceived = true;
    ws.on('pong', () => {
      pongReceived = true;
    });

    this.heartbeatTimer = setInterval(() => {
      if (ws.readyState !== WebSocket.OPEN) return;

      if (!pongReceived) {
        this.logger.warn('No pong within heartbeat interval, dropping channel');
        ws.terminate();
        return;
      }

      pongReceived = false;
      ws.ping();
    }, this.heartbeatInterval);
  }

  private stopHeartbeat(): void {
    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = null;
    }
  }
}
