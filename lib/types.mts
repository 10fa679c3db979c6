/**
 * Miniserver Client - Shared TypeScript Interfaces
 *
 * This file contains all shared type definitions used across the library.
 * All modules should import types from here to avoid duplication.
 */

import type { Dispatcher } from 'undici';

// =============================================================================
// Configuration Types
// =============================================================================

/**
 * Configuration for a MiniserverClient
 */
export interface ClientConfig {
  /** Hostname or IP of the Miniserver */
  host: string;
  username: string;
  password: string;
  /** Defaults to 443 with TLS, 80 without */
  port?: number;
  /** Use https/wss (default: true) */
  useTls?: boolean;
  /** Verify the server certificate (default: true) */
  verifySsl?: boolean;
  /** Externally owned HTTP dispatcher; never closed by the client */
  dispatcher?: Dispatcher;
  /** Permission level requested for the token (default: 2, web) */
  permission?: number;
  /** Client info string sent with the token request */
  clientInfo?: string;
  /** Delay before reopening a dropped channel in ms (default: 5000) */
  reconnectDelay?: number;
  /** Heartbeat ping interval in ms (default: 30000) */
  heartbeatInterval?: number;
  /** Optional log sink (defaults to the console) */
  logger?: LogSink;
  /** Emit debug output */
  verbose?: boolean;
}

/**
 * Config with every default applied
 */
export type ResolvedClientConfig = Required<
  Omit<ClientConfig, 'dispatcher' | 'logger'>
> &
  Pick<ClientConfig, 'dispatcher' | 'logger'>;

// =============================================================================
// Logging Types
// =============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** Receives every emitted log line */
export type LogSink = (level: LogLevel, message: string, ...args: unknown[]) => void;

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

// =============================================================================
// Connection Types
// =============================================================================

/**
 * Streaming channel states
 */
export type ConnectionState =
  | 'disconnected'
  | 'connecting'
  | 'connected'
  | 'closing';

/**
 * Authentication token and expiry (epoch seconds)
 */
export interface TokenInfo {
  readonly token: string;
  readonly validUntil: number;
}

/**
 * Plain HTTP response as seen by the protocol modules
 */
export interface HttpResponse {
  status: number;
  body: string;
}

/** Issues a GET against the Miniserver for a path relative to its base URL */
export type HttpGetFn = (
  path: string,
  headers?: Record<string, string>
) => Promise<HttpResponse>;

// =============================================================================
// Control Types
// =============================================================================

/**
 * Addressable device/endpoint from the structure document
 */
export interface Control {
  uuid: string;
  name: string;
  type: string;
  room: string | null;
  category: string | null;
  states: Record<string, unknown>;
  details: Record<string, unknown>;
}

/**
 * State change for a control
 */
export interface StateEvent {
  controlUuid: string;
  /** Logical state name, empty when the key was the control uuid itself */
  state: string;
  value: unknown;
}

/**
 * State listener callback
 */
export type StateCallback = (event: StateEvent) => void | Promise<void>;

/**
 * Unsubscribe function returned when adding listeners
 */
export type UnsubscribeFunction = () => void;
