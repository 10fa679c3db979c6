/**
 * Miniserver Client Library - Public API
 *
 * This is the main entry point for the Miniserver client library.
 * Import from here to access all public types and utilities.
 */

// =============================================================================
// Types (from central types.mts)
// =============================================================================
export type {
  // Configuration
  ClientConfig,
  ResolvedClientConfig,
  // Logging
  Logger,
  LogLevel,
  LogSink,
  // Connection
  ConnectionState,
  TokenInfo,
  HttpResponse,
  HttpGetFn,
  // Controls & state
  Control,
  StateEvent,
  StateCallback,
  UnsubscribeFunction,
} from './types.mjs';

// =============================================================================
// Protocol constants & errors
// =============================================================================
export {
  CLIENT_CONFIG,
  ENDPOINTS,
  ERROR_CODES,
  ERROR_MESSAGES,
  PROTOCOL_CONFIG,
  MiniserverError,
  AuthenticationError,
  StructureError,
  TransportError,
  ProtocolError,
  type ErrorCode,
  type Envelope,
} from './MiniserverProtocol.mjs';

// =============================================================================
// Utilities
// =============================================================================
export * from './utils/index.mjs';

// =============================================================================
// Crypto
// =============================================================================
export * from './crypto/index.mjs';

// =============================================================================
// Connection
// =============================================================================
export * from './connection/index.mjs';

// =============================================================================
// Structure
// =============================================================================
export * from './structure/index.mjs';

// =============================================================================
// State Management
// =============================================================================
export { StateManager } from './state/index.mjs';

// =============================================================================
// Messaging
// =============================================================================
export * from './messaging/index.mjs';
