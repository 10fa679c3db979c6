/**
 * Connection - Public API
 *
 * Barrel exports for connection management.
 */

export { MiniserverClient, resolveConfig } from './MiniserverClient.mjs';

export {
  ConnectionManager,
  type ConnectionOptions,
  type OnCloseFn,
  type OnFrameFn,
  type OnStateChangeFn,
} from './ConnectionManager.mjs';

export {
  Authenticator,
  DEFAULT_AUTH_PARAMS,
  buildAuthPath,
  computeAuthHmac,
  extractKey,
  extractToken,
  isTokenExpiring,
  nowSeconds,
  type AuthRequestParams,
  type ClockFn,
  type Credentials,
} from './Authenticator.mjs';

export { HttpSession, type HttpSessionOptions } from './HttpSession.mjs';
