/**
 * Miniserver Protocol Constants
 *
 * This module defines the endpoint paths, timings, client defaults, error
 * codes and the response envelope used when talking to a Miniserver.
 */

import { z } from 'zod';

/**
 * HTTP and WebSocket endpoints
 */
export const ENDPOINTS = {
  KEY: '/jdev/sys/getkey2',
  TOKEN: '/jdev/sys/getjwt',
  STRUCTURE: '/data/LoxAPP3.json',
  COMMAND_PREFIX: '/jdev/',
  WEBSOCKET: '/ws/rfc6455',
} as const;

/**
 * Client defaults
 */
export const CLIENT_CONFIG = {
  INFO: 'miniserver-client',
  PERMISSION_WEB: 2,
  PERMISSION_APP: 4,
  DEFAULT_PORT: 80,
  DEFAULT_TLS_PORT: 443,
} as const;

/**
 * Protocol Configuration
 */
export const PROTOCOL_CONFIG = {
  TOKEN: {
    REFRESH_THRESHOLD: 300, // seconds before expiry
    DEFAULT_LIFETIME: 1800, // seconds, when the server sends no expiry
  },
  TIMEOUTS: {
    HEARTBEAT: 30000, // 30 seconds
    RECONNECT_DELAY: 5000, // 5 seconds
  },
  SUCCESS_CODE: '200',
  COMPOSITE_SEPARATOR: '/',
} as const;

/**
 * Error Codes
 */
export const ERROR_CODES = {
  AUTHENTICATION_FAILED: 'AUTHENTICATION_FAILED',
  STRUCTURE_INVALID: 'STRUCTURE_INVALID',
  TRANSPORT_FAILED: 'TRANSPORT_FAILED',
  PROTOCOL_INVALID: 'PROTOCOL_INVALID',
  NOT_STARTED: 'NOT_STARTED',
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

/**
 * Error Messages
 */
export const ERROR_MESSAGES: Record<ErrorCode, string> = {
  [ERROR_CODES.AUTHENTICATION_FAILED]: 'Authentication with the Miniserver failed',
  [ERROR_CODES.STRUCTURE_INVALID]: 'Structure document could not be loaded',
  [ERROR_CODES.TRANSPORT_FAILED]: 'Miniserver could not be reached',
  [ERROR_CODES.PROTOCOL_INVALID]: 'Unexpected message from the Miniserver',
  [ERROR_CODES.NOT_STARTED]: 'Miniserver client not started',
};

/**
 * Base error with code and details
 */
export class MiniserverError extends Error {
  readonly code: ErrorCode;
  readonly details: unknown;

  constructor(code: ErrorCode, message?: string, details: unknown = null) {
    super(message ?? ERROR_MESSAGES[code]);
    this.name = 'MiniserverError';
    this.code = code;
    this.details = details;
  }
}

/** Bad credentials or a malformed key/token response */
export class AuthenticationError extends MiniserverError {
  constructor(message?: string, details: unknown = null) {
    super(ERROR_CODES.AUTHENTICATION_FAILED, message, details);
    this.name = 'AuthenticationError';
  }
}

/** Malformed or unreachable topology document */
export class StructureError extends MiniserverError {
  constructor(message?: string, details: unknown = null) {
    super(ERROR_CODES.STRUCTURE_INVALID, message, details);
    this.name = 'StructureError';
  }
}

/** Network or channel failure */
export class TransportError extends MiniserverError {
  constructor(message?: string, details: unknown = null) {
    super(ERROR_CODES.TRANSPORT_FAILED, message, details);
    this.name = 'TransportError';
  }
}

/** Frame or response that cannot be decoded */
export class ProtocolError extends MiniserverError {
  constructor(message?: string, details: unknown = null) {
    super(ERROR_CODES.PROTOCOL_INVALID, message, details);
    this.name = 'ProtocolError';
  }
}

// ============================================================================
// Response Envelope
// ============================================================================

const CodeSchema = z.union([z.string(), z.number()]);

/**
 * Every jdev response wraps its payload as `{LL: {value, code|Code, controlInfo}}`
 */
export const EnvelopeSchema = z
  .object({
    LL: z
      .object({
        value: z.unknown(),
        code: CodeSchema.optional(),
        Code: CodeSchema.optional(),
        controlInfo: z
          .object({ validUntil: z.union([z.number(), z.string()]).optional() })
          .passthrough()
          .optional(),
      })
      .passthrough(),
  })
  .passthrough();

export type Envelope = z.infer<typeof EnvelopeSchema>;

/**
 * Parse a response body as JSON
 *
 * @throws ProtocolError if the body is not JSON
 */
export function parseJson(body: string): unknown {
  try {
    const payload: unknown = JSON.parse(body);
    return payload;
  } catch (error) {
    throw new ProtocolError('Response was not valid JSON', error);
  }
}

/**
 * Return the envelope if the payload has one
 */
export function parseEnvelope(payload: unknown): Envelope | undefined {
  const result = EnvelopeSchema.safeParse(payload);
  return result.success ? result.data : undefined;
}

/**
 * Status code of an envelope, normalised to a string
 */
export function envelopeCode(envelope: Envelope): string | undefined {
  const code = envelope.LL.Code ?? envelope.LL.code;
  return code === undefined ? undefined : String(code);
}

/**
 * Whether an envelope reports success (string or numeric 200)
 */
export function isSuccessEnvelope(envelope: Envelope): boolean {
  return envelopeCode(envelope) === PROTOCOL_CONFIG.SUCCESS_CODE;
}
