/**
 * Authenticator for the Miniserver
 *
 * Handles the token handshake:
 * 1. Fetch a one-time key
 * 2. Sign `user:sha1(password)` with HMAC-SHA1 using the decoded key
 * 3. Request a token with the signature, user, permission, request id and client info
 * 4. Keep the token until it is about to expire
 */

import crypto from 'node:crypto';
import { z } from 'zod';
import {
  AuthenticationError,
  CLIENT_CONFIG,
  ENDPOINTS,
  PROTOCOL_CONFIG,
  ProtocolError,
  parseEnvelope,
  parseJson,
} from '../MiniserverProtocol.mjs';
import { decodeKey, hmacSha1Hex, normalizePassword, sha1Hex } from '../crypto/Hash.mjs';
import type { HttpGetFn, HttpResponse, Logger, TokenInfo } from '../types.mjs';

// Re-export types for module consumers
export type { TokenInfo };

// ============================================================================
// Module-specific Types
// ============================================================================

export interface Credentials {
  username: string;
  password: string;
}

export interface AuthRequestParams {
  /** 2 = web, 4 = app */
  permission: number;
  /** Request-scoped identifier, a random UUID v4 when omitted */
  requestUuid?: string;
  info: string;
}

export const DEFAULT_AUTH_PARAMS: AuthRequestParams = {
  permission: CLIENT_CONFIG.PERMISSION_WEB,
  info: CLIENT_CONFIG.INFO,
};

/** Clock returning epoch seconds */
export type ClockFn = () => number;

export const nowSeconds: ClockFn = () => Date.now() / 1000;

// ============================================================================
// Handshake helpers
// ============================================================================

const EpochSchema = z.union([z.number(), z.string()]);

const KeyValueSchema = z.union([
  z.string(),
  z.number(),
  z
    .object({
      key: z.union([z.string(), z.number()]).optional(),
      value: z.union([z.string(), z.number()]).optional(),
    })
    .passthrough(),
]);

const TokenValueSchema = z.union([
  z.string(),
  z.object({ token: z.string(), validUntil: EpochSchema.optional() }).passthrough(),
]);

const FlatTokenSchema = z
  .object({ token: z.string().optional(), validUntil: EpochSchema.optional() })
  .passthrough();

function toEpoch(value: number | string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const epoch = Number(value);
  return Number.isFinite(epoch) && epoch > 0 ? epoch : undefined;
}

/**
 * HMAC the handshake signs: HMAC-SHA1(key, "user:sha1(password)")
 */
export function computeAuthHmac(username: string, password: string, key: string): string {
  const pwHash = sha1Hex(normalizePassword(password));
  return hmacSha1Hex(decodeKey(key), `${username}:${pwHash}`);
}

/**
 * Build the token request path
 *
 * The username is embedded verbatim; only the info string is percent-encoded.
 */
export function buildAuthPath(
  username: string,
  password: string,
  key: string,
  params: AuthRequestParams = DEFAULT_AUTH_PARAMS
): string {
  const hmac = computeAuthHmac(username, password, key);
  const requestUuid = params.requestUuid || crypto.randomUUID();
  const info = encodeURIComponent(params.info);

  return `${ENDPOINTS.TOKEN}/${hmac}/${username}/${params.permission}/${requestUuid}/${info}`;
}

/**
 * Extract the one-time key from a key response payload
 *
 * Newer servers nest the key as `{key: ...}` inside the envelope value.
 */
export function extractKey(payload: unknown): string {
  const envelope = parseEnvelope(payload);
  const parsed = KeyValueSchema.safeParse(envelope?.LL.value);

  let key: string | number | undefined;
  if (parsed.success) {
    const value = parsed.data;
    key = typeof value === 'object' ? value.key ?? value.value : value;
  }

  if (key === undefined || key === '') {
    throw new AuthenticationError('No key returned from Miniserver', payload);
  }
  return String(key);
}

/**
 * Extract the token and its expiry from a token response payload
 */
export function extractToken(payload: unknown, now: number): TokenInfo {
  let token: string | undefined;
  let validUntil: number | undefined;

  const envelope = parseEnvelope(payload);
  if (envelope) {
    const value = TokenValueSchema.safeParse(envelope.LL.value);
    if (value.success) {
      if (typeof value.data === 'string') {
        token = value.data;
      } else {
        token = value.data.token;
        validUntil = toEpoch(value.data.validUntil);
      }
    }
    validUntil ??= toEpoch(envelope.LL.controlInfo?.validUntil);
  }

  const flat = FlatTokenSchema.safeParse(payload);
  if (flat.success) {
    token ||= flat.data.token;
    validUntil ??= toEpoch(flat.data.validUntil);
  }

  if (!token) {
    throw new AuthenticationError('No token returned from Miniserver', payload);
  }

  return {
    token,
    validUntil: validUntil ?? now + PROTOCOL_CONFIG.TOKEN.DEFAULT_LIFETIME,
  };
}

/**
 * Whether a token is missing or within the refresh threshold of expiry
 */
export function isTokenExpiring(
  token: TokenInfo | null,
  now: number,
  threshold: number = PROTOCOL_CONFIG.TOKEN.REFRESH_THRESHOLD
): boolean {
  if (!token) return true;
  return now >= token.validUntil - threshold;
}

// ============================================================================
// Authenticator Class
// ============================================================================

export class Authenticator {
  private credentials: Credentials;
  private params: AuthRequestParams;
  private httpGet: HttpGetFn;
  private logger: Logger;
  private clock: ClockFn;
  private token: TokenInfo | null = null;
  private pending: Promise<TokenInfo> | null = null;

  constructor(
    credentials: Credentials,
    params: AuthRequestParams,
    httpGet: HttpGetFn,
    logger: Logger,
    clock: ClockFn = nowSeconds
  ) {
    this.credentials = credentials;
    this.params = params;
    this.httpGet = httpGet;
    this.logger = logger;
    this.clock = clock;
  }

  /**
   * Current token, or null before the first authentication
   */
  getToken(): TokenInfo | null {
    return this.token;
  }

  /**
   * Whether the next request has to re-authenticate first
   */
  needsRefresh(): boolean {
    return isTokenExpiring(this.token, this.clock());
  }

  /**
   * Bearer header for authenticated REST calls
   */
  authorizationHeader(): Record<string, string> {
    return this.token ? { Authorization: `Bearer ${this.token.token}` } : {};
  }

  /**
   * Drop the current token
   */
  reset(): void {
    this.token = null;
  }

  /**
   * Return a valid token, re-authenticating when it is missing or expiring.
   * Concurrent callers share a single in-flight authentication.
   */
  async ensureToken(): Promise<TokenInfo> {
    if (this.token && !this.needsRefresh()) {
      return this.token;
    }

    if (!this.pending) {
      this.pending = this.authenticate().finally(() => {
        this.pending = null;
      });
    }
    return this.pending;
  }

  /**
   * Run the full handshake and replace the current token
   */
  async authenticate(): Promise<TokenInfo> {
    const { username, password } = this.credentials;
    this.logger.debug('Authenticating with HMAC token flow');

    const key = await this.fetchKey();
    const path = buildAuthPath(username, password, key, this.params);
    const response = await this.httpGet(path);
    const payload = this.readPayload(response, 'authenticate');

    this.token = extractToken(payload, this.clock());
    this.logger.debug(`Authenticated, token valid until ${this.token.validUntil}`);
    return this.token;
  }

  /**
   * Fetch the one-time key used to sign the credentials
   */
  async fetchKey(): Promise<string> {
    const response = await this.httpGet(`${ENDPOINTS.KEY}/${this.credentials.username}`);
    const payload = this.readPayload(response, 'fetch key');
    const key = extractKey(payload);
    this.logger.debug(`Key retrieved (length=${key.length})`);
    return key;
  }

  private readPayload(response: HttpResponse, action: string): unknown {
    if (response.status !== 200) {
      this.logger.error(`Failed to ${action}: HTTP ${response.status}`);
      throw new AuthenticationError(`Failed to ${action}: ${response.status}`, {
        status: response.status,
      });
    }

    try {
      return parseJson(response.body);
    } catch (error) {
      if (error instanceof ProtocolError) {
        this.logger.error(`Invalid response while trying to ${action}`);
        throw new AuthenticationError(`Invalid response while trying to ${action}`, error);
      }
      throw error;
    }
  }
}
