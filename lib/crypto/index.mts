/**
 * Crypto module exports
 *
 * Hash and key decoding helpers for the token handshake.
 */

export {
  decodeKey,
  hmacSha1Hex,
  isHexString,
  normalizePassword,
  sha1Hex,
} from './Hash.mjs';
