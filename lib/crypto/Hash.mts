/**
 * Hash utilities for Miniserver authentication
 *
 * The token handshake hashes the password with SHA1 and signs
 * `user:pwHash` with HMAC-SHA1 keyed by the one-time key from the server.
 */

import crypto from 'node:crypto';

const HEX_REGEX = /^[0-9a-fA-F]+$/;

/**
 * Whether a string is non-empty, even-length hexadecimal
 */
export function isHexString(value: string): boolean {
  return value.length > 0 && value.length % 2 === 0 && HEX_REGEX.test(value);
}

function isAscii(bytes: Buffer): boolean {
  return bytes.every((byte) => byte < 0x80);
}

/**
 * Decode the one-time key into HMAC key bytes
 *
 * The server may send the key as plain text, as hex, or as hex of ASCII
 * text that is itself hex. The last form is decoded twice, never more.
 *
 * @example
 * decodeKey('6162')     // Buffer 'ab'
 * decodeKey('36313632') // Buffer 'ab' (hex of "6162")
 * decodeKey('secret')   // Buffer 'secret'
 */
export function decodeKey(keyStr: string): Buffer {
  const key = keyStr.trim();

  if (!isHexString(key)) {
    return Buffer.from(key, 'utf8');
  }

  const decoded = Buffer.from(key, 'hex');

  if (isAscii(decoded)) {
    const inner = decoded.toString('ascii').trim();
    if (isHexString(inner)) {
      return Buffer.from(inner, 'hex');
    }
  }

  return decoded;
}

/**
 * Lowercase hex SHA1 of a UTF-8 string
 */
export function sha1Hex(data: string): string {
  return crypto.createHash('sha1').update(data, 'utf8').digest('hex');
}

/**
 * Lowercase hex HMAC-SHA1 of a UTF-8 message
 */
export function hmacSha1Hex(key: Buffer, message: string): string {
  return crypto.createHmac('sha1', key).update(message, 'utf8').digest('hex');
}

/**
 * Password as hashed by the handshake: trailing CR/LF removed, nothing else
 */
export function normalizePassword(password: string): string {
  return password.replace(/[\r\n]+$/, '');
}
