/**
 * Manifest fingerprinting.
 *
 * Uses @noble/hashes, a pure JavaScript implementation, so the digest is the
 * same on every platform the generator runs on.
 */

import { sha256 } from '@noble/hashes/sha256';

/**
 * Converts a byte array to a lowercase hexadecimal string.
 *
 * @example
 * ```typescript
 * bytesToHex(new Uint8Array([0xde, 0xad, 0xbe, 0xef])); // "deadbeef"
 * ```
 */
export function bytesToHex(bytes: Uint8Array): string {
  let out = '';
  for (let i = 0; i < bytes.length; i += 1) {
    out += bytes[i].toString(16).padStart(2, '0');
  }
  return out;
}

/**
 * SHA-256 of the manifest bytes as 64 hex characters
 */
export function manifestDigest(bytes: Uint8Array): string {
  return bytesToHex(sha256(bytes));
}
