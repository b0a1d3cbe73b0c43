/**
 * Token generation and content hashing.
 */

import { webcrypto } from 'node:crypto'
import sha256 from 'crypto-js/sha256'
import encHex from 'crypto-js/enc-hex'

const TOKEN_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789'
// Largest multiple of the alphabet size that fits in a byte; bytes above it are redrawn
const UNBIASED_LIMIT = 256 - (256 % TOKEN_ALPHABET.length)

/**
 * Generate an alphanumeric share token.
 *
 * @param length - Number of characters, 32 by default
 */
export function generateShareToken(length = 32): string {
  let token = ''
  while (token.length < length) {
    const bytes = webcrypto.getRandomValues(new Uint8Array(length))
    for (const byte of bytes) {
      if (byte < UNBIASED_LIMIT && token.length < length) {
        token += TOKEN_ALPHABET[byte % TOKEN_ALPHABET.length]
      }
    }
  }
  return token
}

/**
 * Hex-encoded SHA-256 of a string.
 */
export function contentDigest(text: string): string {
  return sha256(text).toString(encHex)
}
