/**
 * Time-based one-time codes (RFC 6238) for the second login factor.
 *
 * The exchange issues a base32 secret when two-factor auth is enabled; authenticator
 * apps derive a 6-digit code from it every 30 seconds. We derive the same code.
 */

import { createHmac } from 'node:crypto';

const BASE32_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ234567';

/**
 * Options for code generation
 */
export interface TotpOptions {
  /** Time step in seconds (default: 30) */
  stepSeconds?: number;
  /** Number of digits in the code (default: 6) */
  digits?: number;
}

/**
 * Decodes an RFC 4648 base32 string. Case, spaces and `=` padding are ignored.
 *
 * @throws {Error} If the string contains characters outside the base32 alphabet
 */
export function base32Decode(input: string): Buffer {
  const cleaned = input.replace(/[\s=]/g, '').toUpperCase();
  const bytes: number[] = [];
  let buffer = 0;
  let bits = 0;

  for (const char of cleaned) {
    const value = BASE32_ALPHABET.indexOf(char);
    if (value === -1) {
      throw new Error(`Invalid base32 character: ${char}`);
    }
    buffer = (buffer << 5) | value;
    bits += 5;
    if (bits >= 8) {
      bits -= 8;
      bytes.push((buffer >>> bits) & 0xff);
    }
  }

  return Buffer.from(bytes);
}

/**
 * Returns the time-step counter for a timestamp.
 *
 * @param timeMs - Unix time in milliseconds
 */
export function timeStep(timeMs: number, stepSeconds: number = 30): number {
  return Math.floor(timeMs / 1000 / stepSeconds);
}

/**
 * HOTP (RFC 4226) code for a counter value.
 */
export function hotp(key: Buffer, counter: number, digits: number = 6): string {
  const message = Buffer.alloc(8);
  // counters stay well below 2^53, split into two 32-bit halves
  message.writeUInt32BE(Math.floor(counter / 0x100000000), 0);
  message.writeUInt32BE(counter >>> 0, 4);

  const digest = createHmac('sha1', key).update(message).digest();
  const offset = digest[digest.length - 1] & 0x0f;
  const binary =
    ((digest[offset] & 0x7f) << 24) |
    (digest[offset + 1] << 16) |
    (digest[offset + 2] << 8) |
    digest[offset + 3];

  return (binary % 10 ** digits).toString().padStart(digits, '0');
}

/**
 * Generates the current one-time code for a base32 secret.
 *
 * @param secret - Base32 shared secret
 * @param timeMs - Unix time in milliseconds (default: now)
 *
 * @example
 * ```typescript
 * const code = totp('JBSWY3DPEHPK3PXP');
 * ```
 */
export function totp(secret: string, timeMs: number = Date.now(), options: TotpOptions = {}): string {
  const stepSeconds = options.stepSeconds ?? 30;
  const digits = options.digits ?? 6;
  return hotp(base32Decode(secret), timeStep(timeMs, stepSeconds), digits);
}
