/**
 * Slipway Runtime Host — ULID Generator
 *
 * 26-character Crockford Base32 identifiers: 10 characters of millisecond
 * timestamp followed by 16 characters (80 bits) of randomness.
 *
 * Generation is monotonic. Several build events are often written within
 * the same millisecond; within one millisecond the random part is
 * incremented instead of redrawn, so ULID order equals emission order and
 * the log reader's (timestamp, event_id) sort keeps steps in sequence.
 *
 * @see https://github.com/ulid/spec
 */

import { randomBytes } from 'node:crypto';

const CROCKFORD = '0123456789ABCDEFGHJKMNPQRSTVWXYZ';
const TIME_CHARS = 10;
const RANDOM_CHARS = 16;
const RANDOM_MAX = (1n << 80n) - 1n;

function encode(value: bigint, length: number): string {
  let out = '';
  let v = value;
  for (let i = 0; i < length; i++) {
    out = CROCKFORD.charAt(Number(v & 31n)) + out;
    v >>= 5n;
  }
  return out;
}

function randomComponent(randomFn: (size: number) => Uint8Array): bigint {
  let value = 0n;
  for (const byte of randomFn(10)) {
    value = (value << 8n) | BigInt(byte);
  }
  return value;
}

/**
 * Create a monotonic ULID generator.
 *
 * @param nowFn - Millisecond clock
 * @param randomFn - Source of random bytes
 */
export function createUlid(
  nowFn: () => number = Date.now,
  randomFn: (size: number) => Uint8Array = randomBytes,
): () => string {
  let lastTime = -1;
  let lastRandom = 0n;

  return () => {
    const now = nowFn();
    if (now <= lastTime && lastRandom < RANDOM_MAX) {
      lastRandom += 1n;
    } else {
      lastTime = Math.max(now, lastTime);
      lastRandom = randomComponent(randomFn);
    }
    return encode(BigInt(lastTime), TIME_CHARS) + encode(lastRandom, RANDOM_CHARS);
  };
}

export const ulid = createUlid();
