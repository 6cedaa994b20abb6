/**
 * @fileoverview Reproducible design seed derived from prompt text.
 *
 * The seed is a fingerprint only; nothing draws randomness from it.
 *
 * @module seed
 */

import { createHash } from 'node:crypto';

/** Seeds fall in [0, SEED_RANGE) */
export const SEED_RANGE = 100;

/**
 * SHA-256 over the prompt's UTF-8 bytes, first four bytes read as an
 * unsigned big-endian integer, reduced modulo {@link SEED_RANGE}.
 *
 * @example
 * deriveSeed('procrastination') // 23
 */
export function deriveSeed(promptText: string): number {
  const digest = createHash('sha256').update(promptText, 'utf8').digest();
  return digest.readUInt32BE(0) % SEED_RANGE;
}
