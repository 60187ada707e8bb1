/**
 * Ledger Identity - Random Source
 */

import { randomBytes } from '@noble/hashes/utils';
import { KeypairError, KeypairErrorCode } from '../errors/index';
import type { RandomSource } from '../types/index';

let secureSource: RandomSource | undefined;

/**
 * Process-wide CSPRNG, created on first use. Backed by WebCrypto
 * `getRandomValues`, which is safe to call from concurrent callers.
 */
export function defaultRandomSource(): RandomSource {
  if (secureSource === undefined) {
    secureSource = (length: number) => randomBytes(length);
  }
  return secureSource;
}

/**
 * Draws `length` bytes and checks the source honoured the request.
 */
export function drawBytes(source: RandomSource, length: number): Uint8Array {
  const bytes = source(length);
  if (bytes.length !== length) {
    throw new KeypairError(
      KeypairErrorCode.INVALID_RANDOM_SOURCE,
      `random source returned ${bytes.length} bytes, expected ${length}`,
      { expected: length, received: bytes.length }
    );
  }
  return bytes;
}
