/**
 * Ledger Identity - Legacy Base58Check Codec
 *
 * payload || first4(SHA256(SHA256(payload))), base58 with the alphabet of
 * the legacy ledger daemon (addresses begin with `g`, seeds with `s`).
 * Kept only so old keys can be migrated.
 */

import basex from 'base-x';
import { sha256 } from '@noble/hashes/sha256';
import { KeypairError, KeypairErrorCode } from '../errors/index';

export const LEGACY_ALPHABET = 'gsphnaf39wBUDNEGHJKLM4PQRST7VWXYZ2bcdeCr65jkm8oFqi1tuvAxyz';

const CHECKSUM_LENGTH = 4;

const base58 = basex(LEGACY_ALPHABET);

function checksum(payload: Uint8Array): Uint8Array {
  return sha256(sha256(payload)).subarray(0, CHECKSUM_LENGTH);
}

export function b58encodeCheck(payload: Uint8Array): string {
  const buffer = new Uint8Array(payload.length + CHECKSUM_LENGTH);
  buffer.set(payload, 0);
  buffer.set(checksum(payload), payload.length);
  return base58.encode(buffer);
}

/**
 * @throws KeypairError INVALID_ENCODING for non-alphabet input,
 *   CHECKSUM_MISMATCH when the trailing 4 bytes disagree
 */
export function b58decodeCheck(encoded: string): Uint8Array {
  const decoded = base58.decodeUnsafe(encoded);
  if (decoded === undefined || decoded.length <= CHECKSUM_LENGTH) {
    throw new KeypairError(
      KeypairErrorCode.INVALID_ENCODING,
      'not a valid legacy base58check string',
      { length: encoded.length }
    );
  }

  const payload = decoded.subarray(0, decoded.length - CHECKSUM_LENGTH);
  const actual = decoded.subarray(decoded.length - CHECKSUM_LENGTH);
  const expected = checksum(payload);

  for (let i = 0; i < CHECKSUM_LENGTH; i++) {
    if (actual[i] !== expected[i]) {
      throw new KeypairError(
        KeypairErrorCode.CHECKSUM_MISMATCH,
        'legacy base58check checksum does not match'
      );
    }
  }
  return Uint8Array.from(payload);
}
