/**
 * Ledger Identity - StrKey Codec Adapter
 *
 * Current checksummed text encoding: version byte + payload + CRC16-XModem,
 * base32. The codec itself is StrKey from the Stellar SDK; this adapter
 * selects the version byte by purpose and turns the SDK's plain Error
 * messages into typed KeypairErrors.
 */

import { StrKey } from '@stellar/stellar-sdk';
import { KeypairError, KeypairErrorCode } from '../errors/index';
import type { KeyPurpose } from '../types/index';

const PURPOSE_PREFIX: Record<KeyPurpose, string> = {
  account: 'G',
  seed: 'S',
};

/**
 * Encodes 32 raw bytes as a StrKey string for the given purpose.
 */
export function encodeCheck(purpose: KeyPurpose, data: Uint8Array): string {
  const buffer = Buffer.from(data);
  return purpose === 'account'
    ? StrKey.encodeEd25519PublicKey(buffer)
    : StrKey.encodeEd25519SecretSeed(buffer);
}

/**
 * Decodes a StrKey string, requiring the version byte of `purpose`.
 *
 * @throws KeypairError INVALID_VERSION_BYTE, CHECKSUM_MISMATCH or INVALID_ENCODING
 */
export function decodeCheck(purpose: KeyPurpose, encoded: string): Uint8Array {
  let decoded: Buffer;
  try {
    decoded =
      purpose === 'account'
        ? StrKey.decodeEd25519PublicKey(encoded)
        : StrKey.decodeEd25519SecretSeed(encoded);
  } catch (err) {
    throw classifyDecodeError(purpose, encoded, err);
  }
  return new Uint8Array(decoded);
}

/**
 * Validates without throwing.
 */
export function isValidEncoding(purpose: KeyPurpose, encoded: string): boolean {
  return purpose === 'account'
    ? StrKey.isValidEd25519PublicKey(encoded)
    : StrKey.isValidEd25519SecretSeed(encoded);
}

function classifyDecodeError(
  purpose: KeyPurpose,
  encoded: string,
  err: unknown
): KeypairError {
  const reason = err instanceof Error ? err.message : String(err);
  const details = { purpose, reason };

  if (/version byte/i.test(reason)) {
    return new KeypairError(
      KeypairErrorCode.INVALID_VERSION_BYTE,
      `expected a ${purpose} key starting with '${PURPOSE_PREFIX[purpose]}'`,
      details,
      { cause: err }
    );
  }
  if (/checksum/i.test(reason)) {
    return new KeypairError(
      KeypairErrorCode.CHECKSUM_MISMATCH,
      `checksum does not match ${purpose} key`,
      details,
      { cause: err }
    );
  }
  return new KeypairError(
    KeypairErrorCode.INVALID_ENCODING,
    `not a valid ${purpose} key encoding (${encoded.length} characters)`,
    details,
    { cause: err }
  );
}
