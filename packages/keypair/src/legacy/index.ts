/**
 * Ledger Identity - Legacy Encodings
 *
 * Representations used by the previous network version. Nothing outside
 * this directory depends on Base58Check; the current StrKey codec lives in
 * ../encoding and never imports from here.
 *
 * @deprecated Use for migration to StrKey only.
 */

import { ripemd160 } from '@noble/hashes/ripemd160';
import { sha256 } from '@noble/hashes/sha256';
import { KeypairError, KeypairErrorCode } from '../errors/index';
import { DeprecationCode, emitDeprecation } from '../diagnostics/index';
import { PUBLIC_KEY_LENGTH, SEED_LENGTH } from '../types/index';
import { b58decodeCheck, b58encodeCheck } from './base58check';

export { LEGACY_ALPHABET, b58decodeCheck, b58encodeCheck } from './base58check';

export const LEGACY_ADDRESS_VERSION = 0x00;
export const LEGACY_SEED_VERSION = 0x21;

/**
 * One-way account identifier of the old network:
 * Base58Check(0x00 || RIPEMD160(SHA256(publicKey))).
 * There is no decoder; the public key cannot be recovered from it.
 */
export function legacyAddressFromPublicKey(publicKey: Uint8Array): string {
  if (publicKey.length !== PUBLIC_KEY_LENGTH) {
    throw new KeypairError(
      KeypairErrorCode.INVALID_ADDRESS_LENGTH,
      `public key must be ${PUBLIC_KEY_LENGTH} bytes, got ${publicKey.length}`
    );
  }

  emitDeprecation({
    code: DeprecationCode.LEGACY_ADDRESS,
    api: 'Keypair.legacyAddress',
    message: 'Base58 address encoding is deprecated; use it only to look up accounts on the legacy network',
    replacement: 'Keypair.address',
  });

  const accountId = ripemd160(sha256(publicKey));
  const payload = new Uint8Array(1 + accountId.length);
  payload[0] = LEGACY_ADDRESS_VERSION;
  payload.set(accountId, 1);
  return b58encodeCheck(payload);
}

export function legacySeedFromRawSeed(seed: Uint8Array): string {
  if (seed.length !== SEED_LENGTH) {
    throw new KeypairError(
      KeypairErrorCode.INVALID_SEED_LENGTH,
      `seed must be ${SEED_LENGTH} bytes, got ${seed.length}`
    );
  }

  emitDeprecation({
    code: DeprecationCode.LEGACY_SEED,
    api: 'Keypair.legacySeed',
    message: 'Base58 seed encoding is deprecated; use it only for transition to strkey encoding',
    replacement: 'Keypair.seed',
  });

  const payload = new Uint8Array(1 + SEED_LENGTH);
  payload[0] = LEGACY_SEED_VERSION;
  payload.set(seed, 1);
  return b58encodeCheck(payload);
}

/**
 * Reverses legacySeedFromRawSeed.
 *
 * @throws KeypairError INVALID_VERSION_BYTE when the prefix is not a seed's
 */
export function rawSeedFromLegacySeed(encoded: string): Uint8Array {
  emitDeprecation({
    code: DeprecationCode.LEGACY_SEED_TEXT,
    api: 'Keypair.fromLegacySeedText',
    message: 'Base58 seed encoding is deprecated; use it only for transition to strkey encoding',
    replacement: 'Keypair.fromSeedText',
  });

  const decoded = b58decodeCheck(encoded);
  if (decoded[0] !== LEGACY_SEED_VERSION) {
    throw new KeypairError(
      KeypairErrorCode.INVALID_VERSION_BYTE,
      `expected legacy seed version ${LEGACY_SEED_VERSION}, got ${decoded[0]}`,
      { versionByte: decoded[0] }
    );
  }
  return decoded.subarray(1);
}
