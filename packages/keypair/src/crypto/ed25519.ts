/**
 * Ledger Identity - Ed25519 Primitive
 *
 * Thin adapter over @noble/ed25519's synchronous API. Key generation,
 * signing and verification all happen in the library; this module only
 * fixes the byte shapes and maps failures onto KeypairError.
 */

import * as ed25519 from '@noble/ed25519';
import { sha512 } from '@noble/hashes/sha512';
import { KeypairError, KeypairErrorCode } from '../errors/index';
import { PUBLIC_KEY_LENGTH, SEED_LENGTH, SIGNATURE_LENGTH } from '../types/index';

// The sync API needs a synchronous SHA-512 before first use
ed25519.utils.sha512Sync = (...messages: Uint8Array[]): Uint8Array => {
  const hash = sha512.create();
  for (const message of messages) {
    hash.update(message);
  }
  return hash.digest();
};

// noble checks `instanceof Uint8Array`; arrays from another realm
// (Buffers under a test VM, TextEncoder output) are copied into this one
function ownBytes(bytes: Uint8Array): Uint8Array {
  return bytes instanceof Uint8Array ? bytes : Uint8Array.from(bytes);
}

/**
 * Expands a 32-byte seed into its Ed25519 public key.
 *
 * @throws KeypairError INVALID_SEED_LENGTH if seed is not 32 bytes
 */
export function derivePublicKey(seed: Uint8Array): Uint8Array {
  if (seed.length !== SEED_LENGTH) {
    throw new KeypairError(
      KeypairErrorCode.INVALID_SEED_LENGTH,
      `seed must be ${SEED_LENGTH} bytes, got ${seed.length}`,
      { length: seed.length }
    );
  }
  return ed25519.sync.getPublicKey(ownBytes(seed));
}

/**
 * Produces a 64-byte detached signature over `data`.
 *
 * @throws KeypairError SIGNING_FAILURE carrying the library error as `cause`
 */
export function signDetached(seed: Uint8Array, data: Uint8Array): Uint8Array {
  let signature: Uint8Array;
  try {
    signature = ed25519.sync.sign(ownBytes(data), ownBytes(seed));
  } catch (err) {
    throw new KeypairError(
      KeypairErrorCode.SIGNING_FAILURE,
      err instanceof Error ? err.message : 'ed25519 signing failed',
      undefined,
      { cause: err }
    );
  }

  if (signature.length !== SIGNATURE_LENGTH) {
    throw new KeypairError(
      KeypairErrorCode.SIGNING_FAILURE,
      `ed25519 returned a ${signature.length}-byte signature`
    );
  }
  return signature;
}

export function verifyDetached(
  publicKey: Uint8Array,
  data: Uint8Array,
  signature: Uint8Array
): boolean {
  if (publicKey.length !== PUBLIC_KEY_LENGTH || signature.length !== SIGNATURE_LENGTH) {
    return false;
  }

  try {
    return ed25519.sync.verify(ownBytes(signature), ownBytes(data), ownBytes(publicKey));
  } catch {
    // Non-canonical scalars and off-curve points are rejected by throwing
    return false;
  }
}
