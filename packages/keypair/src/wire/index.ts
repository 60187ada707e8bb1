/**
 * Ledger Identity - Wire Records
 *
 * Builds the two records a network consumer needs from a keypair, and
 * hands them to the Stellar SDK's XDR packer for the binary envelope.
 */

import { xdr } from '@stellar/stellar-sdk';
import { KeypairError, KeypairErrorCode } from '../errors/index';
import {
  PUBLIC_KEY_LENGTH,
  SIGNATURE_HINT_LENGTH,
  SIGNATURE_LENGTH,
} from '../types/index';
import type { DecoratedSignature, PublicKeyRecord } from '../types/index';

// ============================================================================
// Record Construction
// ============================================================================

export function createPublicKeyRecord(publicKey: Uint8Array): PublicKeyRecord {
  assertLength('public key', publicKey, PUBLIC_KEY_LENGTH);
  return { keyType: 'ed25519', bytes: Uint8Array.from(publicKey) };
}

export function createDecoratedSignature(
  hint: Uint8Array,
  signature: Uint8Array
): DecoratedSignature {
  assertLength('signature hint', hint, SIGNATURE_HINT_LENGTH);
  assertLength('signature', signature, SIGNATURE_LENGTH);
  return { hint: Uint8Array.from(hint), signature: Uint8Array.from(signature) };
}

function assertLength(field: string, bytes: Uint8Array, expected: number): void {
  if (bytes.length !== expected) {
    throw new KeypairError(
      KeypairErrorCode.INVALID_WIRE_RECORD,
      `${field} must be ${expected} bytes, got ${bytes.length}`,
      { field, length: bytes.length }
    );
  }
}

// ============================================================================
// XDR Conversion
// ============================================================================

export function toXdrPublicKey(record: PublicKeyRecord): xdr.PublicKey {
  assertLength('public key', record.bytes, PUBLIC_KEY_LENGTH);
  return xdr.PublicKey.publicKeyTypeEd25519(Buffer.from(record.bytes));
}

export function toXdrDecoratedSignature(record: DecoratedSignature): xdr.DecoratedSignature {
  assertLength('signature hint', record.hint, SIGNATURE_HINT_LENGTH);
  assertLength('signature', record.signature, SIGNATURE_LENGTH);
  return new xdr.DecoratedSignature({
    hint: Buffer.from(record.hint),
    signature: Buffer.from(record.signature),
  });
}

/**
 * Base64 XDR `PublicKey` envelope, as submitted to the network.
 */
export function packPublicKey(record: PublicKeyRecord): string {
  return toXdrPublicKey(record).toXDR('base64');
}

export function packDecoratedSignature(record: DecoratedSignature): string {
  return toXdrDecoratedSignature(record).toXDR('base64');
}

export function unpackPublicKey(encoded: string): PublicKeyRecord {
  let publicKey: xdr.PublicKey;
  try {
    publicKey = xdr.PublicKey.fromXDR(encoded, 'base64');
  } catch (err) {
    throw malformedEnvelope('PublicKey', err);
  }
  return createPublicKeyRecord(new Uint8Array(publicKey.ed25519()));
}

export function unpackDecoratedSignature(encoded: string): DecoratedSignature {
  let decorated: xdr.DecoratedSignature;
  try {
    decorated = xdr.DecoratedSignature.fromXDR(encoded, 'base64');
  } catch (err) {
    throw malformedEnvelope('DecoratedSignature', err);
  }
  return createDecoratedSignature(
    new Uint8Array(decorated.hint()),
    new Uint8Array(decorated.signature())
  );
}

function malformedEnvelope(record: string, err: unknown): KeypairError {
  return new KeypairError(
    KeypairErrorCode.INVALID_WIRE_RECORD,
    `cannot decode ${record} envelope: ${err instanceof Error ? err.message : String(err)}`,
    { record },
    { cause: err }
  );
}
