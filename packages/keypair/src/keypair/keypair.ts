/**
 * Ledger Identity - Keypair
 *
 * An Ed25519 verifying key, optionally paired with the seed it was expanded
 * from. Build one with a static constructor rather than `new`:
 *
 * - Keypair.random
 * - Keypair.fromMnemonic
 * - Keypair.fromSeedText
 * - Keypair.fromRawSeed
 * - Keypair.fromAddressText
 *
 * A keypair built from an address can verify but not sign. That is a normal
 * state: operations that need the seed throw KeypairError NO_SECRET_KEY.
 */

import { defaultRandomSource, drawBytes } from '../crypto/random';
import { derivePublicKey, signDetached, verifyDetached } from '../crypto/ed25519';
import { decodeCheck, encodeCheck } from '../encoding/strkey';
import { KeypairError, KeypairErrorCode, noSecretKey } from '../errors/index';
import {
  legacyAddressFromPublicKey,
  legacySeedFromRawSeed,
  rawSeedFromLegacySeed,
} from '../legacy/index';
import { mnemonicToSeed } from '../mnemonic/index';
import {
  PUBLIC_KEY_LENGTH,
  SEED_LENGTH,
  SIGNATURE_HINT_LENGTH,
} from '../types/index';
import type {
  AccountAddress,
  DecoratedSignature,
  FullKeyMaterial,
  KeyMaterial,
  MnemonicLanguage,
  PublicKeyRecord,
  RandomSource,
  SecretSeed,
} from '../types/index';
import { createDecoratedSignature, createPublicKeyRecord, packPublicKey } from '../wire/index';

export class Keypair {
  private readonly material: KeyMaterial;

  private constructor(material: KeyMaterial) {
    this.material = material;
  }

  // ==========================================================================
  // Construction
  // ==========================================================================

  /**
   * Derives the keypair for a 32-byte seed.
   *
   * @throws KeypairError INVALID_SEED_LENGTH
   */
  static fromRawSeed(rawSeed: Uint8Array): Keypair {
    if (rawSeed.length !== SEED_LENGTH) {
      throw new KeypairError(
        KeypairErrorCode.INVALID_SEED_LENGTH,
        `raw seed must be ${SEED_LENGTH} bytes, got ${rawSeed.length}`,
        { length: rawSeed.length }
      );
    }

    const seed = Uint8Array.from(rawSeed);
    return new Keypair({ kind: 'full', verifyingKey: derivePublicKey(seed), seed });
  }

  /**
   * New keypair from 32 bytes of the process CSPRNG. Tests may pass a
   * deterministic source instead.
   */
  static random(randomSource: RandomSource = defaultRandomSource()): Keypair {
    return Keypair.fromRawSeed(drawBytes(randomSource, SEED_LENGTH));
  }

  /**
   * Deterministic keypair from a mnemonic phrase. Each `index` gives an
   * independent keypair from the same phrase:
   *
   * ```ts
   * const first = Keypair.fromMnemonic(phrase, '', 'english', 0);
   * const second = Keypair.fromMnemonic(phrase, '', 'english', 1);
   * ```
   */
  static fromMnemonic(
    phrase: string,
    passphrase = '',
    language?: MnemonicLanguage,
    index = 0
  ): Keypair {
    return Keypair.fromRawSeed(mnemonicToSeed(phrase, passphrase, language, index));
  }

  /**
   * @param seedText - StrKey-encoded secret seed (`S...`)
   */
  static fromSeedText(seedText: SecretSeed): Keypair {
    return Keypair.fromRawSeed(decodeCheck('seed', seedText));
  }

  /**
   * @deprecated Base58 seeds exist only for migration to StrKey. Emits a
   * deprecation notice on every call.
   */
  static fromLegacySeedText(legacySeedText: string): Keypair {
    return Keypair.fromRawSeed(rawSeedFromLegacySeed(legacySeedText));
  }

  /**
   * Verify-only keypair from a StrKey-encoded public key (`G...`).
   */
  static fromAddressText(address: AccountAddress): Keypair {
    return Keypair.fromRawPublicKey(decodeCheck('account', address));
  }

  static fromRawPublicKey(publicKey: Uint8Array): Keypair {
    if (publicKey.length !== PUBLIC_KEY_LENGTH) {
      throw new KeypairError(
        KeypairErrorCode.INVALID_ADDRESS_LENGTH,
        `public key must be ${PUBLIC_KEY_LENGTH} bytes, got ${publicKey.length}`,
        { length: publicKey.length }
      );
    }
    return new Keypair({ kind: 'public', verifyingKey: Uint8Array.from(publicKey) });
  }

  // ==========================================================================
  // Accessors
  // ==========================================================================

  canSign(): boolean {
    return this.material.kind === 'full';
  }

  rawPublicKey(): Uint8Array {
    return Uint8Array.from(this.material.verifyingKey);
  }

  /**
   * @throws KeypairError NO_SECRET_KEY on a verify-only keypair
   */
  rawSeed(): Uint8Array {
    return Uint8Array.from(this.secret('read seed').seed);
  }

  address(): AccountAddress {
    return encodeCheck('account', this.material.verifyingKey);
  }

  /**
   * @throws KeypairError NO_SECRET_KEY on a verify-only keypair
   */
  seed(): SecretSeed {
    return encodeCheck('seed', this.secret('read seed').seed);
  }

  /** @deprecated One-way identifier for the legacy network. */
  legacyAddress(): string {
    return legacyAddressFromPublicKey(this.material.verifyingKey);
  }

  /** @deprecated Use {@link Keypair.seed}. */
  legacySeed(): string {
    return legacySeedFromRawSeed(this.secret('read seed').seed);
  }

  equals(other: Keypair): boolean {
    const a = this.material.verifyingKey;
    const b = other.material.verifyingKey;
    let diff = 0;
    for (let i = 0; i < PUBLIC_KEY_LENGTH; i++) {
      diff |= a[i] ^ b[i];
    }
    return diff === 0;
  }

  // ==========================================================================
  // Signing
  // ==========================================================================

  /**
   * @returns 64-byte Ed25519 signature
   * @throws KeypairError NO_SECRET_KEY, or SIGNING_FAILURE with the cause kept
   */
  sign(payload: Uint8Array): Uint8Array {
    return signDetached(this.secret('sign').seed, payload);
  }

  /**
   * A wrong-length or malformed signature verifies as false.
   */
  verify(payload: Uint8Array, signature: Uint8Array): boolean {
    return verifyDetached(this.material.verifyingKey, payload, signature);
  }

  /**
   * Last 4 bytes of the public key. Lets a verifier pick candidate keys for
   * a signature; a matching hint proves nothing until `verify` passes.
   */
  signatureHint(): Uint8Array {
    const key = this.material.verifyingKey;
    return key.slice(key.length - SIGNATURE_HINT_LENGTH);
  }

  signDecorated(payload: Uint8Array): DecoratedSignature {
    const signature = this.sign(payload);
    return createDecoratedSignature(this.signatureHint(), signature);
  }

  verifyDecorated(payload: Uint8Array, decorated: DecoratedSignature): boolean {
    return (
      hintMatches(this.signatureHint(), decorated.hint) &&
      this.verify(payload, decorated.signature)
    );
  }

  // ==========================================================================
  // Wire
  // ==========================================================================

  publicKeyRecord(): PublicKeyRecord {
    return createPublicKeyRecord(this.material.verifyingKey);
  }

  /**
   * Base64 XDR `PublicKey` for this keypair.
   */
  toXdr(): string {
    return packPublicKey(this.publicKeyRecord());
  }

  private secret(operation: string): FullKeyMaterial {
    if (this.material.kind !== 'full') {
      throw noSecretKey(operation);
    }
    return this.material;
  }
}

function hintMatches(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) {
    return false;
  }
  return a.every((byte, i) => byte === b[i]);
}

/**
 * Finds the candidate that produced `decorated`: cheap hint comparison
 * first, then a full signature check on each hint match.
 */
export function findSigner(
  candidates: Iterable<Keypair>,
  payload: Uint8Array,
  decorated: DecoratedSignature
): Keypair | undefined {
  for (const candidate of candidates) {
    if (candidate.verifyDecorated(payload, decorated)) {
      return candidate;
    }
  }
  return undefined;
}
