/**
 * Ledger Identity Type Definitions
 *
 * Shared shapes for key material, text encodings and the wire records a
 * network consumer needs.
 */

// ============================================================================
// Sizes
// ============================================================================

export const PUBLIC_KEY_LENGTH = 32;
export const SEED_LENGTH = 32;
export const SIGNATURE_LENGTH = 64;
export const SIGNATURE_HINT_LENGTH = 4;

// ============================================================================
// Text Encodings
// ============================================================================

/** Purpose tag for the current checksummed text encoding (StrKey). */
export type KeyPurpose = 'account' | 'seed';

/** `G...` text form of a 32-byte Ed25519 public key. */
export type AccountAddress = string;

/** `S...` text form of a 32-byte Ed25519 seed. */
export type SecretSeed = string;

// ============================================================================
// Key Material
// ============================================================================

export interface PublicKeyMaterial {
  kind: 'public';
  verifyingKey: Uint8Array;
}

export interface FullKeyMaterial {
  kind: 'full';
  verifyingKey: Uint8Array;
  /** 32-byte seed the signing key is expanded from */
  seed: Uint8Array;
}

export type KeyMaterial = PublicKeyMaterial | FullKeyMaterial;

/**
 * Source of cryptographically secure random bytes.
 */
export type RandomSource = (length: number) => Uint8Array;

// ============================================================================
// Wire Records
// ============================================================================

export type KeyType = 'ed25519';

export interface PublicKeyRecord {
  /** Key-type discriminant (XDR `KEY_TYPE_ED25519`) */
  keyType: KeyType;
  /** Raw 32-byte public key */
  bytes: Uint8Array;
}

export interface DecoratedSignature {
  /** Last 4 bytes of the signer's public key */
  hint: Uint8Array;
  /** Raw 64-byte Ed25519 signature */
  signature: Uint8Array;
}

// ============================================================================
// Mnemonic
// ============================================================================

export type MnemonicLanguage =
  | 'english'
  | 'japanese'
  | 'spanish'
  | 'italian'
  | 'french'
  | 'korean'
  | 'czech'
  | 'portuguese'
  | 'chinese_simplified'
  | 'chinese_traditional';

export type MnemonicStrength = 128 | 160 | 192 | 224 | 256;
