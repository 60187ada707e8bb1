/**
 * Ledger Identity
 *
 * Ed25519 keypairs for a Stellar-style ledger: deterministic and random
 * derivation, StrKey and legacy Base58Check text forms, signing, and the
 * public-key and decorated-signature wire records.
 *
 * @packageDocumentation
 */

// Types
export * from './types/index';

// Errors
export * from './errors/index';

// Configuration and logging
export * from './config/index';

// Deprecation notices
export * from './diagnostics/index';

// Keypair
export * from './keypair/index';

// StrKey codec
export { encodeCheck, decodeCheck, isValidEncoding } from './encoding/strkey';

// Mnemonic seeds
export { generateMnemonic, validateMnemonic, mnemonicToSeed } from './mnemonic/index';

// Wire records
export * from './wire/index';

// Legacy encodings, namespaced so they are never mistaken for StrKey
export * as legacy from './legacy/index';
