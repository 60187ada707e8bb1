/**
 * Ledger Identity Keypair Module
 *
 * Ed25519 identities: construction, text encodings, signing and the
 * signature-hint lookup verifiers use.
 */

export { Keypair, findSigner } from './keypair';
