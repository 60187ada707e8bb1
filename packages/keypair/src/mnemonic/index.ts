/**
 * Ledger Identity - Mnemonic Seeds
 *
 * Phrase generation and validation use the BIP-39 wordlists from `bip39`.
 * Seed stretching is PBKDF2-HMAC-SHA512 over the NFKD-normalised phrase with
 * salt "mnemonic" + passphrase + "/" + index, truncated to 32 bytes. The
 * index lives in the salt, so every index yields an independent seed.
 * Phrases are checked against the wordlist unless `mnemonic.validate` is off
 * in the config, in which case any text is stretched as given.
 */

import * as bip39 from 'bip39';
import { pbkdf2 } from '@noble/hashes/pbkdf2';
import { sha512 } from '@noble/hashes/sha512';
import { getConfig } from '../config/index';
import { KeypairError, KeypairErrorCode } from '../errors/index';
import { SEED_LENGTH } from '../types/index';
import type { MnemonicLanguage, MnemonicStrength } from '../types/index';

const SALT_PREFIX = 'mnemonic';

function normalize(value: string): string {
  return value.normalize('NFKD');
}

function utf8Bytes(value: string): Uint8Array {
  // Copy into this realm's Uint8Array; TextEncoder may hand back a foreign one
  return Uint8Array.from(new TextEncoder().encode(value));
}

function wordlistFor(language: MnemonicLanguage): string[] {
  const wordlist = bip39.wordlists[language];
  if (wordlist === undefined) {
    throw new KeypairError(
      KeypairErrorCode.UNSUPPORTED_LANGUAGE,
      `no mnemonic wordlist for language '${language}'`,
      { language }
    );
  }
  return wordlist;
}

/**
 * Generates a new mnemonic phrase.
 *
 * @param strength - Entropy bits: 128 for 12 words, 256 for 24 words
 */
export function generateMnemonic(
  strength: MnemonicStrength = 256,
  language: MnemonicLanguage = getConfig().mnemonic.language
): string {
  return bip39.generateMnemonic(strength, undefined, wordlistFor(language));
}

export function validateMnemonic(
  phrase: string,
  language: MnemonicLanguage = getConfig().mnemonic.language
): boolean {
  return bip39.validateMnemonic(normalize(phrase), wordlistFor(language));
}

/**
 * Stretches a mnemonic phrase into the 32-byte seed for `index`.
 *
 * @throws KeypairError INVALID_MNEMONIC, UNSUPPORTED_LANGUAGE or INVALID_INDEX
 */
export function mnemonicToSeed(
  phrase: string,
  passphrase = '',
  language: MnemonicLanguage = getConfig().mnemonic.language,
  index = 0
): Uint8Array {
  if (!Number.isSafeInteger(index) || index < 0) {
    throw new KeypairError(
      KeypairErrorCode.INVALID_INDEX,
      `derivation index must be a non-negative integer, got ${index}`,
      { index }
    );
  }
  const wordlist = wordlistFor(language);
  if (getConfig().mnemonic.validate && !bip39.validateMnemonic(normalize(phrase), wordlist)) {
    throw new KeypairError(
      KeypairErrorCode.INVALID_MNEMONIC,
      `invalid ${language} mnemonic phrase`,
      { language }
    );
  }

  const password = utf8Bytes(normalize(phrase));
  const salt = utf8Bytes(`${SALT_PREFIX}${normalize(passphrase)}/${index}`);

  return pbkdf2(sha512, password, salt, {
    c: getConfig().mnemonic.iterations,
    dkLen: SEED_LENGTH,
  });
}
