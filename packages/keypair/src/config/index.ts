/**
 * Ledger Identity Configuration
 *
 * Process-wide settings: where log output goes and the defaults used when
 * deriving keypairs from a mnemonic phrase.
 */

import { KeypairError, KeypairErrorCode } from '../errors/index';
import type { MnemonicLanguage } from '../types/index';

// ============================================================================
// Logging
// ============================================================================

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

/**
 * Console logger that tags every line with a component prefix,
 * e.g. `[keypair] Base58 seed encoding is deprecated`.
 */
export function createConsoleLogger(prefix = 'keypair'): Logger {
  const tag = `[${prefix}]`;
  const write =
    (level: 'debug' | 'log' | 'warn' | 'error') =>
    (message: string, context?: Record<string, unknown>) => {
      // Resolved per call so test spies on console are honoured
      if (context && Object.keys(context).length > 0) {
        console[level](`${tag} ${message}`, context);
      } else {
        console[level](`${tag} ${message}`);
      }
    };

  return {
    debug: write('debug'),
    info: write('log'),
    warn: write('warn'),
    error: write('error'),
  };
}

// ============================================================================
// Config
// ============================================================================

export interface MnemonicConfig {
  /** Wordlist used when a caller does not name one */
  language: MnemonicLanguage;
  /** PBKDF2-HMAC-SHA512 rounds for phrase-to-seed stretching */
  iterations: number;
  /** Reject phrases that fail the wordlist or BIP-39 checksum before stretching */
  validate: boolean;
}

export interface KeypairConfig {
  logger: Logger;
  mnemonic: MnemonicConfig;
}

export interface KeypairConfigOverrides {
  logger?: Logger;
  mnemonic?: Partial<MnemonicConfig>;
}

export const DEFAULT_MNEMONIC_ITERATIONS = 2048;

export const DEFAULT_CONFIG: KeypairConfig = {
  logger: createConsoleLogger(),
  mnemonic: {
    language: 'english',
    iterations: DEFAULT_MNEMONIC_ITERATIONS,
    validate: true,
  },
};

let current: KeypairConfig = DEFAULT_CONFIG;

export function getConfig(): KeypairConfig {
  return current;
}

/**
 * Merge overrides into the active config.
 *
 * @returns The config that was active before the call, so it can be restored
 */
export function configure(overrides: KeypairConfigOverrides): KeypairConfig {
  const previous = current;
  const iterations = overrides.mnemonic?.iterations ?? previous.mnemonic.iterations;
  if (!Number.isSafeInteger(iterations) || iterations < 1) {
    throw new KeypairError(
      KeypairErrorCode.INVALID_CONFIG,
      `mnemonic iterations must be a positive integer, got ${iterations}`,
      { iterations }
    );
  }

  current = {
    logger: overrides.logger ?? previous.logger,
    mnemonic: {
      language: overrides.mnemonic?.language ?? previous.mnemonic.language,
      iterations,
      validate: overrides.mnemonic?.validate ?? previous.mnemonic.validate,
    },
  };
  return previous;
}

/**
 * Replace the active config wholesale, typically with the value an earlier
 * `configure` call returned.
 */
export function restoreConfig(config: KeypairConfig): void {
  current = config;
}
