/**
 * Ledger Identity Error Types
 */

export enum KeypairErrorCode {
  INVALID_SEED_LENGTH = 'INVALID_SEED_LENGTH',
  INVALID_ADDRESS_LENGTH = 'INVALID_ADDRESS_LENGTH',
  CHECKSUM_MISMATCH = 'CHECKSUM_MISMATCH',
  INVALID_VERSION_BYTE = 'INVALID_VERSION_BYTE',
  INVALID_ENCODING = 'INVALID_ENCODING',
  NO_SECRET_KEY = 'NO_SECRET_KEY',
  SIGNING_FAILURE = 'SIGNING_FAILURE',
  INVALID_MNEMONIC = 'INVALID_MNEMONIC',
  UNSUPPORTED_LANGUAGE = 'UNSUPPORTED_LANGUAGE',
  INVALID_INDEX = 'INVALID_INDEX',
  INVALID_WIRE_RECORD = 'INVALID_WIRE_RECORD',
  INVALID_RANDOM_SOURCE = 'INVALID_RANDOM_SOURCE',
  INVALID_CONFIG = 'INVALID_CONFIG',
}

/**
 * Error raised by every failing keypair operation.
 */
export class KeypairError extends Error {
  constructor(
    public readonly code: KeypairErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(`[${code}] ${message}`, options);
    this.name = 'KeypairError';
  }
}

export function isKeypairError(
  error: unknown,
  code?: KeypairErrorCode
): error is KeypairError {
  if (!(error instanceof KeypairError)) {
    return false;
  }
  return code === undefined || error.code === code;
}

export function noSecretKey(operation: string): KeypairError {
  return new KeypairError(
    KeypairErrorCode.NO_SECRET_KEY,
    `cannot ${operation}: no secret key available`,
    { operation }
  );
}
