/**
 * Ledger Identity Diagnostics
 *
 * Deprecation notices travel on their own channel, separate from errors.
 * Subscribers receive a structured notice; with no subscriber the notice is
 * written to the configured logger as a warning.
 */

import { getConfig } from '../config/index';

export enum DeprecationCode {
  LEGACY_SEED_TEXT = 'LEGACY_SEED_TEXT',
  LEGACY_ADDRESS = 'LEGACY_ADDRESS',
  LEGACY_SEED = 'LEGACY_SEED',
}

export interface DeprecationNotice {
  code: DeprecationCode;
  /** Name of the deprecated API that was called */
  api: string;
  message: string;
  /** API to migrate to */
  replacement: string;
}

export type DeprecationListener = (notice: DeprecationNotice) => void;

const listeners = new Set<DeprecationListener>();

/**
 * Subscribe to deprecation notices.
 *
 * @returns Function that removes the listener
 */
export function onDeprecation(listener: DeprecationListener): () => void {
  listeners.add(listener);
  return () => {
    listeners.delete(listener);
  };
}

export function emitDeprecation(notice: DeprecationNotice): void {
  if (listeners.size === 0) {
    getConfig().logger.warn(notice.message, {
      code: notice.code,
      api: notice.api,
      replacement: notice.replacement,
    });
    return;
  }

  for (const listener of listeners) {
    listener(notice);
  }
}
