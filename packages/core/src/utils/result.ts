/**
 * Result type for functional error handling
 * Operations that fail in expected ways return Err instead of throwing.
 */

import type { WdkeeperError } from '../errors/index.js';

export interface Ok<T> {
  readonly ok: true;
  readonly value: T;
}

export interface Err<E = WdkeeperError> {
  readonly ok: false;
  readonly error: E;
}

export type Result<T, E = WdkeeperError> = Ok<T> | Err<E>;

export const ok = <T>(value: T): Ok<T> => ({
  ok: true,
  value
});

export const err = <E = WdkeeperError>(error: E): Err<E> => ({
  ok: false,
  error
});

