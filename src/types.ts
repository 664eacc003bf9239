/**
 * Shared type definitions for RUT utilities
 */

/**
 * Result type for operations that can succeed or fail
 * Every fallible entry point returns one instead of throwing
 */
export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

/**
 * Verification digit (DV) of a RUT
 */
export type CheckDigit = '0' | '1' | '2' | '3' | '4' | '5' | '6' | '7' | '8' | '9' | 'K';

const CHECK_DIGITS: readonly string[] = ['0', '1', '2', '3', '4', '5', '6', '7', '8', '9', 'K'];

/**
 * Narrows a string to a CheckDigit (uppercase only)
 */
export function isCheckDigit(value: string): value is CheckDigit {
  return CHECK_DIGITS.includes(value);
}

/**
 * A parsed RUT whose DV has not been verified yet
 */
export interface UnverifiedRut {
  number: number;
  dv: CheckDigit;
}

/**
 * Builds a success result
 */
export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

/**
 * Builds a failure result
 */
export function err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}
