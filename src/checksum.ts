/**
 * Modulus 11 checksum for Chilean RUTs
 *
 * Digits are read from right to left and multiplied by the weights
 * 2, 3, 4, 5, 6, 7, 2, 3, ... The DV is 11 minus the remainder of the
 * weighted sum, with 10 written as K and 11 written as 0.
 */

import type { CheckDigit } from './types.js';

const FIRST_WEIGHT = 2;
const WEIGHT_CYCLE = 6;

// Residue (1..11) to DV; index 0 is never produced by modEleven
const DV_BY_RESIDUE: readonly CheckDigit[] = ['0', '1', '2', '3', '4', '5', '6', '7', '8', '9', 'K', '0'];

/**
 * Weight for the digit at `index`, counting from the least significant digit
 *
 * @example
 * weightAt(0) // 2
 * weightAt(5) // 7
 * weightAt(6) // 2
 */
export function weightAt(index: number): number {
  return FIRST_WEIGHT + (index % WEIGHT_CYCLE);
}

/**
 * Weighted sum of the digits of a RUT body
 * Fractions and sign are dropped; non-finite input counts as 0.
 *
 * @example
 * sumProduct(17951585) // 169
 */
export function sumProduct(number: number): number {
  let remaining = Number.isFinite(number) ? Math.trunc(Math.abs(number)) : 0;
  let total = 0;

  for (let index = 0; remaining > 0; index++) {
    total += (remaining % 10) * weightAt(index);
    remaining = Math.trunc(remaining / 10);
  }

  return total;
}

/**
 * @example
 * modEleven(169) // 7
 */
export function modEleven(total: number): number {
  return 11 - (total % 11);
}

/**
 * Computes the verification digit (DV) for a RUT body
 * Defined for non-negative safe integers; other input is normalized as in sumProduct.
 *
 * @example
 * computeCheckDigit(17951585) // '7'
 * computeCheckDigit(12621806) // '0'
 */
export function computeCheckDigit(number: number): CheckDigit {
  const residue = modEleven(sumProduct(number));

  return DV_BY_RESIDUE[residue];
}
