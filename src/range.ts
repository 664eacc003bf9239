/**
 * Accepted numeric range for RUT bodies and random sampling within it
 *
 * The interval is half-open: MIN is accepted, MAX is not.
 */

import { randomInt } from 'crypto';

export const RUT_RANGE = {
  MIN: 1_000_000,
  MAX: 99_999_999,
} as const;

/**
 * Source of random integers in `[min, max)`
 */
export type RandomSource = (min: number, max: number) => number;

export const defaultRandomSource: RandomSource = (min, max) => randomInt(min, max);

/**
 * Checks that a number is an integer inside `[MIN, MAX)`
 *
 * @example
 * isInRange(1_000_000)  // true
 * isInRange(99_999_999) // false
 */
export function isInRange(number: number): boolean {
  return Number.isInteger(number) && number >= RUT_RANGE.MIN && number < RUT_RANGE.MAX;
}

/**
 * Draws a RUT body from `[MIN, MAX)`
 * Values outside the range coming from an injected source are clamped.
 */
export function randomNumber(source: RandomSource = defaultRandomSource): number {
  const drawn = Math.trunc(source(RUT_RANGE.MIN, RUT_RANGE.MAX));

  if (Number.isNaN(drawn)) return RUT_RANGE.MIN;

  return Math.min(Math.max(drawn, RUT_RANGE.MIN), RUT_RANGE.MAX - 1);
}
