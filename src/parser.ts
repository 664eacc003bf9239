/**
 * Recognizes RUT text and splits it into body and claimed DV
 *
 * Accepted shapes (7 or 8 digit body, K case-insensitive):
 * - 17.951.585-7
 * - 17951585-7
 * - 179515857
 */

import { RutError } from './errors.js';
import { err, isCheckDigit, ok, type Result, type UnverifiedRut } from './types.js';

export const RUT_PATTERN = /^(?<number>\d{1,2}\.?\d{3}\.?\d{3})-?(?<dv>[0-9kK])$/;

/**
 * Extracts body and DV from a RUT string without verifying the DV
 *
 * @example
 * extract('5.665.328-7') // { ok: true, value: { number: 5665328, dv: '7' } }
 * extract('17,951,585-7') // { ok: false, error: RutError(INVALID_FORMAT) }
 */
export function extract(input: string): Result<UnverifiedRut, RutError> {
  const groups = RUT_PATTERN.exec(input)?.groups;
  const body = groups?.number;
  const dv = groups?.dv?.toUpperCase();

  if (body === undefined || dv === undefined || !isCheckDigit(dv)) {
    return err(RutError.invalidFormat());
  }

  return ok({ number: parseInt(body.replace(/\./g, ''), 10), dv });
}
