/**
 * Chilean RUT (Rol Único Tributario) value object
 *
 * RUT format: XX.XXX.XXX-X where the last character is the verification digit (DV)
 * Uses Modulus 11 algorithm for validation
 */

import { computeCheckDigit } from './checksum.js';
import { RutError } from './errors.js';
import { Format, formatearNumero } from './format.js';
import { extract } from './parser.js';
import { isInRange, randomNumber, type RandomSource } from './range.js';
import { err, ok, type CheckDigit, type Result } from './types.js';

/**
 * A RUT whose DV matches its body
 * Only obtainable through Rut.parse, Rut.fromNumber or Rut.randomize
 */
export class Rut {
  private constructor(
    public readonly number: number,
    public readonly dv: CheckDigit
  ) {
    Object.freeze(this);
  }

  /**
   * Parses and verifies a RUT string
   * @param input - RUT like "17.951.585-7", "17951585-7" or "179515857"
   *
   * @example
   * Rut.parse('17951585-7') // { ok: true, value: Rut(17951585, '7') }
   * Rut.parse('17951585-K') // { ok: false, error: RutError(INVALID_DV) }
   */
  static parse(input: string): Result<Rut, RutError> {
    const extracted = extract(input);
    if (!extracted.ok) return extracted;

    const claimed = extracted.value;
    const verified = Rut.fromNumber(claimed.number);
    if (!verified.ok) return verified;

    if (verified.value.dv !== claimed.dv) {
      return err(RutError.invalidDv(verified.value.dv, claimed.dv));
    }

    return verified;
  }

  static fromText(input: string): Result<Rut, RutError> {
    return Rut.parse(input);
  }

  /**
   * Builds a RUT from its body, computing the DV
   * @param number - Integer between 1.000.000 (inclusive) and 99.999.999 (exclusive)
   */
  static fromNumber(number: number): Result<Rut, RutError> {
    if (!isInRange(number)) {
      return err(RutError.outOfRange());
    }

    return ok(new Rut(number, computeCheckDigit(number)));
  }

  /**
   * Generates a valid RUT with a random body, for test data
   */
  static randomize(source?: RandomSource): Rut {
    const number = randomNumber(source);
    return new Rut(number, computeCheckDigit(number));
  }

  /**
   * @example
   * rut.render(Format.DOTS) // '5.665.328-7'
   * rut.render(Format.DASH) // '5665328-7'
   * rut.render(Format.NONE) // '56653287'
   */
  render(format: Format): string {
    switch (format) {
      case Format.DOTS:
        return `${formatearNumero(this.number)}-${this.dv}`;
      case Format.DASH:
        return `${this.number}-${this.dv}`;
      case Format.NONE:
        return `${this.number}${this.dv}`;
    }
  }

  equals(other: Rut): boolean {
    return this.number === other.number && this.dv === other.dv;
  }

  toString(): string {
    return this.render(Format.DASH);
  }

  toJSON(): string {
    return this.toString();
  }
}

export function parse(input: string): Result<Rut, RutError> {
  return Rut.parse(input);
}

export function fromNumber(number: number): Result<Rut, RutError> {
  return Rut.fromNumber(number);
}

export function randomize(source?: RandomSource): Rut {
  return Rut.randomize(source);
}

/**
 * Removes formatting from RUT (returns digits + K only)
 * @param rut - Formatted or unformatted RUT
 * @returns Clean RUT string (uppercase)
 *
 * @example
 * limpiarRUT('12.345.678-5') // '123456785'
 * limpiarRUT('12345678-k')   // '12345678K'
 */
export function limpiarRUT(rut: string): string {
  return rut.replace(/[^0-9kK]/g, '').toUpperCase();
}

/**
 * Validates a Chilean RUT, ignoring surrounding and inner whitespace
 *
 * @example
 * validarRUT('12.345.678-5')   // true
 * validarRUT(' 12345678-5 ')   // true
 * validarRUT('12.345.678-0')   // false (invalid DV)
 */
export function validarRUT(rut: string): boolean {
  return parse(rut.replace(/\s/g, '')).ok;
}

/**
 * Formats a valid RUT, dots and dash by default
 * @returns Formatted RUT, or null when the input is not a valid RUT
 *
 * @example
 * formatearRUT('123456785')              // '12.345.678-5'
 * formatearRUT('12.345.678-5', 'NONE')   // '123456785'
 * formatearRUT('12345678-0')             // null
 */
export function formatearRUT(rut: string, format: Format = Format.DOTS): string | null {
  const result = parse(rut.replace(/\s/g, ''));
  return result.ok ? result.value.render(format) : null;
}
