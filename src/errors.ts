import { formatearNumero } from './format.js';
import { RUT_RANGE } from './range.js';
import type { CheckDigit } from './types.js';

export type RutErrorDetail =
  | { code: 'INVALID_FORMAT' }
  | { code: 'INVALID_DV'; expected: CheckDigit; actual: CheckDigit }
  | { code: 'OUT_OF_RANGE'; min: number; max: number };

export type RutErrorCode = RutErrorDetail['code'];

function messageFor(detail: RutErrorDetail): string {
  switch (detail.code) {
    case 'INVALID_FORMAT':
      return 'El formato del RUT es inválido';
    case 'INVALID_DV':
      return `DV inválido, debe ser ${detail.expected}, en cambio ${detail.actual}.`;
    case 'OUT_OF_RANGE':
      return `El número debe estar entre ${formatearNumero(detail.min)} y ${formatearNumero(detail.max)}`;
  }
}

/**
 * RUT errors with specific codes
 * Returned inside a Result by parse/fromNumber, never thrown by them
 */
export class RutError extends Error {
  constructor(public readonly detail: RutErrorDetail) {
    super(messageFor(detail));
    this.name = 'RutError';
  }

  get code(): RutErrorCode {
    return this.detail.code;
  }

  static invalidFormat(): RutError {
    return new RutError({ code: 'INVALID_FORMAT' });
  }

  static invalidDv(expected: CheckDigit, actual: CheckDigit): RutError {
    return new RutError({ code: 'INVALID_DV', expected, actual });
  }

  static outOfRange(): RutError {
    return new RutError({ code: 'OUT_OF_RANGE', min: RUT_RANGE.MIN, max: RUT_RANGE.MAX });
  }
}
