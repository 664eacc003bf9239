/**
 * rut-utils - Chilean RUT validation, formatting and generation
 *
 * - Modulus 11 check digit
 * - Parsing of XX.XXX.XXX-X, XXXXXXXX-X and XXXXXXXXX
 * - DOTS / DASH / NONE output formats
 * - Zod schemas for request payloads
 */

// RUT entity
export {
  Rut,
  parse,
  fromNumber,
  randomize,
  validarRUT,
  formatearRUT,
  limpiarRUT
} from './rut.js';

// Check digit
export { computeCheckDigit } from './checksum.js';

// Range
export { RUT_RANGE, isInRange, randomNumber, type RandomSource } from './range.js';

// Formatting
export { Format, formatearNumero } from './format.js';

// Errors
export { RutError, type RutErrorCode, type RutErrorDetail } from './errors.js';
export type { CheckDigit, Result } from './types.js';

// Schemas
export { rutSchema, rutNumberSchema, formatSchema } from './schemas.js';
