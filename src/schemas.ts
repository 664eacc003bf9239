import { z } from 'zod';
import type { RutError } from './errors.js';
import { Format } from './format.js';
import { fromNumber, parse, type Rut } from './rut.js';
import type { Result } from './types.js';

function toRut(result: Result<Rut, RutError>, ctx: z.RefinementCtx): Rut {
  if (!result.ok) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: result.error.message,
      params: { code: result.error.code },
    });
    return z.NEVER;
  }

  return result.value;
}

/**
 * RUT text field, validated with the Modulus 11 algorithm
 * Output is a Rut instance
 */
export const rutSchema = z
  .string({ required_error: 'RUT requerido' })
  .trim()
  .min(1, 'RUT requerido')
  .transform((value, ctx) => toRut(parse(value), ctx));

/**
 * RUT body without DV (number or numeric string)
 */
export const rutNumberSchema = z.coerce
  .number({ invalid_type_error: 'El cuerpo del RUT debe ser numérico' })
  .int('El cuerpo del RUT debe ser un número entero')
  .transform((value, ctx) => toRut(fromNumber(value), ctx));

/**
 * Output format, case-insensitive ("dots", "DASH", ...)
 */
export const formatSchema = z
  .string()
  .trim()
  .toUpperCase()
  .pipe(
    z.enum([Format.DOTS, Format.DASH, Format.NONE], {
      errorMap: () => ({ message: 'Formato inválido, use dots, dash o none' }),
    })
  );

// Type exports
export type RutInput = z.input<typeof rutSchema>;
export type FormatInput = z.input<typeof formatSchema>;
