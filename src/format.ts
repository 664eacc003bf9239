/**
 * Output formats for RUTs and Chilean number grouping
 *
 * es-CL uses a dot (.) as thousands separator.
 */

/**
 * RUT output formats
 */
export const Format = {
  /** 17.951.585-7 */
  DOTS: 'DOTS',
  /** 17951585-7 */
  DASH: 'DASH',
  /** 179515857 */
  NONE: 'NONE',
} as const;

export type Format = (typeof Format)[keyof typeof Format];

const numberFormat = new Intl.NumberFormat('es-CL', { useGrouping: true });

/**
 * Formats a number with Chilean thousands separator (dot)
 * @param value - Number to format
 * @returns Formatted string like "1.234.567"
 *
 * @example
 * formatearNumero(17951585) // '17.951.585'
 */
export function formatearNumero(value: number): string {
  return numberFormat.format(value);
}
