/**
 * rut CLI - parse, validate, format and generate Chilean RUTs
 *
 * Usage:
 *   rut parse 17.951.585-7
 *   rut from-number 24136773 --format dots
 *   rut random --count 5
 *   rut format 179515857
 */

import { z } from 'zod';
import { ConfigError } from '../config/env.js';
import { Format } from '../format.js';
import type { RandomSource } from '../range.js';
import { parse, randomize, type Rut } from '../rut.js';
import { formatSchema, rutNumberSchema } from '../schemas.js';

export const EXIT_OK = 0;
export const EXIT_INVALID = 1;
export const EXIT_USAGE = 2;

const MAX_COUNT = 1000;

/**
 * Minimal logger contract, satisfied by utils/logger and by test fakes
 */
export interface CliLogger {
  debug(message: string, context?: Record<string, unknown>): void;
}

export interface CliDeps {
  /** Writes one line to stdout */
  out: (line: string) => void;
  /** Writes one line to stderr */
  err: (line: string) => void;
  logger: CliLogger;
  version: string;
  defaultFormat: Format;
  random?: RandomSource;
}

export type ParsedArgs =
  | { mode: 'help' | 'version' }
  | { mode: 'parse' | 'from-number'; inputs: string[]; format: Format }
  | { mode: 'random'; count: number; format: Format }
  | { mode: 'format'; input: string };

export interface FailureDeps {
  err: (line: string) => void;
  logError: (message: string, context?: Record<string, unknown>) => void;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

const countSchema = z.coerce
  .number({ invalid_type_error: '--count debe ser numérico' })
  .int('--count debe ser un número entero')
  .min(1, '--count debe ser al menos 1')
  .max(MAX_COUNT, `--count no puede superar ${MAX_COUNT}`);

function takeValue(argv: string[], index: number, flag: string): string {
  const value = argv[index + 1];
  if (value === undefined || value.startsWith('--')) {
    throw new UsageError(`Falta el valor de ${flag}`);
  }
  return value;
}

function firstIssue(error: z.ZodError): string {
  return error.issues[0]?.message ?? error.message;
}

/**
 * Parse command-line arguments into structured command
 * @param argv - Raw command-line arguments (typically process.argv.slice(2))
 */
export function parseArgs(argv: string[], defaultFormat: Format): ParsedArgs {
  // Check for --help and --version in any position
  if (argv.includes('--help') || argv.includes('-h')) {
    return { mode: 'help' };
  }
  if (argv.includes('--version')) {
    return { mode: 'version' };
  }

  const positionals: string[] = [];
  let formatArg: string | undefined;
  let countArg: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';

    if (arg === '--format' || arg === '--count') {
      const value = takeValue(argv, i, arg);
      if (arg === '--format') formatArg = value;
      else countArg = value;
      i++;
    } else if (arg.startsWith('--format=')) {
      formatArg = arg.slice('--format='.length);
    } else if (arg.startsWith('--count=')) {
      countArg = arg.slice('--count='.length);
    } else if (arg.startsWith('-') && !/^-\d/.test(arg)) {
      throw new UsageError(`Opción desconocida: ${arg}`);
    } else {
      positionals.push(arg);
    }
  }

  const [command, ...rest] = positionals;
  if (command === undefined) {
    return { mode: 'help' };
  }

  let format = defaultFormat;
  if (formatArg !== undefined) {
    const parsed = formatSchema.safeParse(formatArg);
    if (!parsed.success) throw new UsageError(firstIssue(parsed.error));
    format = parsed.data;
  }

  if (countArg !== undefined && command !== 'random') {
    throw new UsageError('--count solo aplica al comando random');
  }

  switch (command) {
    case 'parse':
    case 'from-number':
      if (rest.length === 0) {
        throw new UsageError(`El comando ${command} requiere al menos un argumento`);
      }
      return { mode: command, inputs: rest, format };
    case 'random': {
      if (rest.length > 0) {
        throw new UsageError('El comando random no recibe argumentos');
      }
      const count = countSchema.safeParse(countArg ?? 1);
      if (!count.success) throw new UsageError(firstIssue(count.error));
      return { mode: 'random', count: count.data, format };
    }
    case 'format': {
      const input = rest[0];
      if (input === undefined || rest.length > 1) {
        throw new UsageError('El comando format requiere exactamente un RUT');
      }
      return { mode: 'format', input };
    }
    default:
      throw new UsageError(`Comando desconocido: ${command}`);
  }
}

const HELP = `rut - Validación y formato de RUT chileno

Usage:
  rut parse <rut...>          Validate RUTs and show number and DV
  rut from-number <n...>      Compute the DV for RUT bodies
  rut random [--count N]      Generate random valid RUTs (max ${MAX_COUNT})
  rut format <rut>            Show a RUT in every format
  rut --help                  Show this help message
  rut --version               Show version information

Options:
  --format dots|dash|none     Output format (default: RUT_FORMAT or dash)

Examples:
  rut parse 17.951.585-7
  rut from-number 24136773 --format dots
  rut random --count 3`;

function printRut(rut: Rut, format: Format, deps: CliDeps): void {
  deps.out(`Número: ${rut.number}`);
  deps.out(`DV: ${rut.dv}`);
  deps.out(`RUT: ${rut.render(format)}`);
}

/**
 * Runs one CLI invocation
 * @returns Process exit code
 */
export function runCli(argv: string[], deps: CliDeps): number {
  let parsed: ParsedArgs;
  try {
    parsed = parseArgs(argv, deps.defaultFormat);
  } catch (error) {
    if (!(error instanceof UsageError)) throw error;
    deps.err(error.message);
    deps.err('Use rut --help para ver las opciones');
    return EXIT_USAGE;
  }

  const command = parsed;
  switch (command.mode) {
    case 'help':
      deps.out(HELP);
      return EXIT_OK;

    case 'version':
      deps.out(`rut ${deps.version}`);
      return EXIT_OK;

    case 'parse':
    case 'from-number': {
      let exitCode = EXIT_OK;

      for (const [index, input] of command.inputs.entries()) {
        if (index > 0) deps.out('');

        if (command.mode === 'parse') {
          const result = parse(input);
          if (result.ok) {
            deps.logger.debug('RUT parsed', { input, rut: result.value.toString() });
            printRut(result.value, command.format, deps);
          } else {
            deps.logger.debug('RUT rejected', { input, code: result.error.code });
            deps.err(`${input}: ${result.error.message}`);
            exitCode = EXIT_INVALID;
          }
          continue;
        }

        const result = rutNumberSchema.safeParse(input);
        if (result.success) {
          deps.logger.debug('DV computed', { input, rut: result.data.toString() });
          printRut(result.data, command.format, deps);
        } else {
          deps.logger.debug('RUT body rejected', { input });
          deps.err(`${input}: ${firstIssue(result.error)}`);
          exitCode = EXIT_INVALID;
        }
      }

      return exitCode;
    }

    case 'random':
      for (let i = 0; i < command.count; i++) {
        deps.out(randomize(deps.random).render(command.format));
      }
      deps.logger.debug('Random RUTs generated', { count: command.count });
      return EXIT_OK;

    case 'format': {
      const result = parse(command.input);
      if (!result.ok) {
        deps.err(`${command.input}: ${result.error.message}`);
        return EXIT_INVALID;
      }
      deps.out(`Dots: ${result.value.render(Format.DOTS)}`);
      deps.out(`Dash: ${result.value.render(Format.DASH)}`);
      deps.out(`None: ${result.value.render(Format.NONE)}`);
      return EXIT_OK;
    }
  }
}

/**
 * Reports an error that escaped runCli or the startup
 * Configuration problems go to stderr as-is; anything else is logged with its stack.
 * @returns Process exit code
 */
export function reportFailure(failure: unknown, deps: FailureDeps): number {
  if (failure instanceof ConfigError) {
    deps.err(failure.message);
  } else {
    deps.logError('Unexpected failure', { err: failure });
  }
  return EXIT_INVALID;
}
