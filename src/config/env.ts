import { z } from 'zod';
import { formatSchema } from '../schemas.js';

/**
 * Environment configuration schema with Zod validation
 * Validated once when the CLI starts
 */
const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),

  // Logging
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),

  // Default output format for the CLI (dots, dash, none)
  RUT_FORMAT: formatSchema.default('DASH'),
});

export type Env = z.infer<typeof envSchema>;

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Error de configuración de entorno:\n${issues.join('\n')}`);
    this.name = 'ConfigError';
  }
}

/**
 * Parse and validate environment variables
 * Throws ConfigError on invalid configuration
 */
export function parseEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `  ${issue.path.join('.')}: ${issue.message}`)
    );
  }

  return result.data;
}
