#!/usr/bin/env node
/**
 * Entry point for the rut binary
 */

import * as fs from 'fs';
import { z } from 'zod';
import { parseEnv } from '../config/env.js';
import { debug, error, isLevelEnabled } from '../utils/logger.js';
import { reportFailure, runCli } from './cli.js';

function readVersion(): string {
  // Same relative path from src/cli and dist/cli
  const packageJsonPath = new URL('../../package.json', import.meta.url);
  const packageJson = z
    .object({ version: z.string() })
    .parse(JSON.parse(fs.readFileSync(packageJsonPath, 'utf-8')));
  return packageJson.version;
}

function main(): void {
  try {
    const env = parseEnv();

    process.exitCode = runCli(process.argv.slice(2), {
      out: (line) => process.stdout.write(`${line}\n`),
      err: (line) => process.stderr.write(`${line}\n`),
      // pino is only started when debug lines can pass
      logger: { debug: isLevelEnabled(env.LOG_LEVEL, 'debug') ? debug : () => undefined },
      version: readVersion(),
      defaultFormat: env.RUT_FORMAT,
    });
  } catch (failure) {
    process.exitCode = reportFailure(failure, {
      err: (line) => process.stderr.write(`${line}\n`),
      logError: error,
    });
  }
}

main();
