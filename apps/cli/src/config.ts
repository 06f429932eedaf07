// apps/cli/src/config.ts
//
// Runtime configuration for the terminal shell.
//
// Sources, lowest precedence first:
//   1. Defaults
//   2. Environment (loaded from .env by `dotenv/config` in index.ts)
//        LOG_LEVEL       pino level, default "info"
//        BULLSCOWS_SEED  seed string for reproducible secrets
//   3. Command-line flags (--log-level, --seed, --json)

import { ConfigurationError } from '@bullscows/game-core';
import { z } from 'zod';

export const logLevelSchema = z.enum([
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
]);
export type LogLevel = z.infer<typeof logLevelSchema>;

const envSchema = z.object({
  LOG_LEVEL: logLevelSchema.default('info'),
  BULLSCOWS_SEED: z.string().min(1).optional(),
});

const flagsSchema = z.object({
  logLevel: logLevelSchema.optional(),
  seed: z.string().min(1).optional(),
  json: z.boolean().optional(),
});

/** Raw flag values as commander hands them over; validated by loadConfig. */
export type CliFlags = {
  logLevel?: string;
  seed?: string;
  json?: boolean;
};

export interface CliConfig {
  logLevel: LogLevel;
  seed?: string;
  json: boolean;
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
    .join('; ');
}

/**
 * loadConfig merges the environment with command-line flags.
 *
 * @throws ConfigurationError listing every invalid setting
 */
export function loadConfig(
  env: Record<string, string | undefined>,
  flags: CliFlags = {},
): CliConfig {
  const parsedEnv = envSchema.safeParse(env);
  if (!parsedEnv.success) {
    throw new ConfigurationError(
      `Invalid environment: ${describeIssues(parsedEnv.error)}`,
    );
  }
  const parsedFlags = flagsSchema.safeParse(flags);
  if (!parsedFlags.success) {
    throw new ConfigurationError(
      `Invalid options: ${describeIssues(parsedFlags.error)}`,
    );
  }

  const e = parsedEnv.data;
  const f = parsedFlags.data;
  return {
    logLevel: f.logLevel ?? e.LOG_LEVEL,
    seed: f.seed ?? e.BULLSCOWS_SEED,
    json: f.json ?? false,
  };
}
