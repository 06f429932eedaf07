// apps/cli/src/logger.ts
//
// pino logger for the shell. Logs go to stderr so the game's own output on
// stdout stays readable (and parseable in --json mode).

import pino from 'pino';

import type { LogLevel } from './config.js';

export type Logger = pino.Logger;

export function createLogger(level: LogLevel): Logger {
  return pino({ name: 'bulls-cows', level }, pino.destination(2));
}
