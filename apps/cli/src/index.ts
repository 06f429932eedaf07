// apps/cli/src/index.ts
//
// Terminal entry point: parses flags, loads configuration, wires the engine's
// diagnostics into pino and runs the shell on stdin/stdout.
//
// Usage:
//   npm start -- [--seed <seed>] [--log-level <level>] [--json]

import 'dotenv/config';
import { Command } from 'commander';
import { nanoid } from 'nanoid';

import { newGame, seededRandom } from '@bullscows/game-core';

import { loadConfig, type CliFlags } from './config.js';
import { createLogger } from './logger.js';
import { GameShell, runShell } from './shell.js';

async function main(): Promise<void> {
  const program = new Command()
    .name('bulls-cows')
    .description('Guess the secret 4-digit code (all digits different).')
    .option('-s, --seed <seed>', 'seed for reproducible secrets')
    .option('-l, --log-level <level>', 'pino log level (overrides LOG_LEVEL)')
    .option('--json', 'print one JSON object per reply')
    .parse();

  const config = loadConfig(process.env, program.opts<CliFlags>());
  const log = createLogger(config.logLevel).child({ session: nanoid() });

  const game = newGame({
    random: config.seed ? seededRandom(config.seed) : undefined,
    onEvent: (e) => log.debug(e.props, e.name),
  });
  log.info({ seeded: Boolean(config.seed), json: config.json }, 'session started');

  await runShell(new GameShell(game, log, config.json), {
    input: process.stdin,
    output: process.stdout,
    prompt: process.stdin.isTTY ? 'guess> ' : undefined,
  });
  log.info({ attempts: game.attempts, status: game.status }, 'session ended');
}

main().catch((err: unknown) => {
  process.stderr.write(`${err instanceof Error ? err.message : String(err)}\n`);
  process.exitCode = 1;
});
