// apps/cli/src/shell.ts
//
// The interactive shell around one game session.
//
// GameShell maps a line of input to a reply (pure apart from the session it
// drives), and runShell pumps lines from a stream through it. Keeping the two
// apart lets tests drive the shell without a terminal.

import { createInterface } from 'node:readline';
import type { Readable, Writable } from 'node:stream';

import {
  GameFinishedError,
  type BullsCowsGame,
} from '@bullscows/game-core';
import { outcomeSchema, sessionSnapshot } from '@bullscows/protocol';

import type { Logger } from './logger.js';
import {
  HELP,
  INTRO,
  RULES,
  formatHistory,
  formatOutcome,
} from './render.js';

export interface ShellReply {
  lines: string[];
  /** True once the player asked to leave. */
  done: boolean;
}

const reply = (lines: string[], done = false): ShellReply => ({ lines, done });

export class GameShell {
  constructor(
    private readonly game: BullsCowsGame,
    private readonly log: Logger,
    private readonly json = false,
  ) {}

  intro(): string[] {
    return [INTRO];
  }

  handle(raw: string): ShellReply {
    const line = raw.trim();
    if (line === '') return reply([]);

    switch (line.toLowerCase()) {
      case 'quit':
      case 'exit':
        return reply(['Bye!'], true);
      case 'help':
        return reply([HELP]);
      case 'rules':
        return reply([RULES]);
      case 'history':
        return reply(
          this.json
            ? [JSON.stringify(sessionSnapshot.parse(this.game.snapshot()))]
            : formatHistory(this.game.history),
        );
      case 'reset':
        this.game.reset();
        this.log.info('game reset');
        return reply(
          this.json
            ? [JSON.stringify(sessionSnapshot.parse(this.game.snapshot()))]
            : ['New game started. Good luck!'],
        );
      default:
        return this.guess(line);
    }
  }

  private guess(line: string): ShellReply {
    try {
      const outcome = this.game.processGuess(line);
      if (outcome.kind === 'win') {
        this.log.info({ attempts: outcome.attempts }, 'game won');
      }
      return reply([
        this.json
          ? JSON.stringify(outcomeSchema.parse(outcome))
          : formatOutcome(outcome),
      ]);
    } catch (err) {
      // only a finished game is recoverable; InvariantViolationError is a scoring bug
      if (!(err instanceof GameFinishedError)) throw err;
      this.log.warn({ err }, 'guess refused');
      return reply([
        this.json ? JSON.stringify({ error: err.message }) : err.message,
      ]);
    }
  }
}

export interface RunShellOptions {
  input: Readable;
  output: Writable;
  /** Prompt written before each line; omit for piped input. */
  prompt?: string;
}

/**
 * runShell reads lines until the input ends or the player quits.
 */
export async function runShell(
  shell: GameShell,
  { input, output, prompt }: RunShellOptions,
): Promise<void> {
  const write = (lines: string[]) => {
    for (const l of lines) output.write(`${l}\n`);
  };
  const rl = createInterface({ input, crlfDelay: Infinity });

  write(shell.intro());
  if (prompt) output.write(prompt);
  try {
    for await (const line of rl) {
      const { lines, done } = shell.handle(line);
      write(lines);
      if (done) break;
      if (prompt) output.write(prompt);
    }
  } finally {
    rl.close();
  }
}
