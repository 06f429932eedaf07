// packages/game-core/src/index.ts
//
// Entry point for the game-core package.
// Re-exports all core game logic so consumers can import from one place.
//
// Includes:
//   • codes.ts   → Code type, candidate universe, formatting helpers
//   • scoring.ts → bulls/cows scoring (scoreGuess, Score)
//   • entropy.ts → entropy / mutual-information measures
//   • filter.ts  → constraint-based candidate filtering
//   • random.ts  → secret drawing and seeded random sources
//   • game.ts    → the session (BullsCowsGame, newGame, processGuess)
//   • events.ts  → structured diagnostics emitted by sessions
//   • errors.ts  → error classes
//
// Example usage:
//   import { newGame, seededRandom } from '@bullscows/game-core';

export * from './codes.js';
export * from './scoring.js';
export * from './entropy.js';
export * from './filter.js';
export * from './random.js';
export * from './game.js';
export * from './events.js';
export * from './errors.js';
