// packages/game-core/src/events.ts
//
// Structured diagnostics emitted by a session. The engine never logs on its
// own; shells subscribe through `GameOptions.onEvent` and route events to
// their logger or a telemetry collector.

export type GameEvent =
  | { name: 'game_started'; props: { candidates: number; entropy: number } }
  | { name: 'guess_rejected'; props: { message: string; attempts: number } }
  | {
      name: 'candidates_filtered';
      props: {
        attempt: number;
        bulls: number;
        cows: number;
        remaining: number;
        entropy: number;
        mutualInformation: number;
      };
    }
  | { name: 'game_won'; props: { attempts: number } };

export type GameEventListener = (event: GameEvent) => void;
