/**
 * Typed errors for the Hold'em core.
 *
 * Every error extends `Data.TaggedError`, so it is structurally equal,
 * yieldable inside `Effect.gen`, and discriminated by `_tag`.
 *
 * Most of these never escape the engine: the public table operations turn
 * them into no-ops. They are surfaced through the `try*` variants so callers
 * can see why an action was ignored.
 *
 * @module
 */

import { Data } from "effect";

import type { Chips, PlayerId, SeatIndex } from "./brand.js";

// ---------------------------------------------------------------------------
// Action / turn errors
// ---------------------------------------------------------------------------

export class InvalidAction extends Data.TaggedError("InvalidAction")<{
  readonly action: string;
  readonly reason: string;
}> {}

export class NotPlayersTurn extends Data.TaggedError("NotPlayersTurn")<{
  readonly playerId: PlayerId;
  readonly expected: PlayerId | undefined;
}> {}

// ---------------------------------------------------------------------------
// Game-state errors
// ---------------------------------------------------------------------------

/** The engine was asked to do something its current state does not allow. */
export class InvalidGameState extends Data.TaggedError("InvalidGameState")<{
  readonly state: string;
  readonly reason: string;
}> {}

export class PlayerNotFound extends Data.TaggedError("PlayerNotFound")<{
  readonly playerId: PlayerId;
}> {}

// ---------------------------------------------------------------------------
// Cards
// ---------------------------------------------------------------------------

export class InvalidCard extends Data.TaggedError("InvalidCard")<{
  readonly input: string;
  readonly reason: string;
}> {}

export class DeckExhausted extends Data.TaggedError("DeckExhausted")<{
  readonly requested: number;
  readonly remaining: number;
}> {}

// ---------------------------------------------------------------------------
// Seating
// ---------------------------------------------------------------------------

export class SeatOccupied extends Data.TaggedError("SeatOccupied")<{
  readonly seat: SeatIndex;
}> {}

export class TableFull extends Data.TaggedError("TableFull")<{}> {}

// ---------------------------------------------------------------------------
// Hand lifecycle
// ---------------------------------------------------------------------------

export class NotEnoughPlayers extends Data.TaggedError("NotEnoughPlayers")<{
  readonly count: number;
  readonly minimum: number;
}> {}

/** Roster and blind changes are only allowed between hands. */
export class HandInProgress extends Data.TaggedError("HandInProgress")<{}> {}

export class NoHandInProgress extends Data.TaggedError("NoHandInProgress")<{}> {}

// ---------------------------------------------------------------------------
// Tournament
// ---------------------------------------------------------------------------

export class RebuyNotAllowed extends Data.TaggedError("RebuyNotAllowed")<{
  readonly playerId: PlayerId;
  readonly reason: string;
  readonly chips: Chips;
}> {}

// ---------------------------------------------------------------------------
// Cash game
// ---------------------------------------------------------------------------

export class BuyInNotAllowed extends Data.TaggedError("BuyInNotAllowed")<{
  readonly playerId: PlayerId;
  readonly reason: string;
  readonly chips: Chips;
}> {}

// ---------------------------------------------------------------------------
// Union type
// ---------------------------------------------------------------------------

export type PokerError =
  | InvalidAction
  | NotPlayersTurn
  | InvalidGameState
  | PlayerNotFound
  | InvalidCard
  | DeckExhausted
  | SeatOccupied
  | TableFull
  | NotEnoughPlayers
  | HandInProgress
  | NoHandInProgress
  | RebuyNotAllowed
  | BuyInNotAllowed;
