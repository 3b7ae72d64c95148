/**
 * Events emitted by the engine.
 *
 * Consumers (logging, statistics, animation) read these; nothing in the
 * engine reads them back. Events carry player ids, never hole cards, except
 * for the showdown reveal inside `HandEnded`.
 *
 * @module
 */

import type { Chips, PlayerId } from "./brand.js";
import type { Action } from "./action.js";
import type { Card } from "./card.js";
import type { Street } from "./dealing.js";
import type { ForcedBets } from "./hand.js";
import type { HandResult } from "./result.js";

// ---------------------------------------------------------------------------
// GameEvent: discriminated union
// ---------------------------------------------------------------------------

export interface Post {
  readonly playerId: PlayerId;
  readonly amount: Chips;
}

export type GameEvent =
  | { readonly _tag: "HandStarted"; readonly handNumber: number; readonly dealer: PlayerId; readonly players: readonly PlayerId[] }
  | { readonly _tag: "ForcedBetsPosted"; readonly smallBlind: Post; readonly bigBlind: Post; readonly antes: readonly Post[] }
  | { readonly _tag: "HoleCardsDealt"; readonly playerId: PlayerId }
  | { readonly _tag: "ActionRequested"; readonly handNumber: number; readonly playerId: PlayerId }
  | { readonly _tag: "PlayerActed"; readonly playerId: PlayerId; readonly action: Action; readonly amount: Chips; readonly street: Street }
  | { readonly _tag: "BettingRoundEnded"; readonly street: Street }
  | { readonly _tag: "CommunityCardsDealt"; readonly cards: readonly Card[]; readonly street: Street }
  | { readonly _tag: "RunOutStarted"; readonly street: Street }
  | { readonly _tag: "ShowdownStarted" }
  | { readonly _tag: "PotAwarded"; readonly playerId: PlayerId; readonly amount: Chips; readonly potIndex: number }
  | { readonly _tag: "HandEnded"; readonly result: HandResult }
  | { readonly _tag: "HandSkipped"; readonly handNumber: number; readonly reason: string }
  | { readonly _tag: "PlayerEliminated"; readonly playerId: PlayerId }
  | { readonly _tag: "PlayerSatDown"; readonly playerId: PlayerId; readonly chips: Chips }
  | { readonly _tag: "PlayerStoodUp"; readonly playerId: PlayerId }
  | { readonly _tag: "ChipsAdded"; readonly playerId: PlayerId; readonly amount: Chips }
  | { readonly _tag: "ForcedBetsChanged"; readonly forcedBets: ForcedBets };

export type GameEventTag = GameEvent["_tag"];

// ---------------------------------------------------------------------------
// Constructors
// ---------------------------------------------------------------------------

export const HandStarted = (
  handNumber: number,
  dealer: PlayerId,
  players: readonly PlayerId[],
): GameEvent => ({ _tag: "HandStarted", handNumber, dealer, players });

export const ForcedBetsPosted = (
  smallBlind: Post,
  bigBlind: Post,
  antes: readonly Post[],
): GameEvent => ({ _tag: "ForcedBetsPosted", smallBlind, bigBlind, antes });

export const HoleCardsDealt = (playerId: PlayerId): GameEvent => ({
  _tag: "HoleCardsDealt",
  playerId,
});

/** The engine is waiting on this player. Schedulers key off it. */
export const ActionRequested = (handNumber: number, playerId: PlayerId): GameEvent => ({
  _tag: "ActionRequested",
  handNumber,
  playerId,
});

export const PlayerActed = (
  playerId: PlayerId,
  action: Action,
  amount: Chips,
  street: Street,
): GameEvent => ({ _tag: "PlayerActed", playerId, action, amount, street });

export const BettingRoundEnded = (street: Street): GameEvent => ({
  _tag: "BettingRoundEnded",
  street,
});

export const CommunityCardsDealt = (
  cards: readonly Card[],
  street: Street,
): GameEvent => ({ _tag: "CommunityCardsDealt", cards, street });

/** Betting is over; the remaining streets will be dealt without action. */
export const RunOutStarted = (street: Street): GameEvent => ({
  _tag: "RunOutStarted",
  street,
});

export const ShowdownStarted: GameEvent = { _tag: "ShowdownStarted" };

export const PotAwarded = (
  playerId: PlayerId,
  amount: Chips,
  potIndex: number,
): GameEvent => ({ _tag: "PotAwarded", playerId, amount, potIndex });

export const HandEnded = (result: HandResult): GameEvent => ({
  _tag: "HandEnded",
  result,
});

export const HandSkipped = (handNumber: number, reason: string): GameEvent => ({
  _tag: "HandSkipped",
  handNumber,
  reason,
});

export const PlayerEliminated = (playerId: PlayerId): GameEvent => ({
  _tag: "PlayerEliminated",
  playerId,
});

export const PlayerSatDown = (playerId: PlayerId, chips: Chips): GameEvent => ({
  _tag: "PlayerSatDown",
  playerId,
  chips,
});

export const PlayerStoodUp = (playerId: PlayerId): GameEvent => ({
  _tag: "PlayerStoodUp",
  playerId,
});

export const ChipsAdded = (playerId: PlayerId, amount: Chips): GameEvent => ({
  _tag: "ChipsAdded",
  playerId,
  amount,
});

export const ForcedBetsChanged = (forcedBets: ForcedBets): GameEvent => ({
  _tag: "ForcedBetsChanged",
  forcedBets,
});
