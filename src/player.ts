/**
 * Players and their per-hand state.
 *
 * A `Player` persists across hands; `resetForHand` clears the per-hand
 * fields while keeping the stack. Every transition returns a new value.
 *
 * @module
 */

import { Option } from "effect";
import type { Chips, PlayerId, SeatIndex } from "./brand.js";
import { ZERO_CHIPS, addChips, minChips, subtractChips } from "./brand.js";
import type { Card } from "./card.js";
import type { AIProfile } from "./profile.js";

// ---------------------------------------------------------------------------
// Player
// ---------------------------------------------------------------------------

export type PlayerStatus = "Active" | "Folded" | "AllIn" | "Eliminated";

export interface Player {
  readonly id: PlayerId;
  readonly name: string;
  readonly seatIndex: SeatIndex;
  readonly chips: Chips;
  readonly holeCards: Option.Option<readonly [Card, Card]>;
  /** Chips put in on the current street. */
  readonly currentBet: Chips;
  /** Chips put in over the whole hand, antes included. */
  readonly totalBetThisHand: Chips;
  readonly status: PlayerStatus;
  /** Present for computer-controlled players. */
  readonly profile: Option.Option<AIProfile>;
}

export interface PlayerSeed {
  readonly id: PlayerId;
  readonly name: string;
  readonly seatIndex: SeatIndex;
  readonly chips: Chips;
  readonly profile?: AIProfile;
}

export function createPlayer(seed: PlayerSeed): Player {
  return {
    id: seed.id,
    name: seed.name,
    seatIndex: seed.seatIndex,
    chips: seed.chips,
    holeCards: Option.none(),
    currentBet: ZERO_CHIPS,
    totalBetThisHand: ZERO_CHIPS,
    status: seed.chips > 0 ? "Active" : "Eliminated",
    profile: Option.fromNullable(seed.profile),
  };
}

// ---------------------------------------------------------------------------
// Chip movement
// ---------------------------------------------------------------------------

/**
 * Move up to `amount` chips from the stack into the current bet.
 *
 * The amount is capped at the stack; emptying the stack makes the player
 * all-in.
 */
export function placeBet(player: Player, amount: Chips): Player {
  const paid = minChips(amount, player.chips);
  const chips = subtractChips(player.chips, paid);
  return {
    ...player,
    chips,
    currentBet: addChips(player.currentBet, paid),
    totalBetThisHand: addChips(player.totalBetThisHand, paid),
    status: chips === 0 ? "AllIn" : player.status,
  };
}

/**
 * Post an ante: counts toward the hand total but not toward the street bet.
 */
export function postAnte(player: Player, amount: Chips): Player {
  const paid = minChips(amount, player.chips);
  const chips = subtractChips(player.chips, paid);
  return {
    ...player,
    chips,
    totalBetThisHand: addChips(player.totalBetThisHand, paid),
    status: chips === 0 ? "AllIn" : player.status,
  };
}

export function fold(player: Player): Player {
  return { ...player, status: "Folded" };
}

/**
 * Add winnings to the stack. An eliminated winner comes back as active.
 */
export function winChips(player: Player, amount: Chips): Player {
  const chips = addChips(player.chips, amount);
  const status =
    player.status === "Eliminated" && chips > 0 ? "Active" : player.status;
  return { ...player, chips, status };
}

/** Zero the street bet once it has been swept into the pot. */
export function collectBet(player: Player): Player {
  return { ...player, currentBet: ZERO_CHIPS };
}

export function dealCards(player: Player, cards: readonly [Card, Card]): Player {
  return { ...player, holeCards: Option.some(cards) };
}

/**
 * Clear per-hand state before a deal. Players without chips sit the hand
 * out as eliminated.
 */
export function resetForHand(player: Player): Player {
  return {
    ...player,
    holeCards: Option.none(),
    currentBet: ZERO_CHIPS,
    totalBetThisHand: ZERO_CHIPS,
    status: player.chips > 0 ? "Active" : "Eliminated",
  };
}

/** Mark a player eliminated once settlement has left them with nothing. */
export function settleElimination(player: Player): Player {
  return player.chips === 0 ? { ...player, status: "Eliminated" } : player;
}

// ---------------------------------------------------------------------------
// Queries
// ---------------------------------------------------------------------------

/** Can still make voluntary betting decisions this hand. */
export function canAct(player: Player): boolean {
  return player.status === "Active" && player.chips > 0;
}

/** Still contesting the pot (active or all-in). */
export function isLive(player: Player): boolean {
  return player.status === "Active" || player.status === "AllIn";
}

/** Was dealt into the current hand. */
export function isInHand(player: Player): boolean {
  return player.status !== "Eliminated";
}

export const isBot = (player: Player): boolean => Option.isSome(player.profile);

// ---------------------------------------------------------------------------
// Seat order
// ---------------------------------------------------------------------------

/**
 * Players in clockwise order starting with the first seat after `seat`.
 * The player at `seat`, if any, comes last.
 */
export function clockwiseAfter(
  players: readonly Player[],
  seat: SeatIndex,
): readonly Player[] {
  const sorted = [...players].sort((a, b) => a.seatIndex - b.seatIndex);
  const after = sorted.filter((p) => p.seatIndex > seat);
  const upTo = sorted.filter((p) => p.seatIndex <= seat);
  return [...after, ...upTo];
}

/** First player clockwise after `seat` satisfying `predicate`. */
export function nextPlayer(
  players: readonly Player[],
  seat: SeatIndex,
  predicate: (p: Player) => boolean,
): Option.Option<Player> {
  return Option.fromNullable(clockwiseAfter(players, seat).find(predicate));
}

export function findPlayer(
  players: readonly Player[],
  id: PlayerId,
): Option.Option<Player> {
  return Option.fromNullable(players.find((p) => p.id === id));
}

export function replacePlayer(
  players: readonly Player[],
  updated: Player,
): readonly Player[] {
  return players.map((p) => (p.id === updated.id ? updated : p));
}
