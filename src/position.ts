/**
 * What a player can see when it is their turn, and where they sit.
 *
 * Pure module. Strategies only ever receive a `DecisionContext`; they never
 * see the deck or other players' hole cards.
 *
 * @module
 */

import { Option, Schema } from "effect";

import type { Chips, PlayerId, SeatIndex } from "./brand.js";
import { Chips as makeChips } from "./brand.js";
import type { Card } from "./card.js";
import type { LegalActions } from "./action.js";
import type { Player, PlayerStatus } from "./player.js";
import { clockwiseAfter, findPlayer, isInHand } from "./player.js";
import type { Street } from "./dealing.js";
import type { HandState } from "./hand.js";
import { getLegalActions } from "./hand.js";
import type { AIProfile } from "./profile.js";
import type { TableState } from "./table.js";

// ---------------------------------------------------------------------------
// PositionalRole
// ---------------------------------------------------------------------------

export const PositionalRoleSchema = Schema.Literal(
  "Button", "SmallBlind", "BigBlind",
  "UTG", "UTG1", "UTG2", "LJ", "HJ", "CO",
);
export type PositionalRole = Schema.Schema.Type<typeof PositionalRoleSchema>;

const MIDDLE_ROLES: readonly PositionalRole[] = ["UTG", "UTG1", "UTG2", "LJ", "HJ", "CO"];

/**
 * Roles for `n` players, button first. Heads-up the button is also the
 * small blind. Middle seats always include UTG, then fill from the
 * cutoff backwards.
 */
export function roleSequence(n: number): readonly PositionalRole[] {
  if (n <= 0) return [];
  if (n === 1) return ["Button"];
  if (n === 2) return ["Button", "BigBlind"];
  const middle = n - 3;
  if (middle === 0) return ["Button", "SmallBlind", "BigBlind"];
  const tail = middle > 1 ? MIDDLE_ROLES.slice(Math.max(1, MIDDLE_ROLES.length - (middle - 1))) : [];
  return ["Button", "SmallBlind", "BigBlind", "UTG", ...tail];
}

/** Seats dealt into the hand, button first. */
export function buttonFirstOrder(hand: HandState): readonly SeatIndex[] {
  // clockwiseAfter puts the dealer last.
  const seats = clockwiseAfter(hand.players.filter(isInHand), hand.dealerSeat).map(
    (p) => p.seatIndex,
  );
  return [...seats.slice(-1), ...seats.slice(0, -1)];
}

export function positionalRoles(
  hand: HandState,
): ReadonlyMap<SeatIndex, PositionalRole> {
  const order = buttonFirstOrder(hand);
  const roles = roleSequence(order.length);
  const map = new Map<SeatIndex, PositionalRole>();
  order.forEach((seat, i) => {
    const role = roles[i];
    if (role !== undefined) map.set(seat, role);
  });
  return map;
}

/**
 * 0 for the first to act after the flop (small blind), 1 for the button.
 * Heads-up the big blind is 0.
 */
export function positionFactor(hand: HandState, seat: SeatIndex): number {
  const order = clockwiseAfter(hand.players.filter(isInHand), hand.dealerSeat);
  const idx = order.findIndex((p) => p.seatIndex === seat);
  if (idx === -1 || order.length < 2) return 0;
  return idx / (order.length - 1);
}

// ---------------------------------------------------------------------------
// DecisionContext
// ---------------------------------------------------------------------------

export interface OpponentView {
  readonly playerId: PlayerId;
  readonly name: string;
  readonly seatIndex: SeatIndex;
  readonly chips: Chips;
  readonly currentBet: Chips;
  readonly status: PlayerStatus;
  readonly role: Option.Option<PositionalRole>;
}

export interface DecisionContext {
  readonly playerId: PlayerId;
  readonly handNumber: number;
  readonly street: Street;
  readonly holeCards: Option.Option<readonly [Card, Card]>;
  readonly communityCards: readonly Card[];
  /** Everything committed this hand, current street included. */
  readonly potTotal: Chips;
  readonly amountToCall: Chips;
  readonly stack: Chips;
  readonly playerCurrentBet: Chips;
  readonly currentBet: Chips;
  readonly bigBlind: Chips;
  readonly legalActions: LegalActions;
  /** Every other player dealt in, folded or not. */
  readonly opponents: readonly OpponentView[];
  /** Opponents still contesting the pot. */
  readonly liveOpponents: number;
  readonly role: Option.Option<PositionalRole>;
  readonly positionFactor: number;
  /** Two or more full raises on this street and a bet still to call. */
  readonly facingReraise: boolean;
  readonly isPreflopAggressor: boolean;
  readonly profile: Option.Option<AIProfile>;
}

function toOpponentView(
  player: Player,
  roles: ReadonlyMap<SeatIndex, PositionalRole>,
): OpponentView {
  return {
    playerId: player.id,
    name: player.name,
    seatIndex: player.seatIndex,
    chips: player.chips,
    currentBet: player.currentBet,
    status: player.status,
    role: Option.fromNullable(roles.get(player.seatIndex)),
  };
}

/** Build the context for the player the hand is waiting on. */
export function buildHandContext(
  hand: HandState,
  playerId: PlayerId,
): Option.Option<DecisionContext> {
  if (!Option.exists(hand.toAct, (id) => id === playerId)) return Option.none();
  return Option.flatMap(findPlayer(hand.players, playerId), (player) =>
    Option.map(getLegalActions(hand), (legalActions) => {
      const roles = positionalRoles(hand);
      const opponents = hand.players
        .filter((p) => p.id !== playerId && isInHand(p))
        .map((p) => toOpponentView(p, roles));
      const toCall = Math.max(0, hand.betting.currentBet - player.currentBet);
      return {
        playerId,
        handNumber: hand.handNumber,
        street: hand.street,
        holeCards: player.holeCards,
        communityCards: hand.communityCards,
        potTotal: hand.pot.total,
        amountToCall: makeChips(Math.min(toCall, player.chips)),
        stack: player.chips,
        playerCurrentBet: player.currentBet,
        currentBet: hand.betting.currentBet,
        bigBlind: hand.forcedBets.bigBlind,
        legalActions,
        opponents,
        liveOpponents: opponents.filter((o) => o.status === "Active" || o.status === "AllIn").length,
        role: Option.fromNullable(roles.get(player.seatIndex)),
        positionFactor: positionFactor(hand, player.seatIndex),
        facingReraise: hand.betting.raiseCount >= 2 && toCall > 0,
        isPreflopAggressor: Option.exists(hand.preflopAggressor, (id) => id === playerId),
        profile: player.profile,
      };
    }),
  );
}

/** Context for `playerId` at the table, if the table is waiting on them. */
export function buildDecisionContext(
  table: TableState,
  playerId: PlayerId,
): Option.Option<DecisionContext> {
  return Option.flatMap(table.currentHand, (hand) => buildHandContext(hand, playerId));
}
