/**
 * Dealing: hole cards and community-card streets.
 *
 * @module
 */

import { Either, Option } from "effect";
import type { SeatIndex } from "./brand.js";
import type { Card } from "./card.js";
import type { Deck } from "./deck.js";
import { burn, draw } from "./deck.js";
import type { DeckExhausted } from "./error.js";
import { InvalidGameState } from "./error.js";
import type { Player } from "./player.js";
import { clockwiseAfter, dealCards, isInHand } from "./player.js";

// ---------------------------------------------------------------------------
// Streets
// ---------------------------------------------------------------------------

export type Street = "Preflop" | "Flop" | "Turn" | "River";

export const STREETS: readonly Street[] = ["Preflop", "Flop", "Turn", "River"] as const;

export function nextStreet(street: Street): Option.Option<Street> {
  return Option.fromNullable(STREETS[STREETS.indexOf(street) + 1]);
}

/** Community-card streets still to come after `street`. */
export function streetsRemaining(street: Street): number {
  return STREETS.length - 1 - STREETS.indexOf(street);
}

const CARDS_PER_STREET: Record<Street, number> = {
  Preflop: 0,
  Flop: 3,
  Turn: 1,
  River: 1,
};

/** Community cards visible once `street` has been dealt. */
export function boardSizeAt(street: Street): number {
  let total = 0;
  for (const s of STREETS.slice(0, STREETS.indexOf(street) + 1)) {
    total += CARDS_PER_STREET[s];
  }
  return total;
}

// ---------------------------------------------------------------------------
// Hole cards
// ---------------------------------------------------------------------------

/**
 * Deal two hole cards to every player in the hand, one card per pass,
 * starting with the first seat left of the dealer.
 */
export function dealHoleCards(
  deck: Deck,
  players: readonly Player[],
  dealerSeat: SeatIndex,
): Either.Either<readonly [readonly Player[], Deck], DeckExhausted> {
  const order = clockwiseAfter(players.filter(isInHand), dealerSeat);
  return Either.flatMap(draw(deck, order.length * 2), ([cards, rest]) => {
    const dealt = new Map<Player["id"], readonly [Card, Card]>();
    order.forEach((p, i) => {
      const first = cards[i];
      const second = cards[i + order.length];
      if (first !== undefined && second !== undefined) {
        dealt.set(p.id, [first, second]);
      }
    });
    const updated = players.map((p) => {
      const hole = dealt.get(p.id);
      return hole === undefined ? p : dealCards(p, hole);
    });
    return Either.right([updated, rest] as const);
  });
}

// ---------------------------------------------------------------------------
// Community streets
// ---------------------------------------------------------------------------

export interface StreetDeal {
  readonly street: Street;
  readonly dealt: readonly Card[];
  readonly communityCards: readonly Card[];
  readonly deck: Deck;
}

/**
 * Deal the street after `current`: burn one, then three cards for the flop
 * or one for the turn and river.
 */
export function dealNextStreet(
  deck: Deck,
  communityCards: readonly Card[],
  current: Street,
): Either.Either<StreetDeal, DeckExhausted | InvalidGameState> {
  const next = nextStreet(current);
  if (Option.isNone(next)) {
    return Either.left(
      new InvalidGameState({ state: current, reason: "No street after the river" }),
    );
  }
  const street = next.value;
  return burn(deck).pipe(
    Either.flatMap((burned) => draw(burned, CARDS_PER_STREET[street])),
    Either.map(([dealt, rest]) => ({
      street,
      dealt,
      communityCards: [...communityCards, ...dealt],
      deck: rest,
    })),
  );
}
