/**
 * The 52-card deck as an immutable sequence with a draw cursor.
 *
 * Shuffling is the only effectful operation here and draws from Effect's
 * `Random` service, so a seeded `Random` reproduces a deal exactly.
 *
 * @module
 */

import { Chunk, Effect, Either, Random } from "effect";
import type { Card } from "./card.js";
import { ALL_CARDS, cardKey } from "./card.js";
import { DeckExhausted } from "./error.js";

// ---------------------------------------------------------------------------
// Deck type
// ---------------------------------------------------------------------------

export interface Deck {
  readonly cards: readonly Card[];
  /** Index of the next card to be drawn. */
  readonly cursor: number;
}

/** Build a deck from an explicit card order (stacked decks, replays). */
export const fromCards = (cards: readonly Card[]): Deck => ({ cards, cursor: 0 });

/**
 * A freshly shuffled 52-card deck.
 *
 * Every hand starts from one of these; decks are never reused across hands.
 */
export const shuffled: Effect.Effect<Deck> = Effect.map(
  Random.shuffle(ALL_CARDS),
  (chunk) => fromCards(Chunk.toReadonlyArray(chunk)),
);

export const remaining = (deck: Deck): number => deck.cards.length - deck.cursor;

// ---------------------------------------------------------------------------
// Drawing
// ---------------------------------------------------------------------------

/**
 * Draw `count` cards from the cursor.
 *
 * @returns the drawn cards and the advanced deck, or `DeckExhausted`.
 */
export function draw(
  deck: Deck,
  count: number,
): Either.Either<readonly [readonly Card[], Deck], DeckExhausted> {
  if (count > remaining(deck)) {
    return Either.left(
      new DeckExhausted({ requested: count, remaining: remaining(deck) }),
    );
  }
  const drawn = deck.cards.slice(deck.cursor, deck.cursor + count);
  return Either.right([drawn, { cards: deck.cards, cursor: deck.cursor + count }]);
}

/** Draw exactly one card. */
export function drawOne(
  deck: Deck,
): Either.Either<readonly [Card, Deck], DeckExhausted> {
  const top = deck.cards[deck.cursor];
  if (top === undefined) {
    return Either.left(new DeckExhausted({ requested: 1, remaining: 0 }));
  }
  return Either.right([top, { cards: deck.cards, cursor: deck.cursor + 1 }]);
}

/** Discard the top card face down. */
export const burn = (deck: Deck): Either.Either<Deck, DeckExhausted> =>
  Either.map(drawOne(deck), ([, rest]) => rest);

// ---------------------------------------------------------------------------
// Known-card removal
// ---------------------------------------------------------------------------

/**
 * The cards of a full deck that are not among `known`, in deck order.
 *
 * Monte Carlo rollouts sample from this list.
 */
export function remainingCards(known: readonly Card[]): readonly Card[] {
  const seen = new Set(known.map(cardKey));
  return ALL_CARDS.filter((c) => !seen.has(cardKey(c)));
}
