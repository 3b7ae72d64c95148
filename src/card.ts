/**
 * Card values.
 *
 * Cards are immutable `Data.struct` values, so two cards with the same rank
 * and suit are `Equal.equals`. The two-character text form (`"As"`, `"Td"`)
 * is the one pokersolver understands.
 *
 * @module
 */

import { Array as A, Data, Either, pipe } from "effect";
import { InvalidCard } from "./error.js";

// ---------------------------------------------------------------------------
// Rank / Suit
// ---------------------------------------------------------------------------

/** Numeric rank: 2-10, 11=J, 12=Q, 13=K, 14=A (ace high). */
export type Rank = 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9 | 10 | 11 | 12 | 13 | 14;

export const RANKS: readonly Rank[] = [
  2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12, 13, 14,
] as const;

/** Clubs, diamonds, hearts, spades. */
export type Suit = "c" | "d" | "h" | "s";

export const SUITS: readonly Suit[] = ["c", "d", "h", "s"] as const;

// ---------------------------------------------------------------------------
// Card
// ---------------------------------------------------------------------------

export interface Card {
  readonly rank: Rank;
  readonly suit: Suit;
}

export const card = (rank: Rank, suit: Suit): Card =>
  Data.struct({ rank, suit });

/** The 52 distinct cards, rank-major. */
export const ALL_CARDS: readonly Card[] = pipe(
  RANKS,
  A.flatMap((rank) => A.map(SUITS, (suit) => card(rank, suit))),
);

/**
 * Dense index of a card in `[0, 51]`.
 *
 * Used where cards go into plain sets or lookup arrays.
 */
export const cardKey = (c: Card): number =>
  (c.rank - 2) * 4 + SUITS.indexOf(c.suit);

// ---------------------------------------------------------------------------
// Text form
// ---------------------------------------------------------------------------

const RANK_TO_CHAR: Record<Rank, string> = {
  2: "2",
  3: "3",
  4: "4",
  5: "5",
  6: "6",
  7: "7",
  8: "8",
  9: "9",
  10: "T",
  11: "J",
  12: "Q",
  13: "K",
  14: "A",
};

const CHAR_TO_RANK: Record<string, Rank> = {
  "2": 2,
  "3": 3,
  "4": 4,
  "5": 5,
  "6": 6,
  "7": 7,
  "8": 8,
  "9": 9,
  T: 10,
  J: 11,
  Q: 12,
  K: 13,
  A: 14,
};

function isSuit(s: string): s is Suit {
  return SUITS.some((suit) => suit === s);
}

/**
 * @example
 *   cardToString(card(14, "s")); // "As"
 *   cardToString(card(10, "h")); // "Th"
 */
export const cardToString = (c: Card): string => RANK_TO_CHAR[c.rank] + c.suit;

export const cardFromString = (s: string): Either.Either<Card, InvalidCard> => {
  const rankChar = s[0];
  const suitChar = s[1];
  if (s.length !== 2 || rankChar === undefined || suitChar === undefined) {
    return Either.left(
      new InvalidCard({ input: s, reason: `Expected 2 chars, got ${s.length}` }),
    );
  }

  const rank = CHAR_TO_RANK[rankChar.toUpperCase()];
  if (rank === undefined) {
    return Either.left(
      new InvalidCard({ input: s, reason: `Invalid rank character: "${rankChar}"` }),
    );
  }

  const suit = suitChar.toLowerCase();
  if (!isSuit(suit)) {
    return Either.left(
      new InvalidCard({ input: s, reason: `Invalid suit character: "${suitChar}"` }),
    );
  }

  return Either.right(card(rank, suit));
};

/**
 * Parse a whitespace-separated list of cards, e.g. `"As Kd 7c"`.
 *
 * Fails on the first malformed entry.
 */
export const parseCards = (
  s: string,
): Either.Either<readonly Card[], InvalidCard> =>
  Either.all(
    s
      .trim()
      .split(/\s+/)
      .filter((token) => token.length > 0)
      .map(cardFromString),
  );

/** Parse a card list, throwing on malformed input. For fixtures and tests. */
export const unsafeParseCards = (s: string): readonly Card[] =>
  Either.getOrThrowWith(parseCards(s), (e) => new Error(e.reason));

export const unsafeCardFromString = (s: string): Card =>
  Either.getOrThrowWith(cardFromString(s), (e) => new Error(e.reason));
