import { Effect, Either, Random } from "effect";
import { Chips, PlayerId, SeatIndex } from "../src/brand.js";
import type { Card } from "../src/card.js";
import { unsafeParseCards } from "../src/card.js";
import type { Deck } from "../src/deck.js";
import { fromCards, remainingCards } from "../src/deck.js";
import type { Player, PlayerSeed } from "../src/player.js";
import { createPlayer } from "../src/player.js";
import type { AIProfile } from "../src/profile.js";
import type { ForcedBets } from "../src/hand.js";
import type { TableState } from "../src/table.js";
import { createTable, sitDown } from "../src/table.js";

// ---------------------------------------------------------------------------
// Players
// ---------------------------------------------------------------------------

export const pid = (id: string): PlayerId => PlayerId(id);

export function seed(
  id: string,
  seat: number,
  chips: number,
  profile?: AIProfile,
): PlayerSeed {
  return {
    id: pid(id),
    name: id.charAt(0).toUpperCase() + id.slice(1),
    seatIndex: SeatIndex(seat),
    chips: Chips(chips),
    profile,
  };
}

export const player = (id: string, seat: number, chips: number, profile?: AIProfile): Player =>
  createPlayer(seed(id, seat, chips, profile));

export const blinds = (smallBlind: number, bigBlind: number, ante = 0): ForcedBets => ({
  smallBlind: Chips(smallBlind),
  bigBlind: Chips(bigBlind),
  ante: Chips(ante),
});

// ---------------------------------------------------------------------------
// Decks
// ---------------------------------------------------------------------------

/**
 * A deck that deals `hole[i]` to the i-th player left of the dealer and
 * `board` as the community cards. Burns and unspecified cards come from the
 * rest of the deck in order.
 *
 * @example stackedDeck(["As Ad", "Ks Kd"], "2c 7d 9h Jc 3s")
 */
export function stackedDeck(hole: readonly string[], board = ""): Deck {
  const holes = hole.map(unsafeParseCards);
  const boardCards = unsafeParseCards(board);
  const filler = [...remainingCards([...holes.flat(), ...boardCards])];
  const next = (): Card => {
    const c = filler.shift();
    if (c === undefined) throw new Error("stackedDeck: ran out of cards");
    return c;
  };
  const cards: Card[] = [];
  for (const h of holes) cards.push(h[0] ?? next());
  for (const h of holes) cards.push(h[1] ?? next());
  const at = (i: number): Card => boardCards[i] ?? next();
  cards.push(next(), at(0), at(1), at(2), next(), at(3), next(), at(4));
  return fromCards([...cards, ...filler]);
}

// ---------------------------------------------------------------------------
// Effects and Eithers
// ---------------------------------------------------------------------------

export function runSeeded<A>(effect: Effect.Effect<A>, randomSeed: unknown = 42): A {
  return Effect.runSync(Effect.withRandom(effect, Random.make(randomSeed)));
}

export function expectRight<A, E>(either: Either.Either<A, E>): A {
  if (Either.isLeft(either)) throw new Error(`Expected Right, got ${String(either.left)}`);
  return either.right;
}

export function expectLeft<A, E>(either: Either.Either<A, E>): E {
  if (Either.isRight(either)) throw new Error("Expected Left, got Right");
  return either.left;
}

/** A table with `seeds` seated. */
export function tableWith(
  seeds: readonly PlayerSeed[],
  forcedBets: ForcedBets = blinds(5, 10),
  maxSeats = 9,
): TableState {
  let table = expectRight(createTable({ maxSeats, forcedBets }));
  for (const s of seeds) table = expectRight(sitDown(table, s));
  return table;
}
