/**
 * Monte Carlo equity: how often a hand wins against random opponents.
 *
 * Each trial shuffles the unseen cards, completes the board and deals two
 * cards to every opponent. A split counts as 1/winners of a win. Sampling
 * uses Effect's `Random`, so a seeded service reproduces the estimate.
 *
 * @module
 */

import { Effect, Random } from "effect";

import type { Card } from "./card.js";
import { remainingCards } from "./deck.js";
import { bestValue } from "./evaluator.js";

const BOARD_SIZE = 5;

export interface EquityInput {
  readonly holeCards: readonly Card[];
  readonly communityCards: readonly Card[];
  readonly opponents: number;
  readonly iterations: number;
}

/** Cards one trial consumes from the unseen deck. */
export const cardsPerTrial = (communityCards: number, opponents: number): number =>
  BOARD_SIZE - communityCards + opponents * 2;

function trialShare(
  input: EquityInput,
  unseen: Iterable<Card>,
  needed: number,
): number {
  const drawn: Card[] = [];
  for (const c of unseen) {
    drawn.push(c);
    if (drawn.length === needed) break;
  }
  const missing = BOARD_SIZE - input.communityCards.length;
  const board = [...input.communityCards, ...drawn.slice(0, missing)];
  const hero = bestValue([...input.holeCards, ...board]);

  let ties = 1;
  for (let o = 0; o < input.opponents; o++) {
    const start = missing + o * 2;
    const villain = bestValue([...drawn.slice(start, start + 2), ...board]);
    if (villain > hero) return 0;
    if (villain === hero) ties++;
  }
  return 1 / ties;
}

/**
 * Estimated probability that `holeCards` win at showdown.
 *
 * With no opponents the hand has already won (1). When the unseen cards
 * cannot cover a trial, or no trials are requested, the estimate is a
 * coin flip (0.5).
 */
export function estimateEquity(input: EquityInput): Effect.Effect<number> {
  return Effect.gen(function* () {
    if (input.opponents <= 0) return 1;
    const unseen = remainingCards([...input.holeCards, ...input.communityCards]);
    const needed = cardsPerTrial(input.communityCards.length, input.opponents);
    if (needed > unseen.length || input.iterations <= 0) return 0.5;

    let wins = 0;
    for (let i = 0; i < input.iterations; i++) {
      const deck = yield* Random.shuffle(unseen);
      wins += trialShare(input, deck, needed);
    }
    return wins / input.iterations;
  });
}
