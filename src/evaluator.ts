/**
 * Hand evaluation.
 *
 * Scores the best five-card hand out of five to seven cards by enumerating
 * every five-card subset (21 of them for seven cards). A score is a
 * `(category, kickers)` pair; the pair is also packed into a single integer
 * `value` so comparisons on the hot Monte Carlo path are one subtraction.
 *
 * Display text comes from pokersolver, which never takes part in ranking.
 *
 * @module
 */

import { Order } from "effect";
import pokersolver from "pokersolver";
import type { Card, Rank } from "./card.js";
import { RANKS, cardToString } from "./card.js";
import { InvalidGameState } from "./error.js";

// ---------------------------------------------------------------------------
// Categories
// ---------------------------------------------------------------------------

export type HandCategory =
  | "HighCard"
  | "Pair"
  | "TwoPair"
  | "ThreeOfAKind"
  | "Straight"
  | "Flush"
  | "FullHouse"
  | "FourOfAKind"
  | "StraightFlush";

/** Categories from weakest to strongest. */
export const HAND_CATEGORIES: readonly HandCategory[] = [
  "HighCard",
  "Pair",
  "TwoPair",
  "ThreeOfAKind",
  "Straight",
  "Flush",
  "FullHouse",
  "FourOfAKind",
  "StraightFlush",
] as const;

const CATEGORY_LABELS: Record<HandCategory, string> = {
  HighCard: "High Card",
  Pair: "Pair",
  TwoPair: "Two Pair",
  ThreeOfAKind: "Three of a Kind",
  Straight: "Straight",
  Flush: "Flush",
  FullHouse: "Full House",
  FourOfAKind: "Four of a Kind",
  StraightFlush: "Straight Flush",
};

export const categoryLabel = (category: HandCategory): string =>
  CATEGORY_LABELS[category];

// ---------------------------------------------------------------------------
// HandScore
// ---------------------------------------------------------------------------

export interface HandScore {
  readonly category: HandCategory;
  /** Category-specific ranks, most significant first. */
  readonly kickers: readonly Rank[];
  /** `category` and `kickers` packed base 16; higher is better. */
  readonly value: number;
}

export const HandScoreOrder: Order.Order<HandScore> = Order.mapInput(
  Order.number,
  (s: HandScore) => s.value,
);

export function compareScores(a: HandScore, b: HandScore): -1 | 0 | 1 {
  return HandScoreOrder(a, b);
}

/** Indices of every score tied for the maximum. Empty input gives `[]`. */
export function bestIndices(scores: readonly HandScore[]): readonly number[] {
  let best = -1;
  let indices: number[] = [];
  scores.forEach((s, i) => {
    if (s.value > best) {
      best = s.value;
      indices = [i];
    } else if (s.value === best) {
      indices.push(i);
    }
  });
  return indices;
}

// ---------------------------------------------------------------------------
// Packing
// ---------------------------------------------------------------------------

const BASE = 16;
const SLOTS = 5;

function pack(categoryIndex: number, kickers: readonly number[]): number {
  let v = categoryIndex;
  for (let i = 0; i < SLOTS; i++) v = v * BASE + (kickers[i] ?? 0);
  return v;
}

const isRank = (n: number): n is Rank => RANKS.some((r) => r === n);

function unpack(value: number): HandScore {
  const slots: number[] = [];
  let v = value;
  for (let i = 0; i < SLOTS; i++) {
    slots.unshift(v % BASE);
    v = Math.floor(v / BASE);
  }
  const category = HAND_CATEGORIES[v] ?? "HighCard";
  // unused slots are zero, which is never a rank
  return { category, kickers: slots.filter(isRank), value };
}

// ---------------------------------------------------------------------------
// Five-card scoring
// ---------------------------------------------------------------------------

const descending = (a: number, b: number): number => b - a;

/** High card of a straight in `ranks` (sorted descending), or 0. */
function straightHigh(ranks: readonly number[]): number {
  const [r0 = 0, r1 = 0, r2 = 0, r3 = 0, r4 = 0] = ranks;
  const distinct = r0 !== r1 && r1 !== r2 && r2 !== r3 && r3 !== r4;
  if (!distinct) return 0;
  if (r0 - r4 === 4) return r0;
  // the wheel plays as a five-high straight
  if (r0 === 14 && r1 === 5 && r4 === 2) return 5;
  return 0;
}

function packFive(
  c0: Card,
  c1: Card,
  c2: Card,
  c3: Card,
  c4: Card,
): number {
  const ranks = [c0.rank, c1.rank, c2.rank, c3.rank, c4.rank].sort(descending);
  const suit = c0.suit;
  const flush =
    c1.suit === suit && c2.suit === suit && c3.suit === suit && c4.suit === suit;
  const high = straightHigh(ranks);

  if (high > 0 && flush) return pack(8, [high]);

  // [count, rank] groups, largest count first, then highest rank
  const groups: [number, number][] = [];
  for (const rank of ranks) {
    const last = groups[groups.length - 1];
    if (last !== undefined && last[1] === rank) last[0] += 1;
    else groups.push([1, rank]);
  }
  groups.sort((a, b) => b[0] - a[0] || b[1] - a[1]);
  const grouped = groups.map((g) => g[1]);
  const first = groups[0]?.[0] ?? 0;
  const second = groups[1]?.[0] ?? 0;

  if (first === 4) return pack(7, grouped);
  if (first === 3 && second === 2) return pack(6, grouped);
  if (flush) return pack(5, ranks);
  if (high > 0) return pack(4, [high]);
  if (first === 3) return pack(3, grouped);
  if (first === 2 && second === 2) return pack(2, grouped);
  if (first === 2) return pack(1, grouped);
  return pack(0, ranks);
}

// ---------------------------------------------------------------------------
// Subset enumeration
// ---------------------------------------------------------------------------

const subsetCache = new Map<number, readonly (readonly number[])[]>();

/** Index lists of every 5-element subset of `n` positions. */
function fiveSubsetIndices(n: number): readonly (readonly number[])[] {
  const cached = subsetCache.get(n);
  if (cached !== undefined) return cached;
  const out: number[][] = [];
  for (let a = 0; a < n; a++)
    for (let b = a + 1; b < n; b++)
      for (let c = b + 1; c < n; c++)
        for (let d = c + 1; d < n; d++)
          for (let e = d + 1; e < n; e++) out.push([a, b, c, d, e]);
  subsetCache.set(n, out);
  return out;
}

/** Every five-card subset of `cards`, in lexicographic index order. */
export function fiveCardSubsets(cards: readonly Card[]): readonly (readonly Card[])[] {
  return fiveSubsetIndices(cards.length).map((idx) =>
    idx.flatMap((i) => {
      const c = cards[i];
      return c === undefined ? [] : [c];
    }),
  );
}

function requireFive(cards: readonly Card[]): void {
  if (cards.length < 5) {
    throw new InvalidGameState({
      state: "evaluate",
      reason: `Need at least 5 cards, got ${cards.length}`,
    });
  }
}

/**
 * Packed value of the best five-card hand in `cards`.
 *
 * Throws `InvalidGameState` for fewer than five cards.
 */
export function bestValue(cards: readonly Card[]): number {
  requireFive(cards);
  let best = -1;
  for (const [a = 0, b = 0, c = 0, d = 0, e = 0] of fiveSubsetIndices(cards.length)) {
    const c0 = cards[a];
    const c1 = cards[b];
    const c2 = cards[c];
    const c3 = cards[d];
    const c4 = cards[e];
    if (
      c0 === undefined ||
      c1 === undefined ||
      c2 === undefined ||
      c3 === undefined ||
      c4 === undefined
    ) {
      continue;
    }
    const v = packFive(c0, c1, c2, c3, c4);
    if (v > best) best = v;
  }
  return best;
}

/** Score exactly five cards. */
export function scoreFive(cards: readonly Card[]): HandScore {
  const [c0, c1, c2, c3, c4] = cards;
  if (
    cards.length !== 5 ||
    c0 === undefined ||
    c1 === undefined ||
    c2 === undefined ||
    c3 === undefined ||
    c4 === undefined
  ) {
    throw new InvalidGameState({
      state: "scoreFive",
      reason: `Expected exactly 5 cards, got ${cards.length}`,
    });
  }
  return unpack(packFive(c0, c1, c2, c3, c4));
}

/**
 * Best five-card score among `cards` (five or more).
 *
 * Callers must never pass fewer than five cards; doing so throws
 * `InvalidGameState`.
 */
export function evaluate(cards: readonly Card[]): HandScore {
  return unpack(bestValue(cards));
}

export function evaluateHoldem(
  holeCards: readonly Card[],
  communityCards: readonly Card[],
): HandScore {
  return evaluate([...holeCards, ...communityCards]);
}

// ---------------------------------------------------------------------------
// Display
// ---------------------------------------------------------------------------

/** pokersolver's description of the best hand, e.g. `"Two Pair, A's & 9's"`. */
export function describeHand(cards: readonly Card[]): string {
  return pokersolver.Hand.solve(cards.map(cardToString)).descr;
}
