/**
 * Settlement: hand evaluation per pot tranche and chip distribution.
 *
 * Each tranche is settled on its own. Ties split the tranche evenly; the
 * odd chips left over go one each to the tied winners in seat order,
 * starting from the first seat left of the dealer.
 *
 * @module
 */

import { Option } from "effect";
import type { Chips, PlayerId, SeatIndex } from "./brand.js";
import { Chips as makeChips } from "./brand.js";
import type { Card } from "./card.js";
import type { HandScore } from "./evaluator.js";
import { bestIndices, categoryLabel, describeHand, evaluateHoldem } from "./evaluator.js";
import type { Player } from "./player.js";
import { clockwiseAfter, isLive, winChips } from "./player.js";
import type { Pot, PotTranche } from "./pot.js";
import type { PotAward, RevealedHand } from "./result.js";

// ---------------------------------------------------------------------------
// Settlement
// ---------------------------------------------------------------------------

export interface Settlement {
  readonly players: readonly Player[];
  readonly awards: readonly PotAward[];
  readonly winnerIds: readonly PlayerId[];
  readonly loserIds: readonly PlayerId[];
  readonly message: string;
  readonly revealed: readonly RevealedHand[];
}

interface Contender {
  readonly player: Player;
  readonly holeCards: readonly [Card, Card];
}

function potLabel(index: number, count: number): string {
  if (count === 1) return "the pot";
  return index === 0 ? "the main pot" : `side pot ${index}`;
}

function joinNames(names: readonly string[]): string {
  if (names.length <= 2) return names.join(" and ");
  return `${names.slice(0, -1).join(", ")} and ${names[names.length - 1] ?? ""}`;
}

/** Players in the hand who won nothing back after putting chips in. */
export function findLosers(
  players: readonly Player[],
  winnerIds: readonly PlayerId[],
): readonly PlayerId[] {
  return players
    .filter((p) => p.totalBetThisHand > 0 && !winnerIds.includes(p.id))
    .map((p) => p.id);
}

function applyAwards(
  players: readonly Player[],
  awards: readonly PotAward[],
): readonly Player[] {
  return players.map((p) => {
    let won = 0;
    for (const a of awards) if (a.playerId === p.id) won += a.amount;
    return won > 0 ? winChips(p, makeChips(won)) : p;
  });
}

function uniqueIds(awards: readonly PotAward[]): readonly PlayerId[] {
  return [...new Set(awards.map((a) => a.playerId))];
}

/**
 * Split `amount` among `winners` (already in seat order from the dealer).
 * The first `amount % n` winners get one extra chip.
 */
export function splitAmount(
  amount: Chips,
  winners: readonly PlayerId[],
  potIndex: number,
): readonly PotAward[] {
  const n = winners.length;
  if (n === 0) return [];
  const share = Math.floor(amount / n);
  const remainder = amount % n;
  return winners.map((playerId, i) => ({
    playerId,
    amount: makeChips(share + (i < remainder ? 1 : 0)),
    potIndex,
  }));
}

// ---------------------------------------------------------------------------
// settleShowdown
// ---------------------------------------------------------------------------

export interface ShowdownInput {
  readonly players: readonly Player[];
  readonly communityCards: readonly Card[];
  readonly pot: Pot;
  readonly dealerSeat: SeatIndex;
}

/**
 * Evaluate and pay every tranche of `pot`.
 *
 * A tranche with a single contender is paid without evaluation. A tranche
 * nobody live is eligible for (only folded players reached it) is contested
 * by every live player, so no chips are left behind.
 */
export function settleShowdown(input: ShowdownInput): Settlement {
  const { communityCards, dealerSeat, pot } = input;
  const contenders: Contender[] = input.players.flatMap((p) =>
    isLive(p) && Option.isSome(p.holeCards)
      ? [{ player: p, holeCards: p.holeCards.value }]
      : [],
  );

  const scores = new Map<PlayerId, HandScore>();
  const scoreOf = (c: Contender): HandScore => {
    const cached = scores.get(c.player.id);
    if (cached !== undefined) return cached;
    const score = evaluateHoldem(c.holeCards, communityCards);
    scores.set(c.player.id, score);
    return score;
  };

  const awards: PotAward[] = [];
  const lines: string[] = [];

  pot.tranches.forEach((tranche: PotTranche, index) => {
    const label = potLabel(index, pot.tranches.length);
    const eligible = contenders.filter((c) => tranche.eligible.includes(c.player.id));
    const field = eligible.length > 0 ? eligible : contenders;

    const [sole] = field;
    if (sole === undefined) return;
    if (field.length === 1) {
      awards.push({ playerId: sole.player.id, amount: tranche.amount, potIndex: index });
      lines.push(`${sole.player.name} takes ${label} (${tranche.amount})`);
      return;
    }

    const fieldScores = field.map(scoreOf);
    const best = new Set(bestIndices(fieldScores));
    const tied = field.filter((_, i) => best.has(i)).map((c) => c.player);
    const ordered = clockwiseAfter(tied, dealerSeat);
    awards.push(...splitAmount(tranche.amount, ordered.map((p) => p.id), index));

    const winning = fieldScores[bestIndices(fieldScores)[0] ?? 0];
    const hand = winning === undefined ? "" : ` with ${categoryLabel(winning.category)}`;
    const names = joinNames(ordered.map((p) => p.name));
    lines.push(
      ordered.length === 1
        ? `${names} wins ${label} (${tranche.amount})${hand}`
        : `${names} split ${label} (${tranche.amount})${hand}`,
    );
  });

  const revealed: RevealedHand[] = contenders.flatMap((c) => {
    const score = scores.get(c.player.id);
    return score === undefined
      ? []
      : [
          {
            playerId: c.player.id,
            holeCards: c.holeCards,
            category: score.category,
            description: describeHand([...c.holeCards, ...communityCards]),
          },
        ];
  });

  const winnerIds = uniqueIds(awards);
  return {
    players: applyAwards(input.players, awards),
    awards,
    winnerIds,
    loserIds: findLosers(input.players, winnerIds),
    message: lines.join("; "),
    revealed,
  };
}

// ---------------------------------------------------------------------------
// settleUncontested
// ---------------------------------------------------------------------------

/** Everyone else folded: the last player takes the whole pot unseen. */
export function settleUncontested(
  players: readonly Player[],
  winner: Player,
  pot: Pot,
): Settlement {
  const awards: readonly PotAward[] = [
    { playerId: winner.id, amount: pot.total, potIndex: 0 },
  ];
  return {
    players: applyAwards(players, awards),
    awards,
    winnerIds: [winner.id],
    loserIds: findLosers(players, [winner.id]),
    message: `${winner.name} wins ${pot.total} uncontested`,
    revealed: [],
  };
}
