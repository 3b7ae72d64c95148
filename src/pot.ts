/**
 * Pot accounting and side-pot construction.
 *
 * During a hand the pot is just a running total. At settlement the
 * per-player hand totals are split into tranches by contribution level:
 * each distinct level L (above the previous level P) yields a tranche of
 * `(L - P) * (players who put in at least L)`, winnable by the non-folded
 * players among them. Folded chips stay in the tranches they funded.
 *
 * @module
 */

import type { Chips, PlayerId } from "./brand.js";
import { Chips as makeChips, ZERO_CHIPS, addChips, sumChips } from "./brand.js";
import type { Player } from "./player.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface PotTranche {
  readonly amount: Chips;
  /** Contribution level a player needed to reach to be in this tranche. */
  readonly threshold: Chips;
  readonly eligible: readonly PlayerId[];
}

export interface Pot {
  readonly total: Chips;
  /** Main pot first, then side pots by ascending threshold. */
  readonly tranches: readonly PotTranche[];
}

/** One player's chips in the pot for the whole hand. */
export interface Contribution {
  readonly playerId: PlayerId;
  readonly amount: Chips;
  readonly folded: boolean;
}

export const emptyPot: Pot = { total: ZERO_CHIPS, tranches: [] };

export const addToPot = (pot: Pot, amount: Chips): Pot => ({
  ...pot,
  total: addChips(pot.total, amount),
});

export const totalPotSize = (pot: Pot): Chips =>
  sumChips(pot.tranches.map((t) => t.amount));

export function contributionsOf(players: readonly Player[]): readonly Contribution[] {
  return players
    .filter((p) => p.totalBetThisHand > 0)
    .map((p) => ({
      playerId: p.id,
      amount: p.totalBetThisHand,
      folded: p.status === "Folded",
    }));
}

// ---------------------------------------------------------------------------
// buildPots
// ---------------------------------------------------------------------------

const sameMembers = (a: readonly PlayerId[], b: readonly PlayerId[]): boolean =>
  a.length === b.length && a.every((id) => b.includes(id));

/**
 * Split hand contributions into main and side pots.
 *
 * A level that only folded players reached has nobody to win it; its chips
 * join the tranche below (or the next one up when there is none below).
 * Adjacent tranches with the same contenders are merged.
 */
export function buildPots(contributions: readonly Contribution[]): Pot {
  const levels = [...new Set(contributions.map((c) => c.amount))]
    .filter((l) => l > 0)
    .sort((a, b) => a - b);

  const tranches: PotTranche[] = [];
  let previous = 0;
  let carried = 0;

  for (const level of levels) {
    const funders = contributions.filter((c) => c.amount >= level);
    const eligible = funders.filter((c) => !c.folded).map((c) => c.playerId);
    const slice = (level - previous) * funders.length;
    previous = level;

    const last = tranches[tranches.length - 1];
    if (eligible.length === 0) {
      if (last === undefined) {
        carried += slice;
      } else {
        tranches[tranches.length - 1] = {
          ...last,
          amount: makeChips(last.amount + slice),
        };
      }
      continue;
    }

    const amount = slice + carried;
    carried = 0;
    if (last !== undefined && sameMembers(last.eligible, eligible)) {
      tranches[tranches.length - 1] = {
        ...last,
        amount: makeChips(last.amount + amount),
      };
    } else {
      tranches.push({ amount: makeChips(amount), threshold: level, eligible });
    }
  }

  if (carried > 0) {
    tranches.push({ amount: makeChips(carried), threshold: makeChips(previous), eligible: [] });
  }

  return {
    total: sumChips(contributions.map((c) => c.amount)),
    tranches,
  };
}
