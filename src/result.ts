/**
 * What a finished hand reports to the outside world.
 *
 * @module
 */

import type { Chips, PlayerId } from "./brand.js";
import { ZERO_CHIPS } from "./brand.js";
import type { Action } from "./action.js";
import type { Card } from "./card.js";
import type { Street } from "./dealing.js";
import type { HandCategory } from "./evaluator.js";

/** One entry per applied action, in order. */
export interface ActionLogEntry {
  readonly playerId: PlayerId;
  readonly action: Action;
  /** Chips this action moved into the pot. */
  readonly amount: Chips;
  readonly street: Street;
  readonly voluntary: boolean;
}

export interface PotAward {
  readonly playerId: PlayerId;
  readonly amount: Chips;
  /** 0 for the main pot, then side pots in order. */
  readonly potIndex: number;
}

export interface RevealedHand {
  readonly playerId: PlayerId;
  readonly holeCards: readonly [Card, Card];
  readonly category: HandCategory;
  readonly description: string;
}

export interface HandResult {
  readonly handNumber: number;
  /** Every player who won chips, without duplicates. */
  readonly winnerIds: readonly PlayerId[];
  readonly message: string;
  /** Players who put chips in and won none back. */
  readonly loserIds: readonly PlayerId[];
  readonly totalPot: Chips;
  readonly awards: readonly PotAward[];
  /** Empty when the hand ended without a showdown. */
  readonly revealed: readonly RevealedHand[];
  readonly actionLog: readonly ActionLogEntry[];
}

/** Result for a hand that could not be dealt. */
export function skippedResult(handNumber: number, message: string): HandResult {
  return {
    handNumber,
    winnerIds: [],
    message,
    loserIds: [],
    totalPot: ZERO_CHIPS,
    awards: [],
    revealed: [],
    actionLog: [],
  };
}
