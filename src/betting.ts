/**
 * Betting rules for a single street.
 *
 * `processAction` applies one decision to one player and reports what it
 * did to the street (new bet to match, new minimum raise, whether betting
 * reopens). `applyAction` folds that into the street's `BettingRoundState`,
 * which tracks who has acted since the last full raise.
 *
 * An all-in that raises by less than the minimum raise is an incomplete
 * raise: the bet to match goes up, but players who already acted are not
 * given a new chance to raise. They keep their acted flag, must still match
 * the new bet (call or fold), and are listed in `raiseLocked` until a full
 * raise reopens the betting.
 *
 * @module
 */

import { Either, HashSet, Match, Option, pipe } from "effect";

import type { Chips, PlayerId, SeatIndex } from "./brand.js";
import { Chips as makeChips, ZERO_CHIPS, subtractChips } from "./brand.js";
import type { Player } from "./player.js";
import { canAct, fold, isLive, nextPlayer, placeBet } from "./player.js";
import type { Action, LegalActions } from "./action.js";
import { AllIn, Check, Fold, Raise, computeLegalActions, validateAction } from "./action.js";
import type { Street } from "./dealing.js";
import type { InvalidAction } from "./error.js";

// ---------------------------------------------------------------------------
// Outcome of one action
// ---------------------------------------------------------------------------

export interface BetOutcome {
  readonly player: Player;
  /** Chips moved from the stack into the pot. */
  readonly potDelta: Chips;
  readonly currentBet: Chips;
  readonly minRaise: Chips;
  /** A full raise: everyone else must act again and may re-raise. */
  readonly reopensAction: boolean;
  readonly isNewRaiser: boolean;
  /** Put chips in by choice. Checks, folds and forced posts are not. */
  readonly voluntary: boolean;
  /**
   * The action as it took effect: a call with nothing owed becomes a check,
   * an undersized raise is lifted to the minimum, and a raise the stack
   * cannot cover becomes an all-in.
   */
  readonly applied: Action;
}

function unchanged(
  player: Player,
  currentBet: Chips,
  minRaise: Chips,
  applied: Action,
): BetOutcome {
  return {
    player,
    potDelta: ZERO_CHIPS,
    currentBet,
    minRaise,
    reopensAction: false,
    isNewRaiser: false,
    voluntary: false,
    applied,
  };
}

function allIn(player: Player, currentBet: Chips, minRaise: Chips): BetOutcome {
  const total = player.currentBet + player.chips;
  const after = placeBet(player, player.chips);
  const base = {
    player: after,
    potDelta: player.chips,
    voluntary: true,
    applied: AllIn,
  };
  if (total <= currentBet) {
    return { ...base, currentBet, minRaise, reopensAction: false, isNewRaiser: false };
  }
  const increment = total - currentBet;
  const full = increment >= minRaise;
  return {
    ...base,
    currentBet: makeChips(total),
    minRaise: full ? makeChips(increment) : minRaise,
    reopensAction: full,
    isNewRaiser: full,
  };
}

/**
 * Apply one action to `player` facing `currentBet` with `minRaise` as the
 * smallest legal raise increment.
 *
 * Fails only for actions the rules forbid: checking while facing a bet, or
 * raising when `mayRaise` is false.
 */
export function processAction(
  player: Player,
  action: Action,
  currentBet: Chips,
  minRaise: Chips,
  mayRaise = true,
): Either.Either<BetOutcome, InvalidAction> {
  const legal = computeLegalActions(
    player.chips,
    player.currentBet,
    currentBet,
    minRaise,
    mayRaise,
  );
  return Either.map(validateAction(action, legal), (valid) =>
    pipe(
      Match.value(valid),
      Match.tag("Fold", () => unchanged(fold(player), currentBet, minRaise, Fold)),
      Match.tag("Check", () => unchanged(player, currentBet, minRaise, Check)),
      Match.tag("Call", (call): BetOutcome => {
        const owed = subtractChips(currentBet, player.currentBet);
        if (owed === 0) return unchanged(player, currentBet, minRaise, Check);
        if (owed >= player.chips) return allIn(player, currentBet, minRaise);
        return {
          player: placeBet(player, owed),
          potDelta: owed,
          currentBet,
          minRaise,
          reopensAction: false,
          isNewRaiser: false,
          voluntary: true,
          applied: call,
        };
      }),
      Match.tag("Raise", (raise): BetOutcome => {
        const target = Math.max(raise.amount, currentBet + minRaise);
        const needed = target - player.currentBet;
        if (needed >= player.chips) return allIn(player, currentBet, minRaise);
        return {
          player: placeBet(player, makeChips(needed)),
          potDelta: makeChips(needed),
          currentBet: makeChips(target),
          minRaise: makeChips(target - currentBet),
          reopensAction: true,
          isNewRaiser: true,
          voluntary: true,
          applied: Raise(makeChips(target)),
        };
      }),
      Match.tag("AllIn", () => allIn(player, currentBet, minRaise)),
      Match.exhaustive,
    ),
  );
}

/**
 * Post a blind. Forced, so it can put a short stack all-in, and it is never
 * counted as voluntary.
 */
export function postBlind(
  player: Player,
  amount: Chips,
): { readonly player: Player; readonly posted: Chips } {
  const after = placeBet(player, amount);
  return { player: after, posted: subtractChips(player.chips, after.chips) };
}

// ---------------------------------------------------------------------------
// Street state
// ---------------------------------------------------------------------------

export interface BettingRoundState {
  readonly street: Street;
  /** The bet every live player must match. */
  readonly currentBet: Chips;
  /** Smallest legal raise increment. */
  readonly minRaise: Chips;
  readonly lastRaiser: Option.Option<PlayerId>;
  /** Full raises (opening bets included) made on this street. */
  readonly raiseCount: number;
  /** Players who have acted since the last full raise. */
  readonly acted: HashSet.HashSet<PlayerId>;
  /** Players facing an incomplete raise who may only call or fold. */
  readonly raiseLocked: HashSet.HashSet<PlayerId>;
}

export function createBettingRound(
  street: Street,
  currentBet: Chips,
  minRaise: Chips,
): BettingRoundState {
  return {
    street,
    currentBet,
    minRaise,
    lastRaiser: Option.none(),
    raiseCount: 0,
    acted: HashSet.empty(),
    raiseLocked: HashSet.empty(),
  };
}

export function getLegalActions(
  round: BettingRoundState,
  player: Player,
): LegalActions {
  return computeLegalActions(
    player.chips,
    player.currentBet,
    round.currentBet,
    round.minRaise,
    !HashSet.has(round.raiseLocked, player.id),
  );
}

/**
 * Apply `action` by `player` to the street.
 *
 * Turn order is not checked here; the hand does that.
 */
export function applyAction(
  round: BettingRoundState,
  player: Player,
  action: Action,
): Either.Either<
  { readonly round: BettingRoundState; readonly outcome: BetOutcome },
  InvalidAction
> {
  const mayRaise = !HashSet.has(round.raiseLocked, player.id);
  return Either.map(
    processAction(player, action, round.currentBet, round.minRaise, mayRaise),
    (outcome) => {
      const betWentUp = outcome.currentBet > round.currentBet;
      let acted = HashSet.add(round.acted, player.id);
      let raiseLocked = round.raiseLocked;
      if (outcome.reopensAction) {
        acted = HashSet.make(player.id);
        raiseLocked = HashSet.empty();
      } else if (betWentUp) {
        raiseLocked = HashSet.union(
          raiseLocked,
          HashSet.remove(round.acted, player.id),
        );
      }
      return {
        round: {
          ...round,
          currentBet: outcome.currentBet,
          minRaise: outcome.minRaise,
          lastRaiser: outcome.isNewRaiser ? Option.some(player.id) : round.lastRaiser,
          raiseCount: round.raiseCount + (outcome.isNewRaiser ? 1 : 0),
          acted,
          raiseLocked,
        },
        outcome,
      };
    },
  );
}

/** Still owes a decision on this street. */
function needsToAct(round: BettingRoundState, player: Player): boolean {
  return (
    canAct(player) &&
    (!HashSet.has(round.acted, player.id) || player.currentBet < round.currentBet)
  );
}

/**
 * The street is over when every player who can still act has acted since
 * the last full raise and matched the bet, or when at most one player can
 * still act and owes nothing.
 */
export function isRoundComplete(
  round: BettingRoundState,
  players: readonly Player[],
): boolean {
  if (players.filter(isLive).length <= 1) return true;
  const actors = players.filter(canAct);
  const [only] = actors;
  if (only === undefined) return true;
  if (actors.length === 1) return only.currentBet >= round.currentBet;
  return actors.every((p) => !needsToAct(round, p));
}

/** The next player clockwise after `seat` who still owes a decision. */
export function nextToAct(
  round: BettingRoundState,
  players: readonly Player[],
  seat: SeatIndex,
): Option.Option<Player> {
  return nextPlayer(players, seat, (p) => needsToAct(round, p));
}
