/**
 * Player actions and the legal-action descriptor.
 *
 * @module
 */

import { Either, Option } from "effect";
import type { Chips } from "./brand.js";
import { Chips as makeChips, minChips } from "./brand.js";
import { InvalidAction } from "./error.js";

// ---------------------------------------------------------------------------
// Action: discriminated union
// ---------------------------------------------------------------------------

/**
 * A betting decision.
 *
 * `Raise.amount` is the total the player's street bet is raised TO, not the
 * increment. An opening bet is a raise from zero.
 */
export type Action =
  | { readonly _tag: "Fold" }
  | { readonly _tag: "Check" }
  | { readonly _tag: "Call" }
  | { readonly _tag: "Raise"; readonly amount: Chips }
  | { readonly _tag: "AllIn" };

export type ActionTag = Action["_tag"];

export const Fold: Action = { _tag: "Fold" };
export const Check: Action = { _tag: "Check" };
export const Call: Action = { _tag: "Call" };
export const Raise = (amount: Chips): Action => ({ _tag: "Raise", amount });
export const AllIn: Action = { _tag: "AllIn" };

export function describeAction(action: Action): string {
  return action._tag === "Raise" ? `Raise to ${action.amount}` : action._tag;
}

// ---------------------------------------------------------------------------
// LegalActions
// ---------------------------------------------------------------------------

export interface LegalActions {
  readonly canFold: boolean;
  readonly canCheck: boolean;
  /** Chips a call would put in (capped at the stack), when a bet is faced. */
  readonly callAmount: Option.Option<Chips>;
  /** False for a player locked out by an incomplete all-in raise. */
  readonly canRaise: boolean;
  /** Smallest full raise-to the stack can cover. */
  readonly minRaise: Option.Option<Chips>;
  /** Largest raise-to: the whole stack. */
  readonly maxRaise: Option.Option<Chips>;
  readonly canAllIn: boolean;
  /** Stack size, i.e. what going all-in would add. */
  readonly allInAmount: Chips;
}

/**
 * Derive what a player may do.
 *
 * @param playerChips       stack behind, excluding the street bet
 * @param playerCurrentBet  chips already in on this street
 * @param currentBet        the bet to match on this street
 * @param minRaiseIncrement smallest legal raise increment
 * @param mayRaise          false once an incomplete raise has locked the
 *                          player into call-or-fold
 */
export function computeLegalActions(
  playerChips: Chips,
  playerCurrentBet: Chips,
  currentBet: Chips,
  minRaiseIncrement: Chips,
  mayRaise: boolean,
): LegalActions {
  const toCall = Math.max(0, currentBet - playerCurrentBet);
  const stackTotal = playerChips + playerCurrentBet;

  const minRaiseTo = currentBet + minRaiseIncrement;
  const raiseRange = mayRaise && stackTotal >= minRaiseTo && playerChips > 0;

  return {
    canFold: true,
    canCheck: toCall === 0,
    callAmount:
      toCall > 0 ? Option.some(minChips(makeChips(toCall), playerChips)) : Option.none(),
    canRaise: mayRaise && playerChips > 0,
    minRaise: raiseRange ? Option.some(makeChips(minRaiseTo)) : Option.none(),
    maxRaise: raiseRange ? Option.some(makeChips(stackTotal)) : Option.none(),
    canAllIn: playerChips > 0 && (mayRaise || stackTotal <= currentBet),
    allInAmount: playerChips,
  };
}

// ---------------------------------------------------------------------------
// validateAction
// ---------------------------------------------------------------------------

/**
 * Reject actions the rules forbid outright.
 *
 * Sizing is not checked here: undersized raises are lifted to the minimum
 * and oversized ones capped to the stack when the action is applied.
 */
export function validateAction(
  action: Action,
  legal: LegalActions,
): Either.Either<Action, InvalidAction> {
  switch (action._tag) {
    case "Fold":
    case "Call":
      return Either.right(action);

    case "Check":
      return legal.canCheck
        ? Either.right(action)
        : Either.left(
            new InvalidAction({
              action: "Check",
              reason: "Cannot check while facing a bet",
            }),
          );

    case "Raise":
      return legal.canRaise
        ? Either.right(action)
        : Either.left(
            new InvalidAction({
              action: describeAction(action),
              reason: "Raising is closed for this player on this street",
            }),
          );

    case "AllIn":
      return legal.canAllIn
        ? Either.right(action)
        : Either.left(
            new InvalidAction({
              action: "AllIn",
              reason: "An all-in here would be a raise, and raising is closed",
            }),
          );
  }
}
