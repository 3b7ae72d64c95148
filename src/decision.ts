/**
 * Computer player decisions.
 *
 * Equity, pot odds and the tilt-adjusted trait vector become a probability
 * distribution over fold, check/call, raise and all-in; the action is then
 * drawn from Effect's `Random`.
 *
 * @module
 */

import { Effect, Option, Random } from "effect";

import { Chips as makeChips } from "./brand.js";
import type { Action } from "./action.js";
import { AllIn, Call, Check, Fold, Raise } from "./action.js";
import type { AIProfile, EffectiveTraits } from "./profile.js";
import { effectiveTraits } from "./profile.js";
import type { DecisionContext } from "./position.js";
import { estimateEquity } from "./montecarlo.js";

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export interface DecisionConfig {
  /** Steepness of every logistic curve. */
  readonly sharpness: number;
  /** Extra equity a fully tight player demands over pot odds. */
  readonly tightnessMargin: number;
  /** Equity bonus for the button at full position awareness. */
  readonly positionWeight: number;
  /** Constant weight of check/call. */
  readonly callWeight: number;
  /** Equity at which value raising is a coin flip. */
  readonly raiseThreshold: number;
  readonly bluffWeight: number;
  readonly cbetWeight: number;
  /** Equity at which shoving is a coin flip. */
  readonly allInThreshold: number;
  readonly allInWeight: number;
  /** foldTo3Bet above this makes a player fold more to reraises. */
  readonly foldToReraiseThreshold: number;
  /** Share of decisions that ignore the weights and pick any action at random. */
  readonly mistakeRate: number;
}

export const DEFAULT_DECISION_CONFIG: DecisionConfig = {
  sharpness: 8,
  tightnessMargin: 0.25,
  positionWeight: 0.2,
  callWeight: 0.5,
  raiseThreshold: 0.55,
  bluffWeight: 0.5,
  cbetWeight: 0.6,
  allInThreshold: 0.8,
  allInWeight: 0.5,
  foldToReraiseThreshold: 0.4,
  mistakeRate: 0,
};

/** Traits used for a seat without a profile. */
export const NEUTRAL_PROFILE: AIProfile = {
  name: "Neutral",
  tightness: 0.5,
  aggression: 0.5,
  bluffFrequency: 0.1,
  positionAwareness: 0.5,
  tiltSensitivity: 0,
  foldTo3Bet: 0.4,
  cbetFrequency: 0.5,
  currentTilt: 0,
};

// ---------------------------------------------------------------------------
// Weights
// ---------------------------------------------------------------------------

/** Normalised: the four weights sum to 1. */
export interface ActionWeights {
  readonly fold: number;
  readonly call: number;
  readonly raise: number;
  readonly allIn: number;
}

const sigmoid = (x: number): number => 1 / (1 + Math.exp(-x));

export function potOdds(amountToCall: number, potTotal: number): number {
  return amountToCall > 0 ? amountToCall / (potTotal + amountToCall) : 0;
}

const profileOf = (ctx: DecisionContext): AIProfile =>
  Option.getOrElse(ctx.profile, () => NEUTRAL_PROFILE);

export function actionWeights(
  ctx: DecisionContext,
  equity: number,
  config: DecisionConfig = DEFAULT_DECISION_CONFIG,
): ActionWeights {
  const profile = profileOf(ctx);
  const traits: EffectiveTraits = effectiveTraits(profile);
  const k = config.sharpness;
  const odds = potOdds(ctx.amountToCall, ctx.potTotal);
  const strength =
    equity + config.positionWeight * profile.positionAwareness * ctx.positionFactor;
  const facingBet = ctx.amountToCall > 0;

  let fold = 0;
  if (facingBet) {
    fold = sigmoid(k * (odds + traits.tightness * config.tightnessMargin - strength));
    if (ctx.facingReraise && profile.foldTo3Bet > config.foldToReraiseThreshold) {
      fold *= 1 + profile.foldTo3Bet;
    }
  }

  const legal = ctx.legalActions;
  let raise = 0;
  if (Option.isSome(legal.minRaise)) {
    raise =
      traits.aggression * sigmoid(k * (strength - config.raiseThreshold)) +
      traits.bluffFrequency * config.bluffWeight;
    if (ctx.isPreflopAggressor && ctx.street !== "Preflop" && !facingBet) {
      raise += profile.cbetFrequency * config.cbetWeight;
    }
  }

  const allIn = legal.canAllIn
    ? traits.aggression * sigmoid(k * (strength - config.allInThreshold)) * config.allInWeight
    : 0;

  const call = config.callWeight;
  const total = fold + call + raise + allIn;
  return { fold: fold / total, call: call / total, raise: raise / total, allIn: allIn / total };
}

// ---------------------------------------------------------------------------
// Sampling
// ---------------------------------------------------------------------------

const passive = (ctx: DecisionContext): Action =>
  ctx.amountToCall > 0 ? Call : Check;

/**
 * Raise-to size: the current bet plus half the pot, up to the whole pot for
 * a fully aggressive player. Sizes the stack cannot cover become all-in.
 */
export function raiseSize(ctx: DecisionContext): Action {
  const legal = ctx.legalActions;
  if (Option.isNone(legal.minRaise) || Option.isNone(legal.maxRaise)) {
    return legal.canAllIn ? AllIn : passive(ctx);
  }
  const aggression = effectiveTraits(profileOf(ctx)).aggression;
  const target = Math.max(
    legal.minRaise.value,
    ctx.currentBet + Math.round(ctx.potTotal * (0.5 + 0.5 * aggression)),
  );
  return target >= legal.maxRaise.value ? AllIn : Raise(makeChips(target));
}

/** Draw an action from `weights` and shape it into one the seat may take. */
export function sampleAction(
  weights: ActionWeights,
  ctx: DecisionContext,
): Effect.Effect<Action> {
  return Effect.map(Random.next, (r) => {
    let roll = r;
    if (roll < weights.fold) return ctx.amountToCall > 0 ? Fold : Check;
    roll -= weights.fold;
    if (roll < weights.call) return passive(ctx);
    roll -= weights.call;
    if (roll < weights.raise) return raiseSize(ctx);
    return ctx.legalActions.canAllIn ? AllIn : passive(ctx);
  });
}

/** Any action the seat may take, each equally likely. */
export function mistake(ctx: DecisionContext): Effect.Effect<Action> {
  const options: readonly Action[] = [
    ctx.amountToCall > 0 ? Fold : Check,
    passive(ctx),
    raiseSize(ctx),
    ...(ctx.legalActions.canAllIn ? [AllIn] : []),
  ];
  return Effect.map(
    Random.nextIntBetween(0, options.length),
    (i) => options[Math.min(i, options.length - 1)] ?? passive(ctx),
  );
}

export function decide(
  ctx: DecisionContext,
  equity: number,
  config: DecisionConfig = DEFAULT_DECISION_CONFIG,
): Effect.Effect<Action> {
  const considered = sampleAction(actionWeights(ctx, equity, config), ctx);
  if (config.mistakeRate <= 0) return considered;
  return Effect.flatMap(Random.next, (r) =>
    r < config.mistakeRate ? mistake(ctx) : considered,
  );
}

// ---------------------------------------------------------------------------
// Equity for a context
// ---------------------------------------------------------------------------

export interface Assessment {
  readonly equity: number;
  readonly potOdds: number;
}

/** Win probability against the live opponents; 0.5 without hole cards. */
export function contextEquity(
  ctx: DecisionContext,
  iterations: number,
): Effect.Effect<number> {
  return Option.match(ctx.holeCards, {
    onNone: () => Effect.succeed(0.5),
    onSome: (holeCards) =>
      estimateEquity({
        holeCards,
        communityCards: ctx.communityCards,
        opponents: ctx.liveOpponents,
        iterations,
      }),
  });
}

/** Equity and pot odds for a human seat's assistant display. */
export function assess(
  ctx: DecisionContext,
  iterations: number,
): Effect.Effect<Assessment> {
  return Effect.map(contextEquity(ctx, iterations), (equity) => ({
    equity,
    potOdds: potOdds(ctx.amountToCall, ctx.potTotal),
  }));
}

/** Estimate equity, then decide. */
export function chooseAction(
  ctx: DecisionContext,
  iterations: number,
  config: DecisionConfig = DEFAULT_DECISION_CONFIG,
): Effect.Effect<Action> {
  return Effect.flatMap(contextEquity(ctx, iterations), (equity) =>
    decide(ctx, equity, config),
  );
}
