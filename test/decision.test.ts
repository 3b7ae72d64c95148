import { describe, it, expect } from "vitest";
import { Either, Option } from "effect";
import { Chips } from "../src/brand.js";
import type { Action } from "../src/action.js";
import {
  AllIn,
  Call,
  Check,
  Fold,
  Raise,
  computeLegalActions,
  validateAction,
} from "../src/action.js";
import type { Card } from "../src/card.js";
import { unsafeParseCards } from "../src/card.js";
import type { ActionWeights } from "../src/decision.js";
import {
  DEFAULT_DECISION_CONFIG,
  actionWeights,
  assess,
  chooseAction,
  contextEquity,
  decide,
  mistake,
  potOdds,
  raiseSize,
  sampleAction,
} from "../src/decision.js";
import type { DecisionContext } from "../src/position.js";
import type { AIProfile } from "../src/profile.js";
import { PRESETS } from "../src/profile.js";
import { pid, runSeeded } from "./helpers.js";

interface Spot {
  readonly toCall?: number;
  readonly pot?: number;
  readonly stack?: number;
  readonly profile?: AIProfile;
  readonly mayRaise?: boolean;
}

function spot(overrides: Spot = {}, extra: Partial<DecisionContext> = {}): DecisionContext {
  const toCall = overrides.toCall ?? 0;
  const stack = overrides.stack ?? 1000;
  return {
    playerId: pid("hero"),
    handNumber: 1,
    street: "Flop",
    holeCards: Option.none(),
    communityCards: [],
    potTotal: Chips(overrides.pot ?? 100),
    amountToCall: Chips(Math.min(toCall, stack)),
    stack: Chips(stack),
    playerCurrentBet: Chips(0),
    currentBet: Chips(toCall),
    bigBlind: Chips(10),
    legalActions: computeLegalActions(
      Chips(stack),
      Chips(0),
      Chips(toCall),
      Chips(10),
      overrides.mayRaise ?? true,
    ),
    opponents: [],
    liveOpponents: 1,
    role: Option.none(),
    positionFactor: 0,
    facingReraise: false,
    isPreflopAggressor: false,
    profile: Option.fromNullable(overrides.profile),
    ...extra,
  };
}

function hole(text: string): readonly [Card, Card] {
  const [a, b] = unsafeParseCards(text);
  if (a === undefined || b === undefined) throw new Error(`bad hole cards ${text}`);
  return [a, b];
}

const sum = (w: ActionWeights) => w.fold + w.call + w.raise + w.allIn;

describe("potOdds", () => {
  it("is the call over the pot after calling", () => {
    expect(potOdds(50, 150)).toBe(0.25);
    expect(potOdds(0, 150)).toBe(0);
  });
});

describe("actionWeights", () => {
  it("is a probability distribution", () => {
    expect(sum(actionWeights(spot({ toCall: 40 }), 0.4))).toBeCloseTo(1, 10);
  });

  it("never folds when nothing is owed", () => {
    expect(actionWeights(spot(), 0.05).fold).toBe(0);
  });

  it("folds less and raises more with more equity", () => {
    const weak = actionWeights(spot({ toCall: 50 }), 0.2);
    const strong = actionWeights(spot({ toCall: 50 }), 0.8);
    expect(strong.fold).toBeLessThan(weak.fold);
    expect(strong.raise).toBeGreaterThan(weak.raise);
    expect(strong.allIn).toBeGreaterThan(weak.allIn);
  });

  it("tight players fold more than loose ones", () => {
    const rock = actionWeights(spot({ toCall: 50, profile: PRESETS.rock }), 0.4);
    const station = actionWeights(spot({ toCall: 50, profile: PRESETS.callingStation }), 0.4);
    expect(rock.fold).toBeGreaterThan(station.fold);
  });

  it("tilt loosens and heats up a player", () => {
    const calm = actionWeights(spot({ toCall: 50, profile: PRESETS.tiltDavid }), 0.4);
    const tilted = actionWeights(
      spot({ toCall: 50, profile: { ...PRESETS.tiltDavid, currentTilt: 1 } }),
      0.4,
    );
    expect(tilted.fold).toBeLessThan(calm.fold);
    expect(tilted.raise).toBeGreaterThan(calm.raise);
  });

  it("late position plays stronger", () => {
    const early = actionWeights(spot({ toCall: 50, profile: PRESETS.shark }), 0.4);
    const late = actionWeights(
      spot({ toCall: 50, profile: PRESETS.shark }, { positionFactor: 1 }),
      0.4,
    );
    expect(late.fold).toBeLessThan(early.fold);
  });

  it("the preflop aggressor continuation-bets", () => {
    const plain = actionWeights(spot(), 0.4);
    const aggressor = actionWeights(spot({}, { isPreflopAggressor: true }), 0.4);
    expect(aggressor.raise).toBeGreaterThan(plain.raise);
    const preflop = actionWeights(spot({}, { isPreflopAggressor: true, street: "Preflop" }), 0.4);
    expect(preflop.raise).toBeCloseTo(plain.raise, 10);
  });

  it("players who respect reraises fold more to them", () => {
    const profile = PRESETS.fox;
    const single = actionWeights(spot({ toCall: 80, profile }), 0.45);
    const reraised = actionWeights(spot({ toCall: 80, profile }, { facingReraise: true }), 0.45);
    expect(reraised.fold).toBeGreaterThan(single.fold);
    const station = PRESETS.callingStation;
    expect(
      actionWeights(spot({ toCall: 80, profile: station }, { facingReraise: true }), 0.45).fold,
    ).toBeCloseTo(actionWeights(spot({ toCall: 80, profile: station }), 0.45).fold, 10);
  });

  it("no raise weight when raising is closed", () => {
    const locked = actionWeights(spot({ toCall: 5, mayRaise: false }), 0.9);
    expect(locked.raise).toBe(0);
    expect(locked.allIn).toBe(0);
  });
});

describe("raiseSize", () => {
  it("bets between half and the whole pot by aggression", () => {
    expect(raiseSize(spot())).toEqual(Raise(Chips(75)));
    expect(raiseSize(spot({ profile: { ...PRESETS.rock, aggression: 1 } }))).toEqual(
      Raise(Chips(100)),
    );
  });

  it("raises at least the minimum", () => {
    expect(raiseSize(spot({ toCall: 60, pot: 10 }))).toEqual(Raise(Chips(70)));
  });

  it("a size the stack cannot cover is all-in", () => {
    expect(raiseSize(spot({ stack: 60 }))).toEqual(AllIn);
  });

  it("with no raise range it shoves if allowed", () => {
    expect(raiseSize(spot({ toCall: 50, stack: 40 }))).toEqual(AllIn);
    expect(raiseSize(spot({ toCall: 5, mayRaise: false }))).toEqual(Call);
  });
});

describe("sampleAction", () => {
  const only = (key: keyof ActionWeights): ActionWeights => ({
    fold: 0,
    call: 0,
    raise: 0,
    allIn: 0,
    [key]: 1,
  });

  it("draws the only weighted action", () => {
    const facing = spot({ toCall: 20 });
    expect(runSeeded(sampleAction(only("fold"), facing))).toEqual(Fold);
    expect(runSeeded(sampleAction(only("call"), facing))).toEqual(Call);
    expect(runSeeded(sampleAction(only("allIn"), facing))).toEqual(AllIn);
  });

  it("a fold with nothing owed is a check", () => {
    expect(runSeeded(sampleAction(only("fold"), spot()))).toEqual(Check);
  });
});

describe("chooseAction", () => {
  const legal = (ctx: DecisionContext, action: Action) =>
    Either.isRight(validateAction(action, ctx.legalActions));

  it("always returns an action the seat may take", () => {
    const ctx = spot(
      { toCall: 30, profile: PRESETS.maniac },
      { holeCards: Option.some(hole("Ah Kd")) },
    );
    for (let s = 0; s < 25; s++) {
      expect(legal(ctx, runSeeded(chooseAction(ctx, 20), s))).toBe(true);
    }
  });

  it("contextEquity is a coin flip without hole cards", () => {
    expect(runSeeded(contextEquity(spot(), 100))).toBe(0.5);
  });

  it("assess reports equity and pot odds", () => {
    expect(runSeeded(assess(spot({ toCall: 50, pot: 150 }), 100))).toEqual({
      equity: 0.5,
      potOdds: 0.25,
    });
  });
});

describe("mistakes", () => {
  const legal = (ctx: DecisionContext, action: Action) =>
    Either.isRight(validateAction(action, ctx.legalActions));
  const careless = { ...DEFAULT_DECISION_CONFIG, mistakeRate: 1 };

  it("a mistake is any action the seat may take", () => {
    const facing = spot({ toCall: 20 });
    const tags = new Set<string>();
    for (let s = 0; s < 60; s++) {
      const action = runSeeded(mistake(facing), s);
      expect(legal(facing, action)).toBe(true);
      tags.add(action._tag);
    }
    expect(tags.has("Fold")).toBe(true);
    expect(tags.has("Call")).toBe(true);
    expect(tags.has("AllIn")).toBe(true);
  });

  it("never folds when nothing is owed", () => {
    for (let s = 0; s < 40; s++) {
      expect(runSeeded(decide(spot(), 0.2, careless), s)._tag).not.toBe("Fold");
    }
  });

  it("a player who always blunders sometimes folds the nuts", () => {
    const facing = spot({ toCall: 20 });
    let folds = 0;
    for (let s = 0; s < 80; s++) {
      if (runSeeded(decide(facing, 1, careless), s)._tag === "Fold") folds++;
    }
    expect(folds).toBeGreaterThan(5);
  });

  it("with no mistake rate the weights alone decide", () => {
    const facing = spot({ toCall: 20 });
    const weights = actionWeights(facing, 0.6, DEFAULT_DECISION_CONFIG);
    for (let s = 0; s < 20; s++) {
      expect(runSeeded(decide(facing, 0.6, DEFAULT_DECISION_CONFIG), s)).toEqual(
        runSeeded(sampleAction(weights, facing), s),
      );
    }
  });
});
