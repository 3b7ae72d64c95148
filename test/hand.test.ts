import { describe, it, expect } from "vitest";
import { Effect, Either, Option } from "effect";
import { Chips, SeatIndex } from "../src/brand.js";
import type { Action } from "../src/action.js";
import { AllIn, Call, Check, Fold, Raise } from "../src/action.js";
import type { Deck } from "../src/deck.js";
import type { ForcedBets, HandState } from "../src/hand.js";
import {
  act,
  activePlayer,
  chipsInPlay,
  getLegalActions,
  isComplete,
  runOut,
  runOutNext,
  startHand,
} from "../src/hand.js";
import type { Player } from "../src/player.js";
import { blinds, expectLeft, expectRight, pid, player, stackedDeck } from "./helpers.js";

function start(
  players: readonly Player[],
  deck: Deck,
  forcedBets: ForcedBets = blinds(5, 10),
  dealer = 0,
): HandState {
  return Effect.runSync(
    startHand({ handNumber: 1, players, dealerSeat: SeatIndex(dealer), forcedBets, deck }),
  );
}

function play(state: HandState, ...steps: readonly [string, Action][]): HandState {
  return steps.reduce((s, [id, action]) => expectRight(act(s, pid(id), action)), state);
}

const toAct = (state: HandState) => Option.getOrUndefined(state.toAct);
const stacks = (state: HandState) =>
  Object.fromEntries(state.players.map((p) => [p.id, p.chips]));
const message = (state: HandState) =>
  Option.match(state.result, { onNone: () => "", onSome: (r) => r.message });

// ---------------------------------------------------------------------------
// Heads-up
// ---------------------------------------------------------------------------

describe("heads-up", () => {
  const players = [player("alice", 0, 1000), player("bob", 1, 1000)];
  const deck = stackedDeck(["As Ad", "Ks Kd"], "2c 7d 9h Jc 3s");
  const opened = start(players, deck);

  it("the dealer posts the small blind and acts first preflop", () => {
    expect(opened.smallBlindSeat).toBe(0);
    expect(opened.bigBlindSeat).toBe(1);
    expect(toAct(opened)).toBe("alice");
    expect(opened.pot.total).toBe(15);
    expect(stacks(opened)).toEqual({ alice: 995, bob: 990 });
  });

  it("deals the first hole card left of the dealer", () => {
    const bobFirst = Option.fromNullable(opened.players.find((p) => p.id === "bob")).pipe(
      Option.flatMap((p) => p.holeCards),
      Option.map((h) => h[0].rank),
    );
    expect(bobFirst).toEqual(Option.some(14));
  });

  it("the big blind acts first after the flop", () => {
    const flop = play(opened, ["alice", Call], ["bob", Check]);
    expect(flop.street).toBe("Flop");
    expect(flop.communityCards).toHaveLength(3);
    expect(toAct(flop)).toBe("bob");
  });

  it("a check-down goes to showdown", () => {
    const done = play(
      opened,
      ["alice", Call],
      ["bob", Check],
      ["bob", Check],
      ["alice", Check],
      ["bob", Check],
      ["alice", Check],
      ["bob", Check],
      ["alice", Check],
    );
    expect(isComplete(done)).toBe(true);
    expect(message(done)).toBe("Bob wins the pot (20) with Pair");
    expect(stacks(done)).toEqual({ alice: 990, bob: 1010 });
    const result = Option.getOrUndefined(done.result);
    expect(result?.winnerIds).toEqual(["bob"]);
    expect(result?.loserIds).toEqual(["alice"]);
    expect(result?.actionLog.filter((e) => e.voluntary)).toHaveLength(1);
  });

  it("a fold ends the hand uncontested", () => {
    const done = play(opened, ["alice", Fold]);
    expect(message(done)).toBe("Bob wins 15 uncontested");
    expect(stacks(done)).toEqual({ alice: 995, bob: 1005 });
    expect(done.events.at(-1)?._tag).toBe("HandEnded");
  });

  it("the big blind's call with nothing owed is logged as a check", () => {
    const flop = play(opened, ["alice", Call], ["bob", Call]);
    expect(flop.actionLog.map((e) => e.action._tag)).toEqual(["Call", "Check"]);
  });
});

// ---------------------------------------------------------------------------
// Rejections
// ---------------------------------------------------------------------------

describe("act rejections", () => {
  const opened = start(
    [player("alice", 0, 1000), player("bob", 1, 1000)],
    stackedDeck(["As Ad", "Ks Kd"]),
  );

  it("out of turn", () => {
    expect(expectLeft(act(opened, pid("bob"), Check))._tag).toBe("NotPlayersTurn");
  });

  it("check facing the big blind", () => {
    expect(expectLeft(act(opened, pid("alice"), Check))._tag).toBe("InvalidAction");
  });

  it("after the hand is over", () => {
    const done = play(opened, ["alice", Fold]);
    expect(expectLeft(act(done, pid("bob"), Check))._tag).toBe("InvalidGameState");
  });

  it("runOutNext while betting", () => {
    expect(Either.isLeft(runOutNext(opened))).toBe(true);
  });
});

describe("startHand", () => {
  it("needs two players with chips", () => {
    const result = Effect.runSync(
      Effect.either(
        startHand({
          handNumber: 1,
          players: [player("alice", 0, 1000)],
          dealerSeat: SeatIndex(0),
          forcedBets: blinds(5, 10),
        }),
      ),
    );
    expect(expectLeft(result)._tag).toBe("NotEnoughPlayers");
  });

  it("collects antes from everyone in the hand", () => {
    const opened = start(
      [player("alice", 0, 1000), player("bob", 1, 1000), player("carol", 2, 1000)],
      stackedDeck([]),
      blinds(5, 10, 1),
    );
    expect(opened.pot.total).toBe(18);
    expect(stacks(opened)).toEqual({ alice: 999, bob: 994, carol: 989 });
  });

  it("a short big blind still sets the full bet to match", () => {
    const opened = start(
      [player("alice", 0, 1000), player("bob", 1, 1000), player("carol", 2, 6)],
      stackedDeck([]),
    );
    expect(toAct(opened)).toBe("alice");
    expect(Option.flatMap(getLegalActions(opened), (l) => l.callAmount)).toEqual(
      Option.some(10),
    );
  });
});

// ---------------------------------------------------------------------------
// Three-handed
// ---------------------------------------------------------------------------

describe("three-handed", () => {
  it("the small blind acts first after the flop", () => {
    const opened = start(
      [player("alice", 0, 1000), player("bob", 1, 1000), player("carol", 2, 1000)],
      stackedDeck([]),
    );
    expect(Option.map(activePlayer(opened), (p) => p.id)).toEqual(Option.some("alice"));
    const flop = play(opened, ["alice", Call], ["bob", Call], ["carol", Check]);
    expect(flop.street).toBe("Flop");
    expect(toAct(flop)).toBe("bob");
  });

  it("records the last preflop raiser", () => {
    const opened = start(
      [player("alice", 0, 1000), player("bob", 1, 1000), player("carol", 2, 1000)],
      stackedDeck([]),
    );
    const raised = play(opened, ["alice", Raise(Chips(30))], ["bob", Fold], ["carol", Call]);
    expect(raised.preflopAggressor).toEqual(Option.some("alice"));
    expect(raised.street).toBe("Flop");
  });

  it("all-ins run out to a side-pot showdown", () => {
    const opened = start(
      [player("alice", 0, 200), player("bob", 1, 500), player("carol", 2, 500)],
      stackedDeck(["Ks Kd", "Qs Qd", "As Ad"], "2c 7d 9h Jc 3s"),
    );
    const allIn = play(opened, ["alice", AllIn], ["bob", AllIn], ["carol", Call]);
    expect(allIn.status).toBe("RunningOut");
    expect(allIn.street).toBe("Preflop");
    expect(chipsInPlay(allIn)).toBe(1200);

    const flop = expectRight(runOutNext(allIn));
    expect(flop.street).toBe("Flop");
    expect(flop.status).toBe("RunningOut");

    const done = expectRight(runOut(allIn));
    expect(message(done)).toBe(
      "Alice wins the main pot (600) with Pair; Bob wins side pot 1 (600) with Pair",
    );
    expect(stacks(done)).toEqual({ alice: 600, bob: 600, carol: 0 });
    expect(done.players.find((p) => p.id === "carol")?.status).toBe("Eliminated");
    expect(done.events.some((e) => e._tag === "PlayerEliminated" && e.playerId === "carol")).toBe(
      true,
    );
    expect(chipsInPlay(done)).toBe(1200);
  });
});
