import { describe, it, expect } from "vitest";
import { Effect, Option } from "effect";
import { Chips } from "../src/brand.js";
import { AllIn, Call, Check, Fold } from "../src/action.js";
import { PRESETS } from "../src/profile.js";
import type { TableState } from "../src/table.js";
import {
  act,
  addChips,
  awaitingAction,
  createTable,
  getLegalActions,
  isRunningOut,
  playersWithChips,
  runOutNext,
  setForcedBets,
  sitDown,
  standUp,
  startNextHand,
  totalChips,
  tryAct,
} from "../src/table.js";
import { blinds, expectLeft, expectRight, pid, seed, stackedDeck, tableWith } from "./helpers.js";

const headsUp = () => tableWith([seed("alice", 0, 1000), seed("bob", 1, 1000)]);
const deal = (table: TableState, hole: readonly string[] = ["As Ad", "Ks Kd"]) =>
  Effect.runSync(startNextHand(table, stackedDeck(hole, "2c 7d 9h Jc 3s")));
const stacks = (table: TableState) =>
  Object.fromEntries(table.players.map((p) => [p.id, p.chips]));
const lastMessage = (table: TableState) =>
  Option.match(table.lastResult, { onNone: () => "", onSome: (r) => r.message });
const tiltOf = (table: TableState, id: string) =>
  Option.fromNullable(table.players.find((p) => p.id === id)).pipe(
    Option.flatMap((p) => p.profile),
    Option.map((profile) => profile.currentTilt),
    Option.getOrElse(() => -1),
  );

// ---------------------------------------------------------------------------
// Setup
// ---------------------------------------------------------------------------

describe("createTable", () => {
  it("rejects a seat count outside 2..10", () => {
    const error = expectLeft(createTable({ maxSeats: 1, forcedBets: blinds(5, 10) }));
    expect(error.reason).toBe("maxSeats must be between 2 and 10, got 1");
  });

  it("rejects a small blind above the big blind", () => {
    expect(expectLeft(createTable({ maxSeats: 6, forcedBets: blinds(20, 10) }))._tag).toBe(
      "InvalidGameState",
    );
  });
});

describe("sitDown", () => {
  it("keeps players in seat order", () => {
    const table = tableWith([seed("carol", 5, 100), seed("alice", 0, 100), seed("bob", 3, 100)]);
    expect(table.players.map((p) => p.id)).toEqual(["alice", "bob", "carol"]);
    expect(table.events.map((e) => e._tag)).toEqual([
      "PlayerSatDown",
      "PlayerSatDown",
      "PlayerSatDown",
    ]);
  });

  it("rejects a taken seat, a full table and a duplicate id", () => {
    const table = tableWith([seed("alice", 0, 100), seed("bob", 1, 100)], blinds(5, 10), 2);
    expect(expectLeft(sitDown(table, seed("carol", 1, 100)))._tag).toBe("SeatOccupied");
    expect(expectLeft(sitDown(table, seed("carol", 4, 100)))._tag).toBe("TableFull");
    const roomy = headsUp();
    expect(expectLeft(sitDown(roomy, seed("alice", 4, 100)))._tag).toBe("InvalidGameState");
  });

  it("is refused while a hand is running", () => {
    expect(expectLeft(sitDown(deal(headsUp()), seed("carol", 4, 100)))._tag).toBe(
      "HandInProgress",
    );
  });
});

describe("standUp and addChips", () => {
  it("removes a player between hands", () => {
    const table = expectRight(standUp(headsUp(), pid("bob")));
    expect(table.players.map((p) => p.id)).toEqual(["alice"]);
    expect(expectLeft(standUp(table, pid("bob")))._tag).toBe("PlayerNotFound");
  });

  it("adds chips and brings a busted player back", () => {
    const table = tableWith([seed("alice", 0, 1000), seed("bob", 1, 0)]);
    const topped = expectRight(addChips(table, pid("bob"), Chips(500)));
    expect(topped.players.find((p) => p.id === "bob")?.status).toBe("Active");
    expect(topped.events.at(-1)).toEqual({ _tag: "ChipsAdded", playerId: "bob", amount: 500 });
  });

  it("setForcedBets waits for the hand to end", () => {
    expect(expectLeft(setForcedBets(deal(headsUp()), blinds(10, 20)))._tag).toBe(
      "HandInProgress",
    );
    const raised = expectRight(setForcedBets(headsUp(), blinds(10, 20)));
    expect(raised.config.forcedBets.bigBlind).toBe(20);
  });
});

// ---------------------------------------------------------------------------
// Hands
// ---------------------------------------------------------------------------

describe("startNextHand", () => {
  it("puts the button on the lowest seat first", () => {
    const table = deal(headsUp());
    expect(table.button).toEqual(Option.some(0));
    expect(table.handNumber).toBe(1);
    expect(awaitingAction(table)).toEqual(Option.some({ handNumber: 1, playerId: "alice" }));
    expect(Option.flatMap(getLegalActions(table), (l) => l.callAmount)).toEqual(Option.some(5));
  });

  it("moves the button after a hand", () => {
    const first = act(deal(headsUp()), pid("alice"), Fold);
    expect(lastMessage(first)).toBe("Bob wins 15 uncontested");
    expect(stacks(first)).toEqual({ alice: 995, bob: 1005 });
    const second = deal(first);
    expect(second.button).toEqual(Option.some(1));
    expect(awaitingAction(second)).toEqual(Option.some({ handNumber: 2, playerId: "bob" }));
  });

  it("is ignored while a hand is running", () => {
    const table = deal(headsUp());
    expect(Effect.runSync(startNextHand(table))).toBe(table);
  });

  it("skips the hand when fewer than two players have chips", () => {
    const table = Effect.runSync(
      startNextHand(tableWith([seed("alice", 0, 1000), seed("bob", 1, 0)])),
    );
    expect(Option.isNone(table.currentHand)).toBe(true);
    expect(table.handNumber).toBe(1);
    expect(lastMessage(table)).toBe("Hand 1 not dealt: 1 player(s) with chips");
    expect(table.events.at(-1)?._tag).toBe("HandSkipped");
  });

  it("updates tilt as soon as the hand ends", () => {
    const table = tableWith([
      seed("alice", 0, 1000, PRESETS.tiltDavid),
      seed("bob", 1, 1000, { ...PRESETS.rock, currentTilt: 0.5 }),
    ]);
    const settled = act(deal(table), pid("alice"), Fold);
    expect(Option.isNone(settled.currentHand)).toBe(true);
    expect(tiltOf(settled, "alice")).toBeCloseTo((0.85 * 15) / 800, 10);
    expect(tiltOf(settled, "bob")).toBeCloseTo(0.5 - 0.03 * (1 - 0.05 * 0.5), 10);

    // dealing the next hand leaves it alone
    expect(tiltOf(deal(settled), "bob")).toBe(tiltOf(settled, "bob"));
  });

  it("skipped hands do not cool tilt", () => {
    const table = tableWith([seed("alice", 0, 1000, { ...PRESETS.rock, currentTilt: 0.5 })]);
    const skippedTwice = deal(deal(table));
    expect(skippedTwice.handNumber).toBe(2);
    expect(tiltOf(skippedTwice, "alice")).toBe(0.5);
  });
});

describe("acting", () => {
  it("ignores an out-of-turn action", () => {
    const table = deal(headsUp());
    expect(act(table, pid("bob"), Check)).toBe(table);
    expect(expectLeft(tryAct(table, pid("bob"), Check))._tag).toBe("NotPlayersTurn");
  });

  it("reports no hand between hands", () => {
    expect(expectLeft(tryAct(headsUp(), pid("alice"), Call))._tag).toBe("NoHandInProgress");
  });

  it("runs out an all-in street by street", () => {
    let table = act(act(deal(headsUp()), pid("alice"), AllIn), pid("bob"), Call);
    expect(isRunningOut(table)).toBe(true);
    expect(Option.isNone(awaitingAction(table))).toBe(true);
    expect(totalChips(table)).toBe(2000);

    table = runOutNext(table);
    expect(Option.map(table.currentHand, (h) => h.street)).toEqual(Option.some("Flop"));
    table = runOutNext(runOutNext(table));

    expect(Option.isNone(table.currentHand)).toBe(true);
    expect(lastMessage(table)).toBe("Bob wins the pot (2000) with Pair");
    expect(stacks(table)).toEqual({ alice: 0, bob: 2000 });
    expect(playersWithChips(table).map((p) => p.id)).toEqual(["bob"]);
    expect(totalChips(table)).toBe(2000);
  });

  it("runOutNext is a no-op while betting", () => {
    const table = deal(headsUp());
    expect(runOutNext(table)).toBe(table);
  });
});
