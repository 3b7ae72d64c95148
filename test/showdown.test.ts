import { describe, it, expect } from "vitest";
import { Chips, SeatIndex } from "../src/brand.js";
import { unsafeParseCards } from "../src/card.js";
import type { Player } from "../src/player.js";
import { dealCards, fold, placeBet } from "../src/player.js";
import type { Pot } from "../src/pot.js";
import { buildPots, contributionsOf } from "../src/pot.js";
import { settleShowdown, settleUncontested, splitAmount } from "../src/showdown.js";
import { pid, player } from "./helpers.js";

function holding(p: Player, hole: string): Player {
  const [a, b] = unsafeParseCards(hole);
  if (a === undefined || b === undefined) throw new Error(`bad hole cards ${hole}`);
  return dealCards(p, [a, b]);
}

const chips = (players: readonly Player[]) =>
  Object.fromEntries(players.map((p) => [p.id, p.chips]));

describe("splitAmount", () => {
  it("gives odd chips to the first winners", () => {
    expect(splitAmount(Chips(10), [pid("a"), pid("b"), pid("c")], 0).map((a) => a.amount)).toEqual([
      4, 3, 3,
    ]);
  });

  it("no winners, no awards", () => {
    expect(splitAmount(Chips(10), [], 0)).toEqual([]);
  });
});

describe("settleShowdown", () => {
  it("splits a tie and gives the odd chip left of the dealer", () => {
    const players = [
      holding(placeBet(player("alice", 0, 1000), Chips(150)), "2s 2h"),
      holding(placeBet(player("bob", 1, 1000), Chips(151)), "Ks Qh"),
    ];
    const pot: Pot = {
      total: Chips(301),
      tranches: [{ amount: Chips(301), threshold: Chips(150), eligible: [pid("alice"), pid("bob")] }],
    };
    const s = settleShowdown({
      players,
      communityCards: unsafeParseCards("5c 6d 7h 8s 9c"),
      pot,
      dealerSeat: SeatIndex(0),
    });
    expect(s.message).toBe("Bob and Alice split the pot (301) with Straight");
    expect(s.awards).toEqual([
      { playerId: "bob", amount: 151, potIndex: 0 },
      { playerId: "alice", amount: 150, potIndex: 0 },
    ]);
    expect(s.loserIds).toEqual([]);
  });

  it("pays main and side pots to different winners", () => {
    const players = [
      holding(placeBet(player("alice", 0, 200), Chips(200)), "As Ad"),
      holding(placeBet(player("bob", 1, 500), Chips(500)), "Ks Kd"),
      holding(placeBet(player("carol", 2, 500), Chips(500)), "Qs Qd"),
    ];
    const s = settleShowdown({
      players,
      communityCards: unsafeParseCards("2c 7d 9h Jc 3s"),
      pot: buildPots(contributionsOf(players)),
      dealerSeat: SeatIndex(0),
    });
    expect(s.message).toBe(
      "Alice wins the main pot (600) with Pair; Bob wins side pot 1 (600) with Pair",
    );
    expect(chips(s.players)).toEqual({ alice: 600, bob: 600, carol: 0 });
    expect(s.winnerIds).toEqual(["alice", "bob"]);
    expect(s.loserIds).toEqual(["carol"]);
    expect(s.revealed.map((r) => r.category)).toEqual(["Pair", "Pair", "Pair"]);
  });

  it("a side pot with one contender is taken without a showdown", () => {
    const players = [
      holding(placeBet(player("alice", 0, 100), Chips(100)), "As Ad"),
      holding(placeBet(player("bob", 1, 1000), Chips(300)), "Ks Kd"),
      fold(holding(placeBet(player("carol", 2, 1000), Chips(300)), "Qs Qd")),
    ];
    const s = settleShowdown({
      players,
      communityCards: unsafeParseCards("2c 7d 9h Jc 3s"),
      pot: buildPots(contributionsOf(players)),
      dealerSeat: SeatIndex(0),
    });
    expect(s.message).toBe("Alice wins the main pot (300) with Pair; Bob takes side pot 1 (400)");
    expect(chips(s.players)).toEqual({ alice: 300, bob: 1100, carol: 700 });
    expect(s.loserIds).toEqual(["carol"]);
    expect(s.revealed.map((r) => r.playerId)).toEqual(["alice", "bob"]);
  });
});

describe("settleUncontested", () => {
  it("gives the whole pot to the last player", () => {
    const alice = fold(placeBet(player("alice", 0, 1000), Chips(5)));
    const bob = placeBet(player("bob", 1, 1000), Chips(10));
    const pot = buildPots(contributionsOf([alice, bob]));
    const s = settleUncontested([alice, bob], bob, pot);
    expect(s.message).toBe("Bob wins 15 uncontested");
    expect(chips(s.players)).toEqual({ alice: 995, bob: 1005 });
    expect(s.loserIds).toEqual(["alice"]);
  });
});
