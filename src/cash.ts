/**
 * Cash game play on top of a table: fixed blinds, buy-ins and top-ups,
 * computer players coming and going, and the hero's session figures.
 *
 * Like tournaments, everything here runs between hands and returns the
 * updated session and table together.
 *
 * @module
 */

import { Effect, Either, Option, Random, Ref } from "effect";

import type { Chips } from "./brand.js";
import { Chips as makeChips, PlayerId, SeatIndex } from "./brand.js";
import type { Difficulty } from "./difficulty.js";
import { DIFFICULTIES } from "./difficulty.js";
import type { PokerError } from "./error.js";
import { BuyInNotAllowed, PlayerNotFound } from "./error.js";
import type { ForcedBets } from "./hand.js";
import { findPlayer, isBot } from "./player.js";
import type { TableState } from "./table.js";
import { addChips, createTable, sitDown, standUp } from "./table.js";
import { randomEntrant, uniqueName } from "./tournament.js";

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export interface CashGameConfig {
  readonly smallBlind: Chips;
  readonly bigBlind: Chips;
  readonly minBuyIn: Chips;
  readonly maxBuyIn: Chips;
  /** Buy-ins the hero may make, the first one included. 0 means no limit. */
  readonly maxBuyIns: number;
}

export const DEFAULT_CASH_GAME: CashGameConfig = {
  smallBlind: makeChips(10),
  bigBlind: makeChips(20),
  minBuyIn: makeChips(400),
  maxBuyIn: makeChips(2000),
  maxBuyIns: 5,
};

/** Buy-ins from 20 to 100 big blinds. */
export function cashConfigFromBlinds(
  smallBlind: number,
  bigBlind: number,
  maxBuyIns = 5,
): CashGameConfig {
  return {
    smallBlind: makeChips(smallBlind),
    bigBlind: makeChips(bigBlind),
    minBuyIn: makeChips(bigBlind * 20),
    maxBuyIn: makeChips(bigBlind * 100),
    maxBuyIns,
  };
}

export const cashForcedBets = (config: CashGameConfig): ForcedBets => ({
  smallBlind: config.smallBlind,
  bigBlind: config.bigBlind,
  ante: makeChips(0),
});

// ---------------------------------------------------------------------------
// State
// ---------------------------------------------------------------------------

export interface CashGameState {
  readonly config: CashGameConfig;
  readonly difficulty: Difficulty;
  readonly heroId: PlayerId;
  readonly initialBuyIn: Chips;
  readonly topUpTotal: number;
  readonly handsPlayed: number;
  readonly handsWon: number;
  /** The hero's stack change per hand, oldest first. */
  readonly handProfits: readonly number[];
  /** The hero's stack when last recorded; the next hand's profit is measured from here. */
  readonly lastStack: number;
  /** Computer players seated after the start. */
  readonly entries: number;
  readonly departures: number;
}

export interface CashTable {
  readonly cash: CashGameState;
  readonly table: TableState;
}

export interface CashHero {
  readonly id: PlayerId;
  readonly name: string;
  readonly buyIn: Chips;
}

export function createCashGame(
  config: CashGameConfig,
  hero: CashHero,
  difficulty: Difficulty,
): CashGameState {
  return {
    config,
    difficulty,
    heroId: hero.id,
    initialBuyIn: hero.buyIn,
    topUpTotal: 0,
    handsPlayed: 0,
    handsWon: 0,
    handProfits: [],
    lastStack: hero.buyIn,
    entries: 0,
    departures: 0,
  };
}

/** A computer player's buy-in, uniform between 40 big blinds and the maximum. */
export function randomAIBuyIn(config: CashGameConfig): Effect.Effect<Chips> {
  const low = Math.min(config.bigBlind * 40, config.maxBuyIn);
  const high = config.maxBuyIn;
  return Effect.map(Random.nextIntBetween(low, high + 1), (n) =>
    makeChips(Math.min(Math.max(n, low), high)),
  );
}

const seatsFree = (table: TableState): readonly SeatIndex[] => {
  const taken = new Set<number>(table.players.map((p) => p.seatIndex));
  const free: SeatIndex[] = [];
  for (let i = 0; i < table.config.maxSeats; i++) {
    if (!taken.has(i)) free.push(SeatIndex(i));
  }
  return free;
};

/** Seat a random computer player from the difficulty's pool. */
function seatBot(
  table: TableState,
  seatIndex: SeatIndex,
  id: PlayerId,
  cash: CashGameState,
): Effect.Effect<TableState, PokerError> {
  return Effect.gen(function* () {
    const entrant = yield* randomEntrant(id, DIFFICULTIES[cash.difficulty].profiles);
    const chips = yield* randomAIBuyIn(cash.config);
    return yield* sitDown(table, {
      id,
      name: uniqueName(table, entrant.name),
      seatIndex,
      chips,
      profile: entrant.profile,
    });
  });
}

/**
 * The hero in seat 0 and `opponents` computer players after them, each
 * with a random buy-in.
 */
export function setupCashGame(
  config: CashGameConfig,
  hero: CashHero,
  opponents: number,
  difficulty: Difficulty = "Medium",
  maxSeats = 9,
): Effect.Effect<CashTable, PokerError> {
  return Effect.gen(function* () {
    if (hero.buyIn < config.minBuyIn || hero.buyIn > config.maxBuyIn) {
      return yield* new BuyInNotAllowed({
        playerId: hero.id,
        reason: `Buy-in must be between ${config.minBuyIn} and ${config.maxBuyIn}`,
        chips: hero.buyIn,
      });
    }
    const cash = createCashGame(config, hero, difficulty);
    let table = yield* createTable({ maxSeats, forcedBets: cashForcedBets(config) });
    table = yield* sitDown(table, {
      id: hero.id,
      name: hero.name,
      seatIndex: SeatIndex(0),
      chips: hero.buyIn,
    });
    for (let n = 1; n <= Math.min(opponents, maxSeats - 1); n++) {
      table = yield* seatBot(table, SeatIndex(n), PlayerId(`cash-bot-${n}`), cash);
    }
    return { cash, table };
  });
}

// ---------------------------------------------------------------------------
// Session figures
// ---------------------------------------------------------------------------

export const totalBuyIn = (s: CashGameState): number => s.initialBuyIn + s.topUpTotal;

/** The first buy-in plus one for every full maximum buy-in topped up. */
export function totalBuyInCount(s: CashGameState): number {
  if (s.initialBuyIn <= 0) return 0;
  const topUps = s.config.maxBuyIn > 0 ? Math.floor(s.topUpTotal / s.config.maxBuyIn) : 0;
  return 1 + topUps;
}

export const isBuyInLimitReached = (s: CashGameState): boolean =>
  s.config.maxBuyIns > 0 && totalBuyInCount(s) >= s.config.maxBuyIns;

export const heroStack = (ct: CashTable): number =>
  Option.match(findPlayer(ct.table.players, ct.cash.heroId), {
    onNone: () => 0,
    onSome: (p) => p.chips,
  });

export const netProfit = (ct: CashTable): number => heroStack(ct) - totalBuyIn(ct.cash);

export const winRate = (s: CashGameState): number =>
  s.handsPlayed > 0 ? s.handsWon / s.handsPlayed : 0;

/** Net profit as a percentage of everything bought in. */
export function roi(ct: CashTable): number {
  const invested = totalBuyIn(ct.cash);
  return invested > 0 ? (netProfit(ct) / invested) * 100 : 0;
}

export const maxWin = (s: CashGameState): number =>
  s.handProfits.length > 0 ? Math.max(...s.handProfits) : 0;

export const maxLoss = (s: CashGameState): number =>
  s.handProfits.length > 0 ? Math.min(...s.handProfits) : 0;

// ---------------------------------------------------------------------------
// Between hands
// ---------------------------------------------------------------------------

/** Count the finished hand and the hero's stack change over it. */
export function recordCashHand(ct: CashTable): CashTable {
  const { cash } = ct;
  const stack = heroStack(ct);
  const profit = stack - cash.lastStack;
  return {
    cash: {
      ...cash,
      handsPlayed: cash.handsPlayed + 1,
      handsWon: profit > 0 ? cash.handsWon + 1 : cash.handsWon,
      handProfits: [...cash.handProfits, profit],
      lastStack: stack,
    },
    table: ct.table,
  };
}

/** Bring a player's stack up to `toAmount`, never past the maximum buy-in. */
export function topUp(
  ct: CashTable,
  playerId: PlayerId,
  toAmount: Chips,
): Either.Either<CashTable, PokerError> {
  const { cash, table } = ct;
  const found = findPlayer(table.players, playerId);
  if (Option.isNone(found)) return Either.left(new PlayerNotFound({ playerId }));
  const { chips } = found.value;
  const refuse = (reason: string) =>
    Either.left(new BuyInNotAllowed({ playerId, reason, chips }));

  if (toAmount <= chips) return refuse(`Stack is already ${chips}`);
  if (toAmount > cash.config.maxBuyIn) {
    return refuse(`Above the maximum buy-in of ${cash.config.maxBuyIn}`);
  }
  const isHero = playerId === cash.heroId;
  if (isHero && isBuyInLimitReached(cash)) {
    return refuse(`Buy-in limit of ${cash.config.maxBuyIns} reached`);
  }

  const added = toAmount - chips;
  return Either.map(addChips(table, playerId, makeChips(added)), (updated) => ({
    cash: isHero
      ? { ...cash, topUpTotal: cash.topUpTotal + added, lastStack: toAmount }
      : cash,
    table: updated,
  }));
}

/**
 * Busted computer players leave, then every empty seat takes a new one
 * with even odds. With fewer than three players left holding chips, every
 * empty seat is filled.
 */
export function checkAIEntries(ct: CashTable): Effect.Effect<CashTable, PokerError> {
  return Effect.gen(function* () {
    let { cash, table } = ct;
    for (const p of table.players.filter((q) => q.chips === 0 && isBot(q))) {
      table = yield* standUp(table, p.id);
    }

    const forceFill = table.players.filter((p) => p.chips > 0).length < 3;
    for (const seat of seatsFree(table)) {
      const join = forceFill || (yield* Random.next) < 0.5;
      if (!join) continue;
      const id = PlayerId(`cash-${cash.entries + 1}`);
      table = yield* seatBot(table, seat, id, cash);
      cash = { ...cash, entries: cash.entries + 1 };
    }
    return { cash, table };
  });
}

export const DEPARTURE_ODDS = {
  /** Above 1.5 maximum buy-ins, a winner may take the money. */
  deepStacked: 0.1,
  /** Below 0.3 of a maximum buy-in, a loser may give up. */
  shortStacked: 0.2,
} as const;

/** Computer players with a very deep or very short stack may leave. The hero never does. */
export function checkAIDepartures(ct: CashTable): Effect.Effect<CashTable, PokerError> {
  return Effect.gen(function* () {
    let { cash, table } = ct;
    const { maxBuyIn } = cash.config;
    for (const p of table.players.filter((q) => isBot(q) && q.chips > 0)) {
      const odds =
        p.chips > maxBuyIn * 1.5
          ? DEPARTURE_ODDS.deepStacked
          : p.chips < maxBuyIn * 0.3
            ? DEPARTURE_ODDS.shortStacked
            : 0;
      if (odds === 0 || (yield* Random.next) >= odds) continue;
      table = yield* standUp(table, p.id);
      cash = { ...cash, departures: cash.departures + 1 };
    }
    return { cash, table };
  });
}

// ---------------------------------------------------------------------------
// Session hook
// ---------------------------------------------------------------------------

/**
 * A `betweenHands` hook for `playGame` that keeps the session in `ref`:
 * records the hand, lets computer players leave, then seats new ones.
 */
export function cashGameHook(
  ref: Ref.Ref<CashGameState>,
): (table: TableState, handsPlayed: number) => Effect.Effect<TableState> {
  return (table) =>
    Effect.gen(function* () {
      const cash = yield* Ref.get(ref);
      const recorded = recordCashHand({ cash, table });
      const updated = yield* Effect.either(
        Effect.flatMap(checkAIDepartures(recorded), checkAIEntries),
      );
      if (Either.isLeft(updated)) {
        yield* Effect.logWarning(`Cash game update failed: ${updated.left._tag}`);
        yield* Ref.set(ref, recorded.cash);
        return table;
      }
      const ct = updated.right;
      const left = ct.cash.departures - cash.departures;
      const joined = ct.cash.entries - cash.entries;
      if (left > 0) yield* Effect.logInfo(`${left} player(s) left the table`);
      if (joined > 0) yield* Effect.logInfo(`${joined} player(s) joined the table`);
      yield* Effect.logDebug(`Hero net ${netProfit(ct)} after ${ct.cash.handsPlayed} hands`);

      yield* Ref.set(ref, ct.cash);
      return ct.table;
    });
}
