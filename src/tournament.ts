/**
 * Tournament play on top of a table: blind levels, rebuys, late entrants,
 * elimination order and payouts.
 *
 * The tournament never reaches into a running hand. Every operation here
 * runs between hands and returns the updated tournament and table together.
 *
 * @module
 */

import { Effect, Either, HashMap, Option, Random, Ref } from "effect";

import type { Chips } from "./brand.js";
import { Chips as makeChips, PlayerId, SeatIndex } from "./brand.js";
import type { PokerError } from "./error.js";
import { PlayerNotFound, RebuyNotAllowed, TableFull } from "./error.js";
import type { ForcedBets } from "./hand.js";
import { findPlayer } from "./player.js";
import type { AIProfile, PresetName } from "./profile.js";
import { PRESETS, PRESET_NAMES } from "./profile.js";
import type { TableState } from "./table.js";
import { addChips, createTable, setForcedBets, sitDown } from "./table.js";

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export interface BlindLevel {
  readonly smallBlind: Chips;
  readonly bigBlind: Chips;
  readonly ante: Chips;
}

export interface TournamentConfig {
  readonly name: string;
  readonly startingChips: Chips;
  readonly handsPerLevel: number;
  readonly blindSchedule: readonly [BlindLevel, ...BlindLevel[]];
  /** Share of the prize pool per finishing place, best first. */
  readonly payoutStructure: readonly number[];
  readonly maxRebuys: number;
  /** Late entrants are considered every this many hands. */
  readonly entryInterval: number;
  /** Late entrants stop once the table has this many players. */
  readonly entryCap: number;
}

const level = (smallBlind: number, bigBlind: number, ante = 0): BlindLevel => ({
  smallBlind: makeChips(smallBlind),
  bigBlind: makeChips(bigBlind),
  ante: makeChips(ante),
});

export const TURBO: TournamentConfig = {
  name: "Turbo",
  startingChips: makeChips(1000),
  handsPerLevel: 5,
  blindSchedule: [
    level(10, 20),
    level(15, 30),
    level(25, 50, 5),
    level(50, 100, 10),
    level(75, 150, 15),
    level(100, 200, 25),
    level(150, 300, 50),
    level(200, 400, 75),
    level(300, 600, 100),
    level(500, 1000, 150),
  ],
  payoutStructure: [0.5, 0.3, 0.2],
  maxRebuys: 1,
  entryInterval: 10,
  entryCap: 8,
};

export const STANDARD: TournamentConfig = {
  name: "Standard",
  startingChips: makeChips(1000),
  handsPerLevel: 10,
  blindSchedule: [
    level(10, 20),
    level(15, 30),
    level(20, 40),
    level(25, 50, 5),
    level(50, 100, 10),
    level(75, 150, 15),
    level(100, 200, 25),
    level(150, 300, 50),
    level(200, 400, 75),
    level(300, 600, 100),
  ],
  payoutStructure: [0.5, 0.3, 0.2],
  maxRebuys: 2,
  entryInterval: 10,
  entryCap: 8,
};

export const DEEP_STACK: TournamentConfig = {
  name: "Deep Stack",
  startingChips: makeChips(2000),
  handsPerLevel: 15,
  blindSchedule: [
    level(10, 20),
    level(15, 30),
    level(20, 40),
    level(25, 50),
    level(30, 60, 5),
    level(50, 100, 10),
    level(75, 150, 15),
    level(100, 200, 25),
    level(150, 300, 50),
    level(200, 400, 75),
  ],
  payoutStructure: [0.5, 0.3, 0.2],
  maxRebuys: 3,
  entryInterval: 10,
  entryCap: 8,
};

export const forcedBetsFor = (blinds: BlindLevel): ForcedBets => ({
  smallBlind: blinds.smallBlind,
  bigBlind: blinds.bigBlind,
  ante: blinds.ante,
});

// ---------------------------------------------------------------------------
// State
// ---------------------------------------------------------------------------

export interface TournamentState {
  readonly config: TournamentConfig;
  /** Index into the blind schedule. */
  readonly level: number;
  readonly handsAtLevel: number;
  readonly handsPlayed: number;
  readonly rebuys: HashMap.HashMap<PlayerId, number>;
  /** First out first. */
  readonly eliminationOrder: readonly PlayerId[];
  /** Buy-ins so far, rebuys included. */
  readonly entries: number;
}

export interface TournamentTable {
  readonly tournament: TournamentState;
  readonly table: TableState;
}

export interface Entrant {
  readonly id: PlayerId;
  readonly name: string;
  readonly profile?: AIProfile;
}

export function createTournament(config: TournamentConfig): TournamentState {
  return {
    config,
    level: 0,
    handsAtLevel: 0,
    handsPlayed: 0,
    rebuys: HashMap.empty(),
    eliminationOrder: [],
    entries: 0,
  };
}

export function currentLevel(t: TournamentState): BlindLevel {
  return t.config.blindSchedule[t.level] ?? t.config.blindSchedule[0];
}

/** A table at the first blind level with every entrant seated in order. */
export function setupTournament(
  config: TournamentConfig,
  entrants: readonly Entrant[],
  maxSeats = 9,
): Either.Either<TournamentTable, PokerError> {
  const tournament = createTournament(config);
  const initial = createTable({
    maxSeats,
    forcedBets: forcedBetsFor(currentLevel(tournament)),
  });
  return Either.flatMap(initial, (table) => {
    let current: Either.Either<TournamentTable, PokerError> = Either.right({ tournament, table });
    for (const entrant of entrants) {
      current = Either.flatMap(current, (tt) => seatEntrant(tt, entrant));
    }
    return current;
  });
}

// ---------------------------------------------------------------------------
// Between hands
// ---------------------------------------------------------------------------

/**
 * Count the finished hand: note new eliminations and move to the next
 * blind level once enough hands have been played at this one.
 */
export function recordHand(
  tt: TournamentTable,
): Either.Either<TournamentTable, PokerError> {
  const { tournament: t, table } = tt;
  const busted = table.players
    .filter((p) => p.chips === 0 && !t.eliminationOrder.includes(p.id))
    .map((p) => p.id);
  const counted: TournamentState = {
    ...t,
    handsPlayed: t.handsPlayed + 1,
    handsAtLevel: t.handsAtLevel + 1,
    eliminationOrder: [...t.eliminationOrder, ...busted],
  };

  const next = counted.level + 1;
  if (counted.handsAtLevel < t.config.handsPerLevel || next >= t.config.blindSchedule.length) {
    return Either.right({ tournament: counted, table });
  }
  const leveled: TournamentState = { ...counted, level: next, handsAtLevel: 0 };
  return Either.map(setForcedBets(table, forcedBetsFor(currentLevel(leveled))), (updated) => ({
    tournament: leveled,
    table: updated,
  }));
}

/** Buy a busted player back in for the starting stack. */
export function rebuy(
  tt: TournamentTable,
  playerId: PlayerId,
): Either.Either<TournamentTable, PokerError> {
  const { tournament: t, table } = tt;
  const found = findPlayer(table.players, playerId);
  if (Option.isNone(found)) return Either.left(new PlayerNotFound({ playerId }));
  const player = found.value;
  const used = Option.getOrElse(HashMap.get(t.rebuys, playerId), () => 0);

  if (player.chips > 0) {
    return Either.left(
      new RebuyNotAllowed({ playerId, reason: "Player still has chips", chips: player.chips }),
    );
  }
  if (used >= t.config.maxRebuys) {
    return Either.left(
      new RebuyNotAllowed({
        playerId,
        reason: `Rebuy limit of ${t.config.maxRebuys} reached`,
        chips: player.chips,
      }),
    );
  }
  return Either.map(addChips(table, playerId, t.config.startingChips), (updated) => ({
    tournament: {
      ...t,
      rebuys: HashMap.set(t.rebuys, playerId, used + 1),
      eliminationOrder: t.eliminationOrder.filter((id) => id !== playerId),
      entries: t.entries + 1,
    },
    table: updated,
  }));
}

// ---------------------------------------------------------------------------
// Late entrants
// ---------------------------------------------------------------------------

export type TournamentStage = "Early" | "Middle" | "Late" | "FinalTable";

/** Stage by blind level, except that three or fewer players left is the final table. */
export function stageOf(tt: TournamentTable): TournamentStage {
  const remaining = tt.table.players.filter((p) => p.chips > 0).length;
  if (remaining <= 3) return "FinalTable";
  const progress = tt.tournament.level / tt.tournament.config.blindSchedule.length;
  if (progress < 1 / 3) return "Early";
  if (progress < 2 / 3) return "Middle";
  return "Late";
}

export const ENTRY_PROBABILITY: Record<TournamentStage, number> = {
  Early: 0.6,
  Middle: 0.4,
  Late: 0.2,
  FinalTable: 0,
};

/** Decide whether a new player joins after this hand. */
export function shouldAddEntrant(tt: TournamentTable): Effect.Effect<boolean> {
  const { tournament: t, table } = tt;
  const due = t.handsPlayed > 0 && t.handsPlayed % t.config.entryInterval === 0;
  const room = table.players.length < Math.min(t.config.entryCap, table.config.maxSeats);
  if (!due || !room) return Effect.succeed(false);
  const probability = ENTRY_PROBABILITY[stageOf(tt)];
  return Effect.map(Random.next, (r) => r < probability);
}

/** Append 2, 3, ... to a name already at the table. */
export function uniqueName(table: TableState, name: string): string {
  const taken = new Set(table.players.map((p) => p.name));
  let candidate = name;
  for (let n = 2; taken.has(candidate); n++) candidate = `${name}${n}`;
  return candidate;
}

/** Seat `entrant` in the lowest free seat with the starting stack. */
export function seatEntrant(
  tt: TournamentTable,
  entrant: Entrant,
): Either.Either<TournamentTable, PokerError> {
  const { tournament: t, table } = tt;
  const taken = new Set<number>(table.players.map((p) => p.seatIndex));
  let seat: Option.Option<SeatIndex> = Option.none();
  for (let i = 0; i < table.config.maxSeats && Option.isNone(seat); i++) {
    if (!taken.has(i)) seat = SeatIndex.option(i);
  }
  if (Option.isNone(seat)) return Either.left(new TableFull());

  return Either.map(
    sitDown(table, {
      id: entrant.id,
      name: uniqueName(table, entrant.name),
      seatIndex: seat.value,
      chips: t.config.startingChips,
      profile: entrant.profile,
    }),
    (updated) => ({ tournament: { ...t, entries: t.entries + 1 }, table: updated }),
  );
}

/** A computer entrant with a random personality from `pool`. */
export function randomEntrant(
  id: PlayerId,
  pool: readonly PresetName[] = PRESET_NAMES,
): Effect.Effect<Entrant> {
  return Effect.map(Random.nextIntBetween(0, pool.length), (i) => {
    const name = pool[Math.min(i, pool.length - 1)] ?? "rock";
    const profile = PRESETS[name];
    return { id, name: profile.name, profile };
  });
}

// ---------------------------------------------------------------------------
// Results
// ---------------------------------------------------------------------------

export interface Standing {
  readonly place: number;
  readonly playerId: PlayerId;
  readonly name: string;
  readonly chips: Chips;
}

/** Players with chips by stack, then the eliminated, last out first. */
export function standings(tt: TournamentTable): readonly Standing[] {
  const { tournament: t, table } = tt;
  const alive = table.players
    .filter((p) => p.chips > 0)
    .sort((a, b) => b.chips - a.chips || a.seatIndex - b.seatIndex);
  const out = [...t.eliminationOrder]
    .reverse()
    .flatMap((id) => Option.toArray(findPlayer(table.players, id)));
  return [...alive, ...out].map((p, i) => ({
    place: i + 1,
    playerId: p.id,
    name: p.name,
    chips: p.chips,
  }));
}

export const prizePool = (t: TournamentState): Chips =>
  makeChips(t.config.startingChips * t.entries);

export interface Payout {
  readonly place: number;
  readonly playerId: PlayerId;
  readonly amount: Chips;
}

/** Prize per paid place, rounded down. */
export function payouts(tt: TournamentTable): readonly Payout[] {
  const pool = prizePool(tt.tournament);
  return standings(tt).flatMap((s) => {
    const share = tt.tournament.config.payoutStructure[s.place - 1];
    return share === undefined
      ? []
      : [{ place: s.place, playerId: s.playerId, amount: makeChips(Math.floor(pool * share)) }];
  });
}

// ---------------------------------------------------------------------------
// Session hook
// ---------------------------------------------------------------------------

/**
 * A `betweenHands` hook for `playGame` that keeps the tournament in `ref`:
 * records the hand, then maybe seats a late entrant.
 */
export function tournamentHook(
  ref: Ref.Ref<TournamentState>,
): (table: TableState, handsPlayed: number) => Effect.Effect<TableState> {
  return (table) =>
    Effect.gen(function* () {
      const tournament = yield* Ref.get(ref);
      const recorded = recordHand({ tournament, table });
      if (Either.isLeft(recorded)) {
        yield* Effect.logWarning(`Tournament update failed: ${recorded.left._tag}`);
        return table;
      }
      let tt = recorded.right;
      if (tt.tournament.level !== tournament.level) {
        const blinds = currentLevel(tt.tournament);
        yield* Effect.logInfo(`Blinds up to ${blinds.smallBlind}/${blinds.bigBlind}`);
      }

      if (yield* shouldAddEntrant(tt)) {
        const entrant = yield* randomEntrant(PlayerId(`entrant-${tt.tournament.entries + 1}`));
        const seated = seatEntrant(tt, entrant);
        if (Either.isRight(seated)) {
          tt = seated.right;
          yield* Effect.logInfo(`${entrant.name} joins the table`);
        } else {
          yield* Effect.logDebug(`No seat for entrant: ${seated.left._tag}`);
        }
      }

      yield* Ref.set(ref, tt.tournament);
      return tt.table;
    });
}
