/**
 * The table: players who persist across hands, the button, the hand
 * counter and the hand in progress.
 *
 * Roster and blind changes are only accepted between hands. Actions that
 * are illegal or out of turn leave the table unchanged (`act`); `tryAct`
 * reports why.
 *
 * @module
 */

import { Effect, Either, Option } from "effect";

import type { Chips, PlayerId, SeatIndex } from "./brand.js";
import { addChips as plusChips } from "./brand.js";
import type { Player, PlayerSeed } from "./player.js";
import {
  createPlayer,
  findPlayer,
  isInHand,
  nextPlayer,
  replacePlayer,
  resetForHand,
} from "./player.js";
import type { Action, LegalActions } from "./action.js";
import type { Deck } from "./deck.js";
import type { GameEvent } from "./event.js";
import {
  ChipsAdded,
  ForcedBetsChanged,
  HandSkipped,
  PlayerSatDown,
  PlayerStoodUp,
} from "./event.js";
import type { PokerError } from "./error.js";
import {
  HandInProgress,
  InvalidGameState,
  NoHandInProgress,
  PlayerNotFound,
  SeatOccupied,
  TableFull,
} from "./error.js";
import type { ForcedBets, HandState } from "./hand.js";
import * as hand from "./hand.js";
import type { TiltConfig } from "./profile.js";
import { DEFAULT_TILT_CONFIG, updateTilt } from "./profile.js";
import type { HandResult } from "./result.js";
import { skippedResult } from "./result.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface TableConfig {
  /** 2 to 10. */
  readonly maxSeats: number;
  readonly forcedBets: ForcedBets;
  readonly tilt?: TiltConfig;
}

export interface TableState {
  readonly config: TableConfig;
  /** Sorted by seat. */
  readonly players: readonly Player[];
  readonly button: Option.Option<SeatIndex>;
  /** Incremented every time a hand is started, dealt or not. */
  readonly handNumber: number;
  readonly currentHand: Option.Option<HandState>;
  readonly lastResult: Option.Option<HandResult>;
  /** Table events plus the events of every finished hand. */
  readonly events: readonly GameEvent[];
}

/** What the table is waiting for, keyed by hand so stale replies can be told apart. */
export interface ActionRequest {
  readonly handNumber: number;
  readonly playerId: PlayerId;
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

function validateForcedBets(
  forcedBets: ForcedBets,
): Either.Either<ForcedBets, InvalidGameState> {
  if (forcedBets.bigBlind <= 0 || forcedBets.smallBlind > forcedBets.bigBlind) {
    return Either.left(
      new InvalidGameState({
        state: "forcedBets",
        reason: `Blinds ${forcedBets.smallBlind}/${forcedBets.bigBlind} are not a valid structure`,
      }),
    );
  }
  return Either.right(forcedBets);
}

const betweenHands = (table: TableState): Either.Either<TableState, HandInProgress> =>
  Option.isSome(table.currentHand) ? Either.left(new HandInProgress()) : Either.right(table);

// ---------------------------------------------------------------------------
// Setup
// ---------------------------------------------------------------------------

export function createTable(
  config: TableConfig,
): Either.Either<TableState, InvalidGameState> {
  if (config.maxSeats < 2 || config.maxSeats > 10) {
    return Either.left(
      new InvalidGameState({
        state: "createTable",
        reason: `maxSeats must be between 2 and 10, got ${config.maxSeats}`,
      }),
    );
  }
  return Either.map(validateForcedBets(config.forcedBets), () => ({
    config,
    players: [],
    button: Option.none(),
    handNumber: 0,
    currentHand: Option.none(),
    lastResult: Option.none(),
    events: [],
  }));
}

/** Seat a player between hands. Used for the initial roster and late entries. */
export function sitDown(
  table: TableState,
  seed: PlayerSeed,
): Either.Either<TableState, PokerError> {
  return Either.flatMap(betweenHands(table), (t): Either.Either<TableState, PokerError> => {
    if (t.players.some((p) => p.seatIndex === seed.seatIndex)) {
      return Either.left(new SeatOccupied({ seat: seed.seatIndex }));
    }
    if (t.players.length >= t.config.maxSeats) {
      return Either.left(new TableFull());
    }
    if (t.players.some((p) => p.id === seed.id)) {
      return Either.left(
        new InvalidGameState({ state: "sitDown", reason: `Player ${seed.id} is already seated` }),
      );
    }
    const players = [...t.players, createPlayer(seed)].sort(
      (a, b) => a.seatIndex - b.seatIndex,
    );
    return Either.right({
      ...t,
      players,
      events: [...t.events, PlayerSatDown(seed.id, seed.chips)],
    });
  });
}

export function standUp(
  table: TableState,
  playerId: PlayerId,
): Either.Either<TableState, HandInProgress | PlayerNotFound> {
  return Either.flatMap(betweenHands(table), (t) =>
    Option.match(findPlayer(t.players, playerId), {
      onNone: () => Either.left(new PlayerNotFound({ playerId })),
      onSome: () =>
        Either.right({
          ...t,
          players: t.players.filter((p) => p.id !== playerId),
          events: [...t.events, PlayerStoodUp(playerId)],
        }),
    }),
  );
}

/** Add chips to a stack between hands (rebuys, top-ups). */
export function addChips(
  table: TableState,
  playerId: PlayerId,
  amount: Chips,
): Either.Either<TableState, HandInProgress | PlayerNotFound> {
  return Either.flatMap(betweenHands(table), (t) =>
    Option.match(findPlayer(t.players, playerId), {
      onNone: () => Either.left(new PlayerNotFound({ playerId })),
      onSome: (p) =>
        Either.right({
          ...t,
          players: replacePlayer(t.players, resetForHand({ ...p, chips: plusChips(p.chips, amount) })),
          events: [...t.events, ChipsAdded(playerId, amount)],
        }),
    }),
  );
}

/** Change blinds and ante. Only between hands. */
export function setForcedBets(
  table: TableState,
  forcedBets: ForcedBets,
): Either.Either<TableState, HandInProgress | InvalidGameState> {
  return Either.flatMap(betweenHands(table), (t) =>
    Either.map(validateForcedBets(forcedBets), (valid) => ({
      ...t,
      config: { ...t.config, forcedBets: valid },
      events: [...t.events, ForcedBetsChanged(valid)],
    })),
  );
}

// ---------------------------------------------------------------------------
// Between hands
// ---------------------------------------------------------------------------

function applyTilt(
  players: readonly Player[],
  result: HandResult,
  config: TiltConfig,
): readonly Player[] {
  return players.map((p) =>
    Option.match(p.profile, {
      onNone: () => p,
      onSome: (profile) => ({
        ...p,
        profile: Option.some(
          updateTilt(
            profile,
            { lost: result.loserIds.includes(p.id), potSize: result.totalPot },
            config,
          ),
        ),
      }),
    }),
  );
}

/** The button moves to the next player with chips, or the lowest seat at first. */
function nextButton(
  players: readonly Player[],
  button: Option.Option<SeatIndex>,
): Option.Option<SeatIndex> {
  const seated = players.filter(isInHand);
  const next = Option.match(button, {
    onNone: () => Option.fromNullable(seated[0]),
    onSome: (seat) => nextPlayer(seated, seat, () => true),
  });
  return Option.map(next, (p) => p.seatIndex);
}

function skip(
  table: TableState,
  players: readonly Player[],
  handNumber: number,
  reason: string,
): TableState {
  return {
    ...table,
    players,
    handNumber,
    lastResult: Option.some(skippedResult(handNumber, reason)),
    events: [...table.events, HandSkipped(handNumber, reason)],
  };
}

/**
 * Start the next hand.
 *
 * Resets per-hand state and moves the button. With fewer than two players holding chips the hand is
 * recorded as skipped instead. A call while a hand is running is ignored.
 */
export function startNextHand(
  table: TableState,
  deck?: Deck,
): Effect.Effect<TableState> {
  return Effect.gen(function* () {
    if (Option.isSome(table.currentHand)) return table;

    const handNumber = table.handNumber + 1;
    const players = table.players.map(resetForHand);

    const withChips = players.filter(isInHand).length;
    const button = nextButton(players, table.button);
    if (withChips < 2 || Option.isNone(button)) {
      return skip(
        table,
        players,
        handNumber,
        `Hand ${handNumber} not dealt: ${withChips} player(s) with chips`,
      );
    }

    const started = yield* Effect.either(
      hand.startHand({
        handNumber,
        players,
        dealerSeat: button.value,
        forcedBets: table.config.forcedBets,
        deck,
      }),
    );
    if (Either.isLeft(started)) {
      return skip(table, players, handNumber, `Hand ${handNumber} not dealt: ${started.left._tag}`);
    }

    return settleIfComplete({
      ...table,
      players,
      button,
      handNumber,
      currentHand: Option.some(started.right),
    });
  });
}

/** Fold a finished hand back into the table and update every bot's tilt from it. */
function settleIfComplete(table: TableState): TableState {
  if (Option.isNone(table.currentHand)) return table;
  const current = table.currentHand.value;
  if (!hand.isComplete(current)) return table;
  const tilt = table.config.tilt ?? DEFAULT_TILT_CONFIG;
  return {
    ...table,
    players: Option.match(current.result, {
      onNone: () => current.players,
      onSome: (result) => applyTilt(current.players, result, tilt),
    }),
    currentHand: Option.none(),
    lastResult: current.result,
    events: [...table.events, ...current.events],
  };
}

// ---------------------------------------------------------------------------
// During a hand
// ---------------------------------------------------------------------------

function withHand(
  table: TableState,
  f: (h: HandState) => Either.Either<HandState, PokerError>,
): Either.Either<TableState, PokerError> {
  if (Option.isNone(table.currentHand)) return Either.left(new NoHandInProgress());
  return Either.map(f(table.currentHand.value), (next) =>
    settleIfComplete({ ...table, currentHand: Option.some(next) }),
  );
}

export function tryAct(
  table: TableState,
  playerId: PlayerId,
  action: Action,
): Either.Either<TableState, PokerError> {
  return withHand(table, (h) => hand.act(h, playerId, action));
}

/** Apply an action; anything illegal or out of turn is a no-op. */
export function act(table: TableState, playerId: PlayerId, action: Action): TableState {
  return Either.getOrElse(tryAct(table, playerId, action), () => table);
}

export function tryRunOutNext(table: TableState): Either.Either<TableState, PokerError> {
  return withHand(table, hand.runOutNext);
}

/** Deal the next run-out street; a no-op unless the hand is running out. */
export function runOutNext(table: TableState): TableState {
  return Either.getOrElse(tryRunOutNext(table), () => table);
}

// ---------------------------------------------------------------------------
// Queries
// ---------------------------------------------------------------------------

export function awaitingAction(table: TableState): Option.Option<ActionRequest> {
  return Option.flatMap(table.currentHand, (h) =>
    Option.map(h.toAct, (playerId) => ({ handNumber: h.handNumber, playerId })),
  );
}

export function isRunningOut(table: TableState): boolean {
  return Option.exists(table.currentHand, (h) => h.status === "RunningOut");
}

export function getLegalActions(table: TableState): Option.Option<LegalActions> {
  return Option.flatMap(table.currentHand, hand.getLegalActions);
}

/** Players still holding chips. */
export function playersWithChips(table: TableState): readonly Player[] {
  return table.players.filter((p) => p.chips > 0);
}

/** Every chip at the table: stacks plus the pot of the hand in progress. */
export function totalChips(table: TableState): number {
  return Option.match(table.currentHand, {
    onNone: () => table.players.reduce((sum, p) => sum + p.chips, 0),
    onSome: hand.chipsInPlay,
  });
}
