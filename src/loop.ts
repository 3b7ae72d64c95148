/**
 * The session: drives hands at a table, asking strategies for actions and
 * pacing computer players and run-outs.
 *
 * Every pending decision or run-out street runs in its own fiber and
 * reports back through a mailbox `Queue`. A message is only applied if it
 * still refers to the live hand (and, for actions, to the player whose turn
 * it is); anything else is logged and dropped. Outstanding fibers are
 * interrupted when the hand ends.
 *
 * @module
 */

import type { ConfigError } from "effect";
import { Duration, Effect, Either, Fiber, Logger, Option, Queue, identity } from "effect";

import type { PlayerId } from "./brand.js";
import type { Action } from "./action.js";
import { Call, Check, Fold, describeAction } from "./action.js";
import type { GameEvent } from "./event.js";
import type { TableState } from "./table.js";
import {
  awaitingAction,
  isRunningOut,
  playersWithChips,
  startNextHand,
  tryAct,
  tryRunOutNext,
} from "./table.js";
import { findPlayer, isBot } from "./player.js";
import type { DecisionContext } from "./position.js";
import { buildDecisionContext } from "./position.js";
import type { DecisionConfig } from "./decision.js";
import { DEFAULT_DECISION_CONFIG, chooseAction } from "./decision.js";
import type { Difficulty } from "./difficulty.js";
import { decisionConfigFor, equityIterationsFor } from "./difficulty.js";
import type { HandResult } from "./result.js";
import { SessionConfig } from "./config.js";

// ---------------------------------------------------------------------------
// Function types
// ---------------------------------------------------------------------------

export type Strategy = (ctx: DecisionContext) => Effect.Effect<Action>;
export type SyncStrategy = (ctx: DecisionContext) => Action;
export type StopCondition = (state: TableState, handsPlayed: number) => boolean;

// ---------------------------------------------------------------------------
// Mailbox messages
// ---------------------------------------------------------------------------

export type SessionMessage =
  | {
      readonly _tag: "ApplyAction";
      readonly handNumber: number;
      readonly playerId: PlayerId;
      readonly action: Action;
    }
  | { readonly _tag: "RunOutTick"; readonly handNumber: number };

export const ApplyAction = (
  handNumber: number,
  playerId: PlayerId,
  action: Action,
): SessionMessage => ({ _tag: "ApplyAction", handNumber, playerId, action });

export const RunOutTick = (handNumber: number): SessionMessage => ({
  _tag: "RunOutTick",
  handNumber,
});

/**
 * Accept `msg` only if it belongs to the hand in progress and, for an
 * action, the table is waiting on that player. Left carries the reason.
 */
export function checkLiveness(
  table: TableState,
  msg: SessionMessage,
): Either.Either<SessionMessage, string> {
  if (Option.isNone(table.currentHand)) {
    return Either.left(`no hand in progress for hand ${msg.handNumber}`);
  }
  if (table.currentHand.value.handNumber !== msg.handNumber) {
    return Either.left(
      `message for hand ${msg.handNumber} during hand ${table.currentHand.value.handNumber}`,
    );
  }
  if (msg._tag === "RunOutTick") {
    return isRunningOut(table) ? Either.right(msg) : Either.left("hand is not running out");
  }
  return Option.exists(awaitingAction(table), (req) => req.playerId === msg.playerId)
    ? Either.right(msg)
    : Either.left(`not ${msg.playerId}'s turn`);
}

// ---------------------------------------------------------------------------
// Options and results
// ---------------------------------------------------------------------------

export interface PlayHandOptions {
  /** Pacing, equity iterations and log level; read from the environment when absent. */
  readonly session?: SessionConfig;
  /** Serves every seat without an AI profile. Defaults to check/call. */
  readonly strategy?: Strategy;
  /** Bound on how long `strategy` may take. */
  readonly actionTimeout?: Duration.DurationInput;
  readonly defaultAction?: Action | ((ctx: DecisionContext) => Action);
  readonly decisionConfig?: DecisionConfig;
  /** Overrides the session's equity iterations and sets the bots' mistake rate. */
  readonly difficulty?: Difficulty;
  readonly onEvent?: (event: GameEvent) => void;
  readonly maxActionsPerHand?: number; // default 500
}

export interface PlayGameOptions extends PlayHandOptions {
  readonly stopWhen?: StopCondition;
  readonly maxHands?: number; // default 10_000
  /** Runs after every hand: blind levels, rebuys, new entrants. */
  readonly betweenHands?: (state: TableState, handsPlayed: number) => Effect.Effect<TableState>;
}

export interface PlayHandResult {
  readonly state: TableState;
  readonly actionCount: number;
  readonly completed: boolean;
  readonly result: Option.Option<HandResult>;
}

export interface PlayGameResult {
  readonly state: TableState;
  readonly handsPlayed: number;
}

// ---------------------------------------------------------------------------
// Strategies
// ---------------------------------------------------------------------------

export function fromSync(fn: SyncStrategy): Strategy {
  return (ctx) => Effect.succeed(fn(ctx));
}

export const alwaysFold: Strategy = fromSync(() => Fold);

export const passiveStrategy: Strategy = fromSync((ctx) => {
  if (ctx.legalActions.canCheck) return Check;
  if (Option.isSome(ctx.legalActions.callAmount)) return Call;
  return Fold;
});

/** The computer player: Monte Carlo equity, then a weighted draw. */
export function botStrategy(
  iterations: number,
  config: DecisionConfig = DEFAULT_DECISION_CONFIG,
): Strategy {
  return (ctx) => chooseAction(ctx, iterations, config);
}

function resolveDefault(
  defaultAction: PlayHandOptions["defaultAction"],
  ctx: DecisionContext,
): Action {
  if (defaultAction === undefined) return Fold;
  if (typeof defaultAction === "function") return defaultAction(ctx);
  return defaultAction;
}

function chooseValidFallback(ctx: DecisionContext): Action {
  if (ctx.legalActions.canCheck) return Check;
  if (Option.isSome(ctx.legalActions.callAmount)) return Call;
  return Fold;
}

// ---------------------------------------------------------------------------
// Events
// ---------------------------------------------------------------------------

/**
 * Table events followed by the running hand's, as one sequence. A finished
 * hand's events move to the end of the table's, so positions never shift.
 */
function eventAt(state: TableState, index: number): GameEvent | undefined {
  const tableCount = state.events.length;
  if (index < tableCount) return state.events[index];
  return Option.match(state.currentHand, {
    onNone: () => undefined,
    onSome: (h) => h.events[index - tableCount],
  });
}

function eventCount(state: TableState): number {
  return (
    state.events.length +
    Option.match(state.currentHand, { onNone: () => 0, onSome: (h) => h.events.length })
  );
}

// ---------------------------------------------------------------------------
// playOneHand
// ---------------------------------------------------------------------------

interface Applied {
  readonly state: TableState;
  readonly action: Action;
}

/** Apply `action`, then the default, then check/call/fold. */
function applyWithFallback(
  state: TableState,
  playerId: PlayerId,
  action: Action,
  opts: PlayHandOptions,
): Effect.Effect<Option.Option<Applied>> {
  return Effect.gen(function* () {
    const first = tryAct(state, playerId, action);
    if (Either.isRight(first)) return Option.some({ state: first.right, action });

    yield* Effect.logWarning(`Rejected ${describeAction(action)}: ${first.left._tag}`);
    const ctx = buildDecisionContext(state, playerId);
    if (Option.isNone(ctx)) return Option.none();
    for (const fallback of [
      resolveDefault(opts.defaultAction, ctx.value),
      chooseValidFallback(ctx.value),
    ]) {
      const next = tryAct(state, playerId, fallback);
      if (Either.isRight(next)) return Option.some({ state: next.right, action: fallback });
    }
    return Option.none();
  });
}

/** The fiber body that produces one player's decision. */
function decisionFor(
  state: TableState,
  ctx: DecisionContext,
  session: SessionConfig,
  opts: PlayHandOptions,
): Effect.Effect<Action> {
  const player = findPlayer(state.players, ctx.playerId);
  if (Option.exists(player, isBot)) {
    return Effect.zipRight(
      Effect.sleep(session.botThinkTime),
      opts.difficulty === undefined
        ? chooseAction(ctx, session.equityIterations, opts.decisionConfig)
        : chooseAction(
            ctx,
            equityIterationsFor(opts.difficulty, ctx.street),
            decisionConfigFor(opts.difficulty, opts.decisionConfig),
          ),
    );
  }
  const strategy = opts.strategy ?? passiveStrategy;
  if (opts.actionTimeout === undefined) return strategy(ctx);
  return Effect.timeoutTo(strategy(ctx), {
    duration: opts.actionTimeout,
    onTimeout: () => resolveDefault(opts.defaultAction, ctx),
    onSuccess: identity,
  });
}

/**
 * Drive an already-started hand to completion.
 *
 * Returns with `completed: false` if the action budget runs out.
 */
export function playOneHand(
  state: TableState,
  session: SessionConfig,
  opts: PlayHandOptions = {},
): Effect.Effect<PlayHandResult> {
  return driveHand(state, session, opts, state.events.length);
}

/** `playOneHand`, reporting table events from position `eventsFrom` on. */
function driveHand(
  state: TableState,
  session: SessionConfig,
  opts: PlayHandOptions,
  eventsFrom: number,
): Effect.Effect<PlayHandResult> {
  const maxActions = opts.maxActionsPerHand ?? 500;
  const handNumber = state.handNumber;

  const run = Effect.gen(function* () {
    const mailbox = yield* Queue.unbounded<SessionMessage>();
    const fibers: Fiber.RuntimeFiber<boolean>[] = [];
    let current = state;
    let actionCount = 0;
    let emitted = eventsFrom;

    const flushEvents = (): void => {
      const total = eventCount(current);
      if (opts.onEvent !== undefined) {
        for (let i = emitted; i < total; i++) {
          const ev = eventAt(current, i);
          if (ev !== undefined) opts.onEvent(ev);
        }
      }
      emitted = total;
    };

    /** Fork whatever the table is waiting on. False when nothing is pending. */
    const schedule = Effect.gen(function* () {
      if (isRunningOut(current)) {
        const tick = Effect.zipRight(
          Effect.sleep(session.runOutDelay),
          Queue.offer(mailbox, RunOutTick(handNumber)),
        );
        fibers.push(yield* Effect.fork(tick));
        return true;
      }
      const request = awaitingAction(current);
      if (Option.isNone(request)) return false;
      const ctx = buildDecisionContext(current, request.value.playerId);
      if (Option.isNone(ctx)) return false;
      const deliver = Effect.flatMap(decisionFor(current, ctx.value, session, opts), (action) =>
        Queue.offer(mailbox, ApplyAction(request.value.handNumber, request.value.playerId, action)),
      );
      fibers.push(yield* Effect.fork(deliver));
      return true;
    });

    flushEvents();
    let pending = yield* schedule;

    while (pending && Option.isSome(current.currentHand)) {
      if (actionCount >= maxActions) break;

      const msg = yield* Queue.take(mailbox);
      const live = checkLiveness(current, msg);
      if (Either.isLeft(live)) {
        yield* Effect.logDebug(`Dropped stale ${msg._tag}: ${live.left}`);
        continue;
      }

      if (msg._tag === "RunOutTick") {
        const next = tryRunOutNext(current);
        if (Either.isLeft(next)) {
          yield* Effect.logError(`Run-out failed: ${next.left._tag}`);
          break;
        }
        current = next.right;
        yield* Effect.logDebug("Dealt run-out street");
      } else {
        const applied = yield* applyWithFallback(current, msg.playerId, msg.action, opts);
        if (Option.isNone(applied)) {
          yield* Effect.logError(`No legal action applied for ${msg.playerId}`);
          break;
        }
        current = applied.value.state;
        actionCount++;
        yield* Effect.logDebug(describeAction(applied.value.action)).pipe(
          Effect.annotateLogs("player", msg.playerId),
        );
      }

      flushEvents();
      pending = yield* schedule;
    }

    yield* Fiber.interruptAll(fibers);
    flushEvents();

    const completed = Option.isNone(current.currentHand);
    if (completed) {
      yield* Effect.logInfo(
        Option.match(current.lastResult, { onNone: () => "Hand over", onSome: (r) => r.message }),
      );
    }
    return {
      state: current,
      actionCount,
      completed,
      result: completed ? current.lastResult : Option.none(),
    };
  });

  return run.pipe(Effect.annotateLogs("hand", handNumber), Effect.withLogSpan("hand"));
}

// ---------------------------------------------------------------------------
// playHand: startNextHand + playOneHand
// ---------------------------------------------------------------------------

const resolveSession = (
  opts: PlayHandOptions,
): Effect.Effect<SessionConfig, ConfigError.ConfigError> =>
  opts.session === undefined ? SessionConfig : Effect.succeed(opts.session);

/** Start and play one hand. `eventsFrom` defaults to the events already on the table. */
function playHandWith(
  table: TableState,
  session: SessionConfig,
  opts: PlayHandOptions,
  eventsFrom: number = table.events.length,
): Effect.Effect<PlayHandResult> {
  return Effect.flatMap(startNextHand(table), (started) =>
    driveHand(started, session, opts, eventsFrom),
  );
}

export function playHand(
  table: TableState,
  opts: PlayHandOptions = {},
): Effect.Effect<PlayHandResult, ConfigError.ConfigError> {
  return Effect.flatMap(resolveSession(opts), (session) =>
    playHandWith(table, session, opts).pipe(Logger.withMinimumLogLevel(session.logLevel)),
  );
}

// ---------------------------------------------------------------------------
// playGame: multi-hand loop
// ---------------------------------------------------------------------------

export function playGame(
  table: TableState,
  opts: PlayGameOptions = {},
): Effect.Effect<PlayGameResult, ConfigError.ConfigError> {
  const maxHands = opts.maxHands ?? 10_000;
  const stopWhen = opts.stopWhen;

  return Effect.gen(function* () {
    const session = yield* resolveSession(opts);

    const loop = Effect.gen(function* () {
      let current = table;
      let handsPlayed = 0;
      // events from here on have not been reported yet
      let reported = table.events.length;

      while (handsPlayed < maxHands) {
        if (stopWhen !== undefined && stopWhen(current, handsPlayed)) break;
        if (playersWithChips(current).length < 2) break;

        const result = yield* playHandWith(current, session, opts, reported);
        current = result.state;
        reported = eventCount(current);
        handsPlayed++;
        if (!result.completed) break;

        if (opts.betweenHands !== undefined) {
          current = yield* opts.betweenHands(current, handsPlayed);
        }
      }

      if (opts.onEvent !== undefined) {
        for (const ev of current.events.slice(reported)) opts.onEvent(ev);
      }

      yield* Effect.logInfo(`Game over after ${handsPlayed} hands`);
      return { state: current, handsPlayed };
    });

    return yield* loop.pipe(Logger.withMinimumLogLevel(session.logLevel));
  });
}

// ---------------------------------------------------------------------------
// Stop conditions
// ---------------------------------------------------------------------------

export function stopAfterHands(n: number): StopCondition {
  return (_state, handsPlayed) => handsPlayed >= n;
}

export function stopWhenFewPlayers(min?: number): StopCondition {
  const threshold = min ?? 2;
  return (state) => playersWithChips(state).length < threshold;
}

/** Stop once the given player has no chips left. */
export function stopWhenBusted(playerId: PlayerId): StopCondition {
  return (state) =>
    Option.match(findPlayer(state.players, playerId), {
      onNone: () => true,
      onSome: (p) => p.chips === 0,
    });
}
