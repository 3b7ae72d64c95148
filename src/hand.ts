/**
 * One hand of Hold'em, from forced bets to settlement.
 *
 * - `startHand` is effectful (it shuffles unless given a deck).
 * - `act` and `runOutNext` are pure and return `Either`.
 *
 * A hand is `Betting` while it waits on `toAct`, `RunningOut` once fewer
 * than two players can still bet but several are still live (each call to
 * `runOutNext` deals one more street), and `Complete` once settled.
 *
 * @module
 */

import { Effect, Either, Option } from "effect";

import type { Chips, PlayerId, SeatIndex } from "./brand.js";
import { ZERO_CHIPS, sumChips } from "./brand.js";
import type { Card } from "./card.js";
import type { Deck } from "./deck.js";
import { shuffled } from "./deck.js";
import type { Player } from "./player.js";
import {
  canAct,
  clockwiseAfter,
  collectBet,
  findPlayer,
  isInHand,
  isLive,
  postAnte,
  replacePlayer,
  settleElimination,
} from "./player.js";
import type { Action, LegalActions } from "./action.js";
import type { Street } from "./dealing.js";
import { dealHoleCards, dealNextStreet } from "./dealing.js";
import type { BettingRoundState } from "./betting.js";
import {
  applyAction,
  createBettingRound,
  getLegalActions as roundLegalActions,
  isRoundComplete,
  nextToAct,
  postBlind,
} from "./betting.js";
import type { Pot } from "./pot.js";
import { addToPot, buildPots, contributionsOf, emptyPot } from "./pot.js";
import type { Settlement } from "./showdown.js";
import { settleShowdown, settleUncontested } from "./showdown.js";
import type { ActionLogEntry, HandResult } from "./result.js";
import type { GameEvent, Post } from "./event.js";
import {
  ActionRequested,
  BettingRoundEnded,
  CommunityCardsDealt,
  ForcedBetsPosted,
  HandEnded,
  HandStarted,
  HoleCardsDealt,
  PlayerActed,
  PlayerEliminated,
  PotAwarded,
  RunOutStarted,
  ShowdownStarted,
} from "./event.js";
import type { DeckExhausted, PokerError } from "./error.js";
import {
  InvalidGameState,
  NotEnoughPlayers,
  NotPlayersTurn,
  PlayerNotFound,
} from "./error.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ForcedBets {
  readonly smallBlind: Chips;
  readonly bigBlind: Chips;
  readonly ante?: Chips;
}

export type HandStatus = "Betting" | "RunningOut" | "Complete";

export interface HandState {
  readonly handNumber: number;
  readonly status: HandStatus;
  readonly street: Street;
  /** Every seated player, including those sitting the hand out. */
  readonly players: readonly Player[];
  readonly communityCards: readonly Card[];
  readonly deck: Deck;
  /** Running total while betting; split into tranches at settlement. */
  readonly pot: Pot;
  readonly betting: BettingRoundState;
  readonly toAct: Option.Option<PlayerId>;
  readonly dealerSeat: SeatIndex;
  readonly smallBlindSeat: SeatIndex;
  readonly bigBlindSeat: SeatIndex;
  readonly forcedBets: ForcedBets;
  /** Last player to make a full raise preflop. */
  readonly preflopAggressor: Option.Option<PlayerId>;
  readonly actionLog: readonly ActionLogEntry[];
  readonly events: readonly GameEvent[];
  readonly result: Option.Option<HandResult>;
}

export interface HandSetup {
  readonly handNumber: number;
  /** Per-hand fields already reset; eliminated players sit out. */
  readonly players: readonly Player[];
  readonly dealerSeat: SeatIndex;
  readonly forcedBets: ForcedBets;
  /** A prearranged deck; shuffled when absent. */
  readonly deck?: Deck;
}

type Step = Either.Either<HandState, DeckExhausted | InvalidGameState>;

// ---------------------------------------------------------------------------
// startHand
// ---------------------------------------------------------------------------

/**
 * Post antes and blinds, deal hole cards and open preflop betting.
 *
 * Heads-up the dealer posts the small blind. Preflop action starts left of
 * the big blind, which heads-up is the dealer.
 */
export function startHand(
  setup: HandSetup,
): Effect.Effect<HandState, NotEnoughPlayers | DeckExhausted | InvalidGameState> {
  return Effect.gen(function* () {
    const seated = setup.players.filter(isInHand);
    if (seated.length < 2) {
      return yield* Effect.fail(
        new NotEnoughPlayers({ count: seated.length, minimum: 2 }),
      );
    }
    const deck = setup.deck ?? (yield* shuffled);
    return yield* dealHand(setup, deck);
  });
}

function seatAfter(
  players: readonly Player[],
  seat: SeatIndex,
): Either.Either<Player, InvalidGameState> {
  const [next] = clockwiseAfter(players, seat);
  return next === undefined
    ? Either.left(new InvalidGameState({ state: "startHand", reason: "No players seated" }))
    : Either.right(next);
}

function dealHand(setup: HandSetup, deck: Deck): Step {
  const { forcedBets, handNumber } = setup;
  const seated = setup.players.filter(isInHand);

  return Either.gen(function* () {
    const dealer =
      seated.find((p) => p.seatIndex === setup.dealerSeat) ??
      (yield* seatAfter(seated, setup.dealerSeat));
    const smallBlind =
      seated.length === 2 ? dealer : yield* seatAfter(seated, dealer.seatIndex);
    const bigBlind = yield* seatAfter(seated, smallBlind.seatIndex);

    let players = setup.players;
    let pot = emptyPot;

    const antes: Post[] = [];
    const ante = forcedBets.ante ?? ZERO_CHIPS;
    if (ante > 0) {
      for (const p of seated) {
        const after = postAnte(p, ante);
        const paid = after.totalBetThisHand;
        antes.push({ playerId: p.id, amount: paid });
        pot = addToPot(pot, paid);
        players = replacePlayer(players, after);
      }
    }

    const post = (id: PlayerId, amount: Chips): Post => {
      const current = players.find((p) => p.id === id);
      if (current === undefined) return { playerId: id, amount: ZERO_CHIPS };
      const posted = postBlind(current, amount);
      players = replacePlayer(players, posted.player);
      pot = addToPot(pot, posted.posted);
      return { playerId: id, amount: posted.posted };
    };
    const sbPost = post(smallBlind.id, forcedBets.smallBlind);
    const bbPost = post(bigBlind.id, forcedBets.bigBlind);

    const [dealt, rest] = yield* dealHoleCards(deck, players, dealer.seatIndex);
    const dealtTo = clockwiseAfter(dealt.filter(isInHand), dealer.seatIndex);

    const state: HandState = {
      handNumber,
      status: "Betting",
      street: "Preflop",
      players: dealt,
      communityCards: [],
      deck: rest,
      pot,
      betting: createBettingRound("Preflop", forcedBets.bigBlind, forcedBets.bigBlind),
      toAct: Option.none(),
      dealerSeat: dealer.seatIndex,
      smallBlindSeat: smallBlind.seatIndex,
      bigBlindSeat: bigBlind.seatIndex,
      forcedBets,
      preflopAggressor: Option.none(),
      actionLog: [],
      events: [
        HandStarted(handNumber, dealer.id, dealtTo.map((p) => p.id)),
        ForcedBetsPosted(sbPost, bbPost, antes),
        ...dealtTo.map((p) => HoleCardsDealt(p.id)),
      ],
      result: Option.none(),
    };

    return yield* continueFrom(state, bigBlind.seatIndex);
  });
}

// ---------------------------------------------------------------------------
// Turn sequencing
// ---------------------------------------------------------------------------

/** Hand the turn to the next player after `seat`, or close the street. */
function continueFrom(state: HandState, seat: SeatIndex): Step {
  if (isRoundComplete(state.betting, state.players)) return endStreet(state);
  const next = nextToAct(state.betting, state.players, seat);
  if (Option.isNone(next)) return endStreet(state);
  return Either.right({
    ...state,
    toAct: Option.some(next.value.id),
    events: [...state.events, ActionRequested(state.handNumber, next.value.id)],
  });
}

function endStreet(state: HandState): Step {
  const closed: HandState = {
    ...state,
    players: state.players.map(collectBet),
    toAct: Option.none(),
    events: [...state.events, BettingRoundEnded(state.street)],
  };

  if (state.street === "River") return Either.right(showdown(closed));

  if (closed.players.filter(canAct).length < 2) {
    return Either.right({
      ...closed,
      status: "RunningOut",
      events: [...closed.events, RunOutStarted(closed.street)],
    });
  }

  return Either.flatMap(dealStreet(closed), (dealt) =>
    continueFrom(
      {
        ...dealt,
        betting: createBettingRound(dealt.street, ZERO_CHIPS, state.forcedBets.bigBlind),
      },
      state.dealerSeat,
    ),
  );
}

function dealStreet(state: HandState): Step {
  return Either.map(
    dealNextStreet(state.deck, state.communityCards, state.street),
    (deal) => ({
      ...state,
      street: deal.street,
      communityCards: deal.communityCards,
      deck: deal.deck,
      events: [...state.events, CommunityCardsDealt(deal.dealt, deal.street)],
    }),
  );
}

// ---------------------------------------------------------------------------
// act
// ---------------------------------------------------------------------------

/**
 * Apply `action` for `playerId`.
 *
 * Fails without changing anything when the hand is not taking actions, it
 * is not this player's turn, or the rules forbid the action.
 */
export function act(
  state: HandState,
  playerId: PlayerId,
  action: Action,
): Either.Either<HandState, PokerError> {
  if (state.status !== "Betting") {
    return Either.left(
      new InvalidGameState({ state: state.status, reason: "Hand is not taking actions" }),
    );
  }
  if (!Option.exists(state.toAct, (id) => id === playerId)) {
    return Either.left(
      new NotPlayersTurn({ playerId, expected: Option.getOrUndefined(state.toAct) }),
    );
  }
  const found = findPlayer(state.players, playerId);
  if (Option.isNone(found)) return Either.left(new PlayerNotFound({ playerId }));
  const player = found.value;

  return Either.flatMap(applyAction(state.betting, player, action), ({ round, outcome }) => {
    const players = replacePlayer(state.players, outcome.player);
    const entry: ActionLogEntry = {
      playerId,
      action: outcome.applied,
      amount: outcome.potDelta,
      street: state.street,
      voluntary: outcome.voluntary,
    };
    const next: HandState = {
      ...state,
      players,
      pot: addToPot(state.pot, outcome.potDelta),
      betting: round,
      toAct: Option.none(),
      preflopAggressor:
        state.street === "Preflop" && outcome.isNewRaiser
          ? Option.some(playerId)
          : state.preflopAggressor,
      actionLog: [...state.actionLog, entry],
      events: [
        ...state.events,
        PlayerActed(playerId, outcome.applied, outcome.potDelta, state.street),
      ],
    };

    const live = players.filter(isLive);
    const [survivor] = live;
    if (live.length === 1 && survivor !== undefined) {
      return Either.right(finishUncontested(next, survivor));
    }
    return continueFrom(next, player.seatIndex);
  });
}

// ---------------------------------------------------------------------------
// Run-out
// ---------------------------------------------------------------------------

/**
 * Deal the next street of a hand that is running out. Dealing the river
 * goes straight to showdown.
 */
export function runOutNext(state: HandState): Step {
  if (state.status !== "RunningOut") {
    return Either.left(
      new InvalidGameState({ state: state.status, reason: "Hand is not running out" }),
    );
  }
  if (state.street === "River") return Either.right(showdown(state));
  return Either.map(dealStreet(state), (dealt) =>
    dealt.street === "River" ? showdown(dealt) : dealt,
  );
}

/** Deal every remaining street at once. For callers that do not pace. */
export function runOut(state: HandState): Step {
  let current: Step = Either.right(state);
  while (Either.isRight(current) && current.right.status === "RunningOut") {
    current = runOutNext(current.right);
  }
  return current;
}

// ---------------------------------------------------------------------------
// Settlement
// ---------------------------------------------------------------------------

function finalPot(state: HandState): Pot {
  return buildPots(contributionsOf(state.players));
}

function finishUncontested(state: HandState, winner: Player): HandState {
  const players = state.players.map(collectBet);
  const pot = finalPot(state);
  return complete({ ...state, players }, settleUncontested(players, winner, pot), pot);
}

function showdown(state: HandState): HandState {
  const pot = finalPot(state);
  const settlement = settleShowdown({
    players: state.players,
    communityCards: state.communityCards,
    pot,
    dealerSeat: state.dealerSeat,
  });
  return complete(
    { ...state, events: [...state.events, ShowdownStarted] },
    settlement,
    pot,
  );
}

function complete(state: HandState, settlement: Settlement, pot: Pot): HandState {
  const players = settlement.players.map(settleElimination);
  const busted = players.filter(
    (p) =>
      p.status === "Eliminated" &&
      state.players.some((before) => before.id === p.id && before.status !== "Eliminated"),
  );
  const result: HandResult = {
    handNumber: state.handNumber,
    winnerIds: settlement.winnerIds,
    message: settlement.message,
    loserIds: settlement.loserIds,
    totalPot: pot.total,
    awards: settlement.awards,
    revealed: settlement.revealed,
    actionLog: state.actionLog,
  };
  return {
    ...state,
    status: "Complete",
    players,
    pot,
    toAct: Option.none(),
    result: Option.some(result),
    events: [
      ...state.events,
      ...settlement.awards.map((a) => PotAwarded(a.playerId, a.amount, a.potIndex)),
      ...busted.map((p) => PlayerEliminated(p.id)),
      HandEnded(result),
    ],
  };
}

// ---------------------------------------------------------------------------
// Queries
// ---------------------------------------------------------------------------

export function activePlayer(state: HandState): Option.Option<Player> {
  return Option.flatMap(state.toAct, (id) => findPlayer(state.players, id));
}

export function getLegalActions(state: HandState): Option.Option<LegalActions> {
  return Option.map(activePlayer(state), (p) => roundLegalActions(state.betting, p));
}

export const isComplete = (state: HandState): boolean => state.status === "Complete";

/** Stacks plus pot. Constant from the first forced bet to settlement. */
export function chipsInPlay(state: HandState): Chips {
  const stacks = sumChips(state.players.map((p) => p.chips));
  return state.status === "Complete" ? stacks : sumChips([stacks, state.pot.total]);
}
