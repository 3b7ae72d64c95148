export * from "./brand.js";
export * from "./card.js";
export * from "./deck.js";
export * from "./evaluator.js";
export * from "./player.js";
export * from "./action.js";
export * from "./event.js";
export * from "./error.js";
export * from "./pot.js";
export * from "./dealing.js";
export * from "./showdown.js";
export * from "./result.js";
export * from "./profile.js";
export * from "./montecarlo.js";
export * from "./decision.js";
export * from "./difficulty.js";
export * from "./position.js";
export * from "./config.js";
export * from "./tournament.js";
export * from "./cash.js";
export * from "./loop.js";

// Betting, hand and table share operation names; betting and hand keep a prefix.
export {
  type BetOutcome,
  type BettingRoundState,
  createBettingRound,
  processAction,
  postBlind,
  applyAction as bettingApplyAction,
  getLegalActions as bettingGetLegalActions,
  isRoundComplete,
  nextToAct,
} from "./betting.js";

export {
  type ForcedBets,
  type HandSetup,
  type HandState,
  type HandStatus,
  startHand,
  act as handAct,
  runOutNext as handRunOutNext,
  runOut as handRunOut,
  activePlayer as handActivePlayer,
  getLegalActions as handGetLegalActions,
  isComplete as isHandComplete,
  chipsInPlay,
} from "./hand.js";

export {
  type ActionRequest,
  type TableConfig,
  type TableState,
  createTable,
  sitDown,
  standUp,
  addChips as addTableChips,
  setForcedBets,
  startNextHand,
  act,
  tryAct,
  runOutNext,
  tryRunOutNext,
  awaitingAction,
  isRunningOut,
  getLegalActions,
  playersWithChips,
  totalChips,
} from "./table.js";
