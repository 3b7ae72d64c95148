/**
 * Difficulty levels for the computer players.
 *
 * A level sets how often a bot makes a random mistake, how many Monte Carlo
 * trials back its equity estimate and which personalities may be seated.
 *
 * @module
 */

import { Either, Schema } from "effect";

import type { Street } from "./dealing.js";
import type { DecisionConfig } from "./decision.js";
import { DEFAULT_DECISION_CONFIG } from "./decision.js";
import type { PresetName } from "./profile.js";
import { PRESET_NAMES } from "./profile.js";

export const DifficultySchema = Schema.Literal("Easy", "Medium", "Hard", "Expert");
export type Difficulty = typeof DifficultySchema.Type;

export interface DifficultySettings {
  readonly mistakeRate: number;
  readonly equityIterations: number;
  /** Personalities a table at this level draws its bots from. */
  readonly profiles: readonly PresetName[];
}

const EXPLOITABLE: readonly PresetName[] = ["callingStation", "maniac", "tiltDavid"];

export const DIFFICULTIES: Record<Difficulty, DifficultySettings> = {
  Easy: { mistakeRate: 0.25, equityIterations: 100, profiles: EXPLOITABLE },
  Medium: { mistakeRate: 0.1, equityIterations: 300, profiles: [...EXPLOITABLE, "rock"] },
  Hard: { mistakeRate: 0.03, equityIterations: 500, profiles: [...EXPLOITABLE, "rock", "fox"] },
  Expert: { mistakeRate: 0, equityIterations: 1000, profiles: PRESET_NAMES },
};

export const decodeDifficulty = Schema.decodeUnknownEither(DifficultySchema);

/** Parse a level name such as "hard", ignoring case. */
export function parseDifficulty(input: string): Either.Either<Difficulty, string> {
  const name = input.charAt(0).toUpperCase() + input.slice(1).toLowerCase();
  return Either.mapLeft(decodeDifficulty(name), () => `Unknown difficulty "${input}"`);
}

/** Trials per estimate. The river has nothing left to deal to the board, so half. */
export function equityIterationsFor(difficulty: Difficulty, street: Street): number {
  const base = DIFFICULTIES[difficulty].equityIterations;
  return street === "River" ? Math.floor(base / 2) : base;
}

export function decisionConfigFor(
  difficulty: Difficulty,
  base: DecisionConfig = DEFAULT_DECISION_CONFIG,
): DecisionConfig {
  return { ...base, mistakeRate: DIFFICULTIES[difficulty].mistakeRate };
}
