/**
 * Computer opponents' personalities.
 *
 * One trait vector covers every playing style; the named presets are just
 * constant points in that space. `currentTilt` is the only field that
 * changes during play, updated once per hand from the previous result.
 *
 * @module
 */

import { Either, Schema } from "effect";

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

const Trait = Schema.Number.pipe(Schema.between(0, 1));

export const AIProfileSchema = Schema.Struct({
  name: Schema.String,
  /** Preference for folding marginal hands. */
  tightness: Trait,
  /** Preference for betting and raising over calling. */
  aggression: Trait,
  bluffFrequency: Trait,
  /** How much seat position shifts the hand's value. */
  positionAwareness: Trait,
  /** How strongly losses feed tilt. */
  tiltSensitivity: Trait,
  foldTo3Bet: Trait,
  cbetFrequency: Trait,
  currentTilt: Trait,
});
export type AIProfile = Schema.Schema.Type<typeof AIProfileSchema>;

/** Validate a profile supplied by table setup. */
export const decodeProfile = Schema.decodeUnknownEither(AIProfileSchema);

// ---------------------------------------------------------------------------
// Presets
// ---------------------------------------------------------------------------

type PresetTraits = Omit<AIProfile, "name" | "currentTilt">;

const preset = (name: string, traits: PresetTraits): AIProfile => ({
  name,
  ...traits,
  currentTilt: 0,
});

export const PRESETS = {
  rock: preset("Rock", {
    tightness: 0.9,
    aggression: 0.8,
    bluffFrequency: 0.01,
    positionAwareness: 0.1,
    tiltSensitivity: 0.05,
    foldTo3Bet: 0.08,
    cbetFrequency: 0.8,
  }),
  maniac: preset("Maniac", {
    tightness: 0.25,
    aggression: 0.95,
    bluffFrequency: 0.6,
    positionAwareness: 0.4,
    tiltSensitivity: 0.3,
    foldTo3Bet: 0.2,
    cbetFrequency: 0.9,
  }),
  callingStation: preset("Calling Station", {
    tightness: 0.35,
    aggression: 0.15,
    bluffFrequency: 0.05,
    positionAwareness: 0.2,
    tiltSensitivity: 0.2,
    foldTo3Bet: 0.08,
    cbetFrequency: 0.25,
  }),
  fox: preset("Fox", {
    tightness: 0.55,
    aggression: 0.68,
    bluffFrequency: 0.22,
    positionAwareness: 0.8,
    tiltSensitivity: 0.15,
    foldTo3Bet: 0.52,
    cbetFrequency: 0.65,
  }),
  shark: preset("Shark", {
    tightness: 0.48,
    aggression: 0.78,
    bluffFrequency: 0.28,
    positionAwareness: 0.95,
    tiltSensitivity: 0.1,
    foldTo3Bet: 0.5,
    cbetFrequency: 0.75,
  }),
  academic: preset("Academic", {
    tightness: 0.52,
    aggression: 0.62,
    bluffFrequency: 0.25,
    positionAwareness: 0.85,
    tiltSensitivity: 0.02,
    foldTo3Bet: 0.48,
    cbetFrequency: 0.6,
  }),
  tiltDavid: preset("Tilt David", {
    tightness: 0.55,
    aggression: 0.55,
    bluffFrequency: 0.18,
    positionAwareness: 0.5,
    tiltSensitivity: 0.85,
    foldTo3Bet: 0.5,
    cbetFrequency: 0.58,
  }),
} as const satisfies Record<string, AIProfile>;

export type PresetName = keyof typeof PRESETS;

export const PRESET_NAMES = Object.keys(PRESETS).filter(
  (k): k is PresetName => k in PRESETS,
);

/** Look up a preset by name, e.g. from a roster file. */
export function presetByName(name: string): Either.Either<AIProfile, string> {
  const found = PRESET_NAMES.find((k) => k === name);
  return found === undefined
    ? Either.left(`Unknown profile preset "${name}"`)
    : Either.right(PRESETS[found]);
}

// ---------------------------------------------------------------------------
// Tilt-adjusted traits
// ---------------------------------------------------------------------------

export interface EffectiveTraits {
  readonly tightness: number;
  readonly aggression: number;
  readonly bluffFrequency: number;
}

/** Tilt loosens and heats up play. */
export function effectiveTraits(profile: AIProfile): EffectiveTraits {
  const tilt = profile.currentTilt;
  return {
    tightness: Math.max(0.05, profile.tightness - tilt * 0.4),
    aggression: Math.min(1, profile.aggression + tilt * 0.3),
    bluffFrequency: Math.min(0.8, profile.bluffFrequency + tilt * 0.25),
  };
}

// ---------------------------------------------------------------------------
// Tilt dynamics
// ---------------------------------------------------------------------------

export interface TiltConfig {
  /** A loss of this many chips adds `tiltSensitivity` to tilt. */
  readonly potScale: number;
  /** Per-hand cool-down for a player with zero sensitivity. */
  readonly decay: number;
}

export const DEFAULT_TILT_CONFIG: TiltConfig = { potScale: 800, decay: 0.03 };

export interface HandOutcome {
  readonly lost: boolean;
  readonly potSize: number;
}

/**
 * Tilt after a hand: losers heat up in proportion to the pot, everyone else
 * cools down, sensitive players more slowly.
 */
export function updateTilt(
  profile: AIProfile,
  outcome: HandOutcome,
  config: TiltConfig = DEFAULT_TILT_CONFIG,
): AIProfile {
  const sensitivity = profile.tiltSensitivity;
  const currentTilt = outcome.lost
    ? Math.min(1, profile.currentTilt + (sensitivity * outcome.potSize) / config.potScale)
    : Math.max(0, profile.currentTilt - config.decay * (1 - sensitivity * 0.5));
  return { ...profile, currentTilt };
}

export const resetTilt = (profile: AIProfile): AIProfile => ({
  ...profile,
  currentTilt: 0,
});
