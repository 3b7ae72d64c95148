/**
 * Branded primitives shared by every Hold'em module.
 *
 * Chip counts, seats and player identities are all plain values at runtime;
 * the brands keep them from being mixed up at compile time.
 *
 * @module
 */

import { Brand, Schema } from "effect";

// ---------------------------------------------------------------------------
// Chips
// ---------------------------------------------------------------------------

/** A non-negative integer chip count. */
export type Chips = number & Brand.Brand<"Chips">;

/**
 * Runtime constructor for {@link Chips}.
 *
 * Throws a `BrandError` when the value is negative or fractional.
 */
export const Chips = Brand.refined<Chips>(
  (n) => Number.isInteger(n) && n >= 0,
  (n) => Brand.error(`Expected ${n} to be a non-negative integer`),
);

export const ChipsSchema = Schema.Number.pipe(
  Schema.int(),
  Schema.nonNegative(),
  Schema.fromBrand(Chips),
);

export const ZERO_CHIPS: Chips = Chips(0);

// ---------------------------------------------------------------------------
// Chips arithmetic
// ---------------------------------------------------------------------------

export const addChips = (a: Chips, b: Chips): Chips => Chips(a + b);

/**
 * Subtract `b` from `a`, clamping at zero.
 *
 * Bets larger than a stack are capped rather than driving it negative, so
 * callers can subtract freely.
 */
export const subtractChips = (a: Chips, b: Chips): Chips =>
  Chips(Math.max(0, a - b));

export const minChips = (a: Chips, b: Chips): Chips => (a <= b ? a : b);

export const maxChips = (a: Chips, b: Chips): Chips => (a >= b ? a : b);

/** Sum a list of chip amounts. */
export const sumChips = (amounts: Iterable<Chips>): Chips => {
  let total = 0;
  for (const a of amounts) total += a;
  return Chips(total);
};


// ---------------------------------------------------------------------------
// SeatIndex
// ---------------------------------------------------------------------------

/** Maximum valid seat index (inclusive). Tables seat at most ten players. */
export const MAX_SEAT = 9;

/** A seat index in the range `[0, 9]`. */
export type SeatIndex = number & Brand.Brand<"SeatIndex">;

export const SeatIndex = Brand.refined<SeatIndex>(
  (n) => Number.isInteger(n) && n >= 0 && n <= MAX_SEAT,
  (n) => Brand.error(`Expected ${n} to be an integer in [0, ${MAX_SEAT}]`),
);

// ---------------------------------------------------------------------------
// PlayerId
// ---------------------------------------------------------------------------

/**
 * Stable identity of a player across hands.
 *
 * Nominal brand only: any string supplied by table setup is accepted.
 */
export type PlayerId = string & Brand.Brand<"PlayerId">;

export const PlayerId = Brand.nominal<PlayerId>();
