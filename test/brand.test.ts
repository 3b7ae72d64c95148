import { describe, it, expect } from "vitest";
import { Either, Schema } from "effect";
import {
  Chips,
  ChipsSchema,
  PlayerId,
  SeatIndex,
  maxChips,
  minChips,
  subtractChips,
  sumChips,
} from "../src/brand.js";

describe("Chips", () => {
  it("accepts non-negative integers", () => {
    expect(Chips(0)).toBe(0);
    expect(Chips(999999)).toBe(999999);
  });

  it("rejects negatives, fractions and NaN", () => {
    expect(() => Chips(-1)).toThrow();
    expect(() => Chips(1.5)).toThrow();
    expect(() => Chips(NaN)).toThrow();
  });

  it("ChipsSchema decodes unknown input", () => {
    const decode = Schema.decodeUnknownEither(ChipsSchema);
    expect(decode(250)).toEqual(Either.right(250));
    expect(Either.isLeft(decode(-5))).toBe(true);
    expect(Either.isLeft(decode("250"))).toBe(true);
  });
});

describe("Chips arithmetic", () => {
  it("subtractChips clamps at zero", () => {
    expect(subtractChips(Chips(30), Chips(50))).toBe(0);
    expect(subtractChips(Chips(50), Chips(30))).toBe(20);
  });

  it("min, max and sum", () => {
    expect(minChips(Chips(3), Chips(7))).toBe(3);
    expect(maxChips(Chips(3), Chips(7))).toBe(7);
    expect(sumChips([Chips(5), Chips(10), Chips(20)])).toBe(35);
    expect(sumChips([])).toBe(0);
  });
});

describe("SeatIndex", () => {
  it("accepts 0 through 9", () => {
    for (let i = 0; i <= 9; i++) expect(SeatIndex(i)).toBe(i);
  });

  it("rejects out-of-range and fractional seats", () => {
    expect(() => SeatIndex(10)).toThrow();
    expect(() => SeatIndex(-1)).toThrow();
    expect(() => SeatIndex(0.5)).toThrow();
  });

  it("option gives none for a bad seat", () => {
    expect(SeatIndex.option(4)._tag).toBe("Some");
    expect(SeatIndex.option(12)._tag).toBe("None");
  });
});

describe("PlayerId", () => {
  it("accepts any string", () => {
    expect(PlayerId("entrant-3")).toBe("entrant-3");
  });
});
