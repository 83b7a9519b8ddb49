import { describe, it, expect } from "vitest";

import { assertNonNegativeMinor, formatMoney, timesMinor, toMinor, toWholeMajor } from "../money.js";

describe("money", () => {
  it("converts major to minor units", () => {
    expect(toMinor(1000)).toBe(100_000);
    expect(toMinor(19.99)).toBe(1999);
    expect(() => toMinor(Number.NaN)).toThrow("Invalid money input");
  });

  it("truncates minor units to whole major units", () => {
    expect(toWholeMajor(100_099)).toBe(1000);
    expect(toWholeMajor(99)).toBe(0);
  });

  it("multiplies by whole counts only", () => {
    expect(timesMinor(100_000, 3)).toBe(300_000);
    expect(() => timesMinor(100, 1.5)).toThrow("Invalid count");
    expect(() => timesMinor(Number.MAX_SAFE_INTEGER, 2)).toThrow("Amount overflow");
  });

  it("guards non-negative integers", () => {
    expect(() => assertNonNegativeMinor(0)).not.toThrow();
    expect(() => assertNonNegativeMinor(-1, "price")).toThrow("price cannot be negative");
    expect(() => assertNonNegativeMinor(1.5)).toThrow("amount must be an integer amount of minor units");
  });

  it("formats with currency and locale", () => {
    expect(formatMoney(123_456, "USD", "en-US")).toBe("$1,234.56");
  });
});
