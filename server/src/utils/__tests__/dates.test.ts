import { describe, it, expect } from "vitest";

import { addDays, ageInYears, dayBucket, daysBetween, isTimeZone, localDay, parseDay, toUtcMidnight } from "../dates.js";

describe("dates", () => {
  it("parses calendar days as UTC midnight", () => {
    expect(parseDay("2024-02-29")).toEqual(new Date("2024-02-29T00:00:00.000Z"));
    expect(parseDay("2025-02-29")).toBeNull();
    expect(parseDay("2025-3-1")).toBeNull();
  });

  it("buckets and truncates in UTC", () => {
    expect(dayBucket(new Date("2025-03-10T23:59:59.000Z"))).toBe("2025-03-10");
    expect(toUtcMidnight(new Date("2025-03-10T23:59:59.000Z"))).toEqual(new Date("2025-03-10T00:00:00.000Z"));
  });

  it("counts whole days between dates", () => {
    const start = new Date("2025-03-11T00:00:00.000Z");
    expect(daysBetween(start, addDays(start, 3))).toBe(3);
    expect(daysBetween(start, new Date("2025-03-10T18:00:00.000Z"))).toBe(-1);
  });

  it("computes age in full years", () => {
    const birth = new Date("2007-06-15T00:00:00.000Z");
    expect(ageInYears(birth, new Date("2025-06-14T00:00:00.000Z"))).toBe(17);
    expect(ageInYears(birth, new Date("2025-06-15T00:00:00.000Z"))).toBe(18);
  });

  it("resolves the local calendar day of an instant", () => {
    const at = new Date("2025-12-31T22:30:00.000Z");
    expect(localDay(at, "UTC")).toEqual(new Date("2025-12-31T00:00:00.000Z"));
    expect(localDay(at, "Asia/Tokyo")).toEqual(new Date("2026-01-01T00:00:00.000Z"));
    expect(localDay(at, "America/Los_Angeles")).toEqual(new Date("2025-12-31T00:00:00.000Z"));
  });

  it("recognises IANA zone names", () => {
    expect(isTimeZone("Europe/Samara")).toBe(true);
    expect(isTimeZone("Mars/Olympus")).toBe(false);
  });
});
