import { describe, it, expect } from "vitest";

import { InvalidStateError, ValidationError } from "../../../utils/errors.js";
import { quoteBooking } from "../booking.js";
import type { CarSnapshot } from "../store.js";

// late evening in UTC: "tomorrow" is still the 11th there
const now = new Date("2025-03-10T23:30:00.000Z");
const car: CarSnapshot = { id: "car-1", status: "AVAILABLE", pricePerDay: 100_000 };

describe("quoteBooking", () => {
  it("prices whole days from tomorrow", () => {
    const quote = quoteBooking({ car, startDate: "2025-03-11", endDate: "2025-03-14", now, timeZone: "UTC" });

    expect(quote).toEqual({
      carId: "car-1",
      startDate: new Date("2025-03-11T00:00:00.000Z"),
      endDate: new Date("2025-03-14T00:00:00.000Z"),
      days: 3,
      totalPrice: 300_000,
    });
  });

  it("crosses a month boundary", () => {
    const quote = quoteBooking({
      car,
      startDate: "2025-03-01",
      endDate: "2025-03-02",
      now: new Date("2025-02-28T08:00:00.000Z"),
      timeZone: "UTC",
    });
    expect(quote.days).toBe(1);
    expect(quote.totalPrice).toBe(100_000);
  });

  it.each(["2025-03-10", "2025-03-12"])("rejects start date %s", (startDate) => {
    expect(() => quoteBooking({ car, startDate, endDate: "2025-03-20", now, timeZone: "UTC" })).toThrow(
      "Rental can only start tomorrow"
    );
  });

  it.each(["2025-03-11", "2025-03-09"])("rejects end date %s", (endDate) => {
    expect(() => quoteBooking({ car, startDate: "2025-03-11", endDate, now, timeZone: "UTC" })).toThrow(
      "End date must be after start date"
    );
  });

  it("rejects malformed dates", () => {
    expect(() => quoteBooking({ car, startDate: "11.03.2025", endDate: "2025-03-14", now, timeZone: "UTC" })).toThrow(
      ValidationError
    );
    expect(() => quoteBooking({ car, startDate: "2025-02-30", endDate: "2025-03-14", now, timeZone: "UTC" })).toThrow(
      ValidationError
    );
  });

  it("rejects a car that is not AVAILABLE", () => {
    expect(() =>
      quoteBooking({ car: { ...car, status: "RESERVED" }, startDate: "2025-03-11", endDate: "2025-03-12", now, timeZone: "UTC" })
    ).toThrow(InvalidStateError);
  });

  describe("server time zone", () => {
    // 01:00 on the 11th in Samara (UTC+4) while UTC is still on the 10th
    const lateUtc = new Date("2025-03-10T21:00:00.000Z");

    it("takes tomorrow from the local calendar day", () => {
      const quote = quoteBooking({
        car,
        startDate: "2025-03-12",
        endDate: "2025-03-13",
        now: lateUtc,
        timeZone: "Europe/Samara",
      });
      expect(quote.startDate).toEqual(new Date("2025-03-12T00:00:00.000Z"));
      expect(quote.days).toBe(1);
    });

    it("rejects what is already today locally", () => {
      expect(() =>
        quoteBooking({ car, startDate: "2025-03-11", endDate: "2025-03-13", now: lateUtc, timeZone: "Europe/Samara" })
      ).toThrow("Rental can only start tomorrow");
    });

    it("looks back for zones west of UTC", () => {
      // 20:00 on the 10th in New York while UTC is already on the 11th
      const earlyUtc = new Date("2025-03-11T00:00:00.000Z");
      const quote = quoteBooking({
        car,
        startDate: "2025-03-11",
        endDate: "2025-03-12",
        now: earlyUtc,
        timeZone: "America/New_York",
      });
      expect(quote.startDate).toEqual(new Date("2025-03-11T00:00:00.000Z"));
    });
  });
});
