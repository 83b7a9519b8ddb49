/**
 * Booking request validation, run by the HTTP layer before createRental.
 * The lifecycle manager trusts the quote and does not re-check dates.
 */
import type { CarSnapshot } from "./store.js";
import { timesMinor, type MoneyMinor } from "../../domain/money.js";
import { InvalidStateError, ValidationError } from "../../utils/errors.js";
import { addDays, daysBetween, localDay, parseDay } from "../../utils/dates.js";

export type BookingQuote = {
  carId: string;
  startDate: Date;
  endDate: Date;
  days: number;
  totalPrice: MoneyMinor;
};

export function quoteBooking(input: {
  car: CarSnapshot;
  startDate: string;
  endDate: string;
  now: Date;
  /** zone that decides which day is "today"; the server's when omitted */
  timeZone?: string;
}): BookingQuote {
  const start = parseDay(input.startDate);
  const end = parseDay(input.endDate);
  if (!start || !end) {
    throw new ValidationError("Dates must be YYYY-MM-DD", "INVALID_DATE", {
      startDate: input.startDate,
      endDate: input.endDate,
    });
  }

  const tomorrow = addDays(localDay(input.now, input.timeZone), 1);
  if (start.getTime() !== tomorrow.getTime()) {
    throw new ValidationError("Rental can only start tomorrow", "INVALID_START_DATE", {
      expected: tomorrow.toISOString().slice(0, 10),
    });
  }

  const days = daysBetween(start, end);
  if (days <= 0) {
    throw new ValidationError("End date must be after start date", "INVALID_END_DATE");
  }

  if (input.car.status !== "AVAILABLE") {
    throw new InvalidStateError("Car is not available", { carId: input.car.id, status: input.car.status });
  }

  return {
    carId: input.car.id,
    startDate: start,
    endDate: end,
    days,
    totalPrice: timesMinor(input.car.pricePerDay, days),
  };
}
