/**
 * Rental x Car lockstep rules. Pure functions; the lifecycle manager applies them
 * inside a unit of work.
 */
import type { CarStatus, RentalStatus } from "./enums.js";
import { InvalidStateError } from "../utils/errors.js";
import { addMinutes } from "../utils/dates.js";

/** Car status a live rental pins its car to; null once the rental no longer holds the car. */
export function carStatusFor(rental: RentalStatus): CarStatus | null {
  switch (rental) {
    case "PENDING_PAYMENT":
      return "RESERVED";
    case "PAID":
      return "RENTED";
    case "CANCELLED":
      return null;
  }
}

export function holdsCar(rental: RentalStatus): boolean {
  return carStatusFor(rental) !== null;
}

export function isLockstep(rental: RentalStatus, car: CarStatus): boolean {
  const expected = carStatusFor(rental);
  return expected === null || expected === car;
}

export type CancelPlan =
  /** unpaid reservation: the row goes away */
  | { kind: "delete"; carStatus: "AVAILABLE" }
  /** paid rental: row stays as history */
  | { kind: "mark_cancelled"; carStatus: "AVAILABLE" }
  /** already cancelled: only the car is released */
  | { kind: "release_only"; carStatus: "AVAILABLE" };

export function planCancel(status: RentalStatus): CancelPlan {
  switch (status) {
    case "PENDING_PAYMENT":
      return { kind: "delete", carStatus: "AVAILABLE" };
    case "PAID":
      return { kind: "mark_cancelled", carStatus: "AVAILABLE" };
    case "CANCELLED":
      return { kind: "release_only", carStatus: "AVAILABLE" };
  }
}

export function assertConfirmable(status: RentalStatus): void {
  if (status !== "PENDING_PAYMENT") {
    throw new InvalidStateError(`Rental cannot be paid while ${status}`, { status });
  }
}

export function paymentDeadline(createdAt: Date, windowMinutes: number): Date {
  return addMinutes(createdAt, windowMinutes);
}

/** Expired once the deadline is strictly before `now`. */
export function isPaymentExpired(createdAt: Date, now: Date, windowMinutes: number): boolean {
  return paymentDeadline(createdAt, windowMinutes).getTime() < now.getTime();
}
