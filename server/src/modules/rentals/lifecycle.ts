/**
 * Rental lifecycle manager: the only code that writes Rental.status or moves a car
 * between AVAILABLE, RESERVED and RENTED. Each operation is one unit of work, so the
 * car and rental writes commit together or not at all.
 */
import type { AccountDirectory, RentalRecord, RentalStore, RentalUnitOfWork } from "./store.js";
import { logger } from "../../config/logger.js";
import { CAR_STATUSES, type RentalStatus } from "../../domain/enums.js";
import type { MoneyMinor } from "../../domain/money.js";
import { assertConfirmable, planCancel } from "../../domain/rentalTransitions.js";
import { InvalidStateError, NotFoundError } from "../../utils/errors.js";

export type BookingRequest = {
  carId: string;
  startDate: Date;
  endDate: Date;
  totalPrice: MoneyMinor;
};

/** "skipped": the rental was no longer in the expected status, nothing changed. */
export type CancelOutcome = "deleted" | "cancelled" | "released" | "skipped";

export type CancelResult = { id: string; outcome: CancelOutcome };

export type CancelOptions = {
  /** Only act when the rental is still in this status (used by the sweeper). */
  expectStatus?: RentalStatus;
};

export interface RentalLifecycle {
  createRental(request: BookingRequest, requesterIdentity: string): Promise<RentalRecord>;
  confirmPayment(rentalId: string): Promise<RentalRecord>;
  cancelRental(rentalId: string, opts?: CancelOptions): Promise<CancelResult>;
}

async function releaseCar(uow: RentalUnitOfWork, carId: string, rentalId: string) {
  const released = await uow.transitionCar(carId, CAR_STATUSES, "AVAILABLE");
  if (!released) logger.warn("rental.car_missing", { rentalId, carId });
}

export function createRentalLifecycle(deps: {
  store: RentalStore;
  accounts: AccountDirectory;
  now?: () => Date;
}): RentalLifecycle {
  const { store, accounts } = deps;
  const now = deps.now ?? (() => new Date());

  async function createRental(request: BookingRequest, requesterIdentity: string) {
    const account = await accounts.findAccount(requesterIdentity);
    if (!account) throw new NotFoundError("Account not found", "ACCOUNT_NOT_FOUND");

    const rental = await store.transaction(async (uow) => {
      const car = await uow.getCar(request.carId);
      if (!car) throw new NotFoundError("Car not found", "CAR_NOT_FOUND");

      // CAS: of two concurrent creates on one car only the first flips it
      const reserved = await uow.transitionCar(car.id, ["AVAILABLE"], "RESERVED");
      if (!reserved) {
        throw new InvalidStateError("Car is not available", { carId: car.id, status: car.status });
      }

      return uow.insertRental({
        clientId: account.id,
        carId: car.id,
        startDate: request.startDate,
        endDate: request.endDate,
        totalPrice: request.totalPrice,
        status: "PENDING_PAYMENT",
        createdAt: now(),
      });
    });

    logger.info("rental.created", { rentalId: rental.id, carId: rental.carId, clientId: rental.clientId });
    return rental;
  }

  async function confirmPayment(rentalId: string) {
    const paid = await store.transaction(async (uow) => {
      const rental = await uow.getRental(rentalId);
      if (!rental) throw new NotFoundError("Rental not found", "RENTAL_NOT_FOUND");
      assertConfirmable(rental.status);

      const updated = await uow.transitionRental(rental.id, "PENDING_PAYMENT", "PAID");
      if (!updated) throw new InvalidStateError("Rental is no longer awaiting payment", { rentalId });

      const rented = await uow.transitionCar(rental.carId, ["RESERVED"], "RENTED");
      if (!rented) {
        throw new InvalidStateError("Car is not reserved for this rental", { rentalId, carId: rental.carId });
      }
      return updated;
    });

    logger.info("rental.paid", { rentalId: paid.id, carId: paid.carId });
    return paid;
  }

  async function cancelRental(rentalId: string, opts: CancelOptions = {}): Promise<CancelResult> {
    const result = await store.transaction(async (uow): Promise<CancelResult> => {
      const rental = await uow.getRental(rentalId);
      if (!rental) throw new NotFoundError("Rental not found", "RENTAL_NOT_FOUND");
      if (opts.expectStatus && rental.status !== opts.expectStatus) {
        return { id: rental.id, outcome: "skipped" };
      }

      const plan = planCancel(rental.status);
      switch (plan.kind) {
        case "delete": {
          if (!(await uow.deleteRental(rental.id, "PENDING_PAYMENT"))) {
            // paid or removed since it was read
            if (opts.expectStatus) return { id: rental.id, outcome: "skipped" };
            if (!(await uow.getRental(rental.id))) throw new NotFoundError("Rental not found", "RENTAL_NOT_FOUND");
            throw new InvalidStateError("Rental changed while cancelling", { rentalId });
          }
          await releaseCar(uow, rental.carId, rental.id);
          return { id: rental.id, outcome: "deleted" };
        }
        case "mark_cancelled": {
          const cancelled = await uow.transitionRental(rental.id, "PAID", "CANCELLED");
          if (!cancelled) throw new InvalidStateError("Rental changed while cancelling", { rentalId });
          await releaseCar(uow, rental.carId, rental.id);
          return { id: rental.id, outcome: "cancelled" };
        }
        case "release_only": {
          // a newer rental may hold the car by now; leave it alone then
          const holders = await uow.countLiveRentalsForCar(rental.carId, rental.id);
          logger.warn("rental.cancel_repeated", { rentalId: rental.id, carId: rental.carId, holders });
          if (holders === 0) await releaseCar(uow, rental.carId, rental.id);
          return { id: rental.id, outcome: "released" };
        }
      }
    });

    if (result.outcome === "deleted") logger.info("rental.deleted", { rentalId: result.id });
    if (result.outcome === "cancelled") logger.info("rental.cancelled", { rentalId: result.id });
    return result;
  }

  return { createRental, confirmPayment, cancelRental };
}
