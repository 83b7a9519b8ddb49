/**
 * Persistence seam for the rental lifecycle. Every lifecycle operation runs inside
 * one `transaction` and sees the store only through a unit of work, so the Mongo
 * implementation and the in-memory one used by tests enforce the same rules.
 */
import type { CarStatus, RentalStatus } from "../../domain/enums.js";
import type { MoneyMinor } from "../../domain/money.js";

export type CarSnapshot = {
  id: string;
  status: CarStatus;
  pricePerDay: MoneyMinor;
};

export type RentalRecord = {
  id: string;
  clientId: string;
  carId: string;
  startDate: Date;
  endDate: Date;
  totalPrice: MoneyMinor;
  status: RentalStatus;
  createdAt: Date;
};

export type NewRental = Omit<RentalRecord, "id">;

export interface RentalUnitOfWork {
  getCar(carId: string): Promise<CarSnapshot | null>;
  /** Compare-and-set: false when the car is missing or not in one of `from`. */
  transitionCar(carId: string, from: readonly CarStatus[], to: CarStatus): Promise<boolean>;
  insertRental(input: NewRental): Promise<RentalRecord>;
  getRental(rentalId: string): Promise<RentalRecord | null>;
  /** Compare-and-set on the rental status; null when the rental is missing or not in `from`. */
  transitionRental(rentalId: string, from: RentalStatus, to: RentalStatus): Promise<RentalRecord | null>;
  /** Deletes only while the rental is still in `status`. */
  deleteRental(rentalId: string, status: RentalStatus): Promise<boolean>;
  /** Rentals still holding the car (PENDING_PAYMENT or PAID), optionally ignoring one. */
  countLiveRentalsForCar(carId: string, exceptRentalId?: string): Promise<number>;
}

export interface RentalStore {
  /** Runs `work` atomically; any throw rolls back every write made through the unit of work. */
  transaction<T>(work: (uow: RentalUnitOfWork) => Promise<T>): Promise<T>;
  listPendingPayment(): Promise<Array<Pick<RentalRecord, "id" | "createdAt">>>;
}

/** Resolves the requester's login identity to a stored account. */
export interface AccountDirectory {
  findAccount(identity: string): Promise<{ id: string } | null>;
}
