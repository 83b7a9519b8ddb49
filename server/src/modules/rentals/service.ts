/** HTTP-facing rental operations: ownership checks and joins around the lifecycle manager. */
import mongoose from "mongoose";

import { quoteBooking } from "./booking.js";
import type { CancelResult } from "./lifecycle.js";
import { Rental } from "./model.js";
import { toRentalRecord } from "./mongoStore.js";
import { filterAdminRentals, sortAdminRentals, type AdminRentalRow } from "./query.js";
import { rentalLifecycle } from "./runtime.js";
import type { AdminRentalsQuery, CreateRentalInput } from "./schemas.js";
import type { RentalRecord } from "./store.js";
import { connectMongo } from "../../config/db.js";
import { env } from "../../config/env.js";
import type { Role } from "../../domain/enums.js";
import { paymentDeadline } from "../../domain/rentalTransitions.js";
import { NotFoundError } from "../../utils/errors.js";
import { Car } from "../cars/model.js";
import type { CarView } from "../cars/query.js";
import { toCarViews } from "../cars/service.js";
import { User } from "../users/model.js";

export type Actor = { userId: string; role: Role };

export type RentalView = RentalRecord & {
  car: CarView | null;
  /** only while PENDING_PAYMENT */
  payBy: Date | null;
};

async function withCars(rentals: RentalRecord[]): Promise<RentalView[]> {
  const carIds = [...new Set(rentals.map((r) => r.carId))];
  const cars = await toCarViews(await Car.find({ _id: { $in: carIds } }).lean());
  const byId = new Map(cars.map((c) => [c.id, c]));
  return rentals.map((r) => ({
    ...r,
    car: byId.get(r.carId) ?? null,
    payBy: r.status === "PENDING_PAYMENT" ? paymentDeadline(r.createdAt, env.RENTAL_PAYMENT_WINDOW_MINUTES) : null,
  }));
}

/** Another user's rental reads as missing. */
async function loadVisibleRental(rentalId: string, actor: Actor, opts: { ownerOnly: boolean }) {
  await connectMongo();
  const doc = mongoose.isValidObjectId(rentalId) ? await Rental.findById(rentalId).lean() : null;
  if (!doc) throw new NotFoundError("Rental not found", "RENTAL_NOT_FOUND");
  const rental = toRentalRecord(doc);
  const isOwner = rental.clientId === actor.userId;
  if (!isOwner && (opts.ownerOnly || actor.role !== "ADMIN")) {
    throw new NotFoundError("Rental not found", "RENTAL_NOT_FOUND");
  }
  return rental;
}

export async function bookRental(actor: Actor, input: CreateRentalInput, now = new Date()): Promise<RentalView> {
  await connectMongo();
  const car = mongoose.isValidObjectId(input.carId)
    ? await Car.findById(input.carId, { status: 1, pricePerDay: 1 }).lean()
    : null;
  if (!car) throw new NotFoundError("Car not found", "CAR_NOT_FOUND");

  const quote = quoteBooking({
    car: { id: String(car._id), status: car.status, pricePerDay: car.pricePerDay },
    startDate: input.startDate,
    endDate: input.endDate,
    now,
    timeZone: env.APP_TIMEZONE,
  });
  const rental = await rentalLifecycle.createRental(quote, actor.userId);
  const [view] = await withCars([rental]);
  return view;
}

export async function listMyRentals(userId: string): Promise<RentalView[]> {
  await connectMongo();
  const docs = await Rental.find({ clientId: userId }).sort({ createdAt: -1 }).lean();
  return withCars(docs.map(toRentalRecord));
}

/** Card details were checked for shape by the caller; no gateway is involved. */
export async function payRental(actor: Actor, rentalId: string): Promise<RentalView> {
  const rental = await loadVisibleRental(rentalId, actor, { ownerOnly: true });
  const paid = await rentalLifecycle.confirmPayment(rental.id);
  const [view] = await withCars([paid]);
  return view;
}

export async function cancelRentalAs(actor: Actor, rentalId: string): Promise<CancelResult> {
  const rental = await loadVisibleRental(rentalId, actor, { ownerOnly: false });
  return rentalLifecycle.cancelRental(rental.id);
}

export async function adminListRentals(q: AdminRentalsQuery): Promise<AdminRentalRow[]> {
  await connectMongo();
  const rentals = (await Rental.find({}).lean()).map(toRentalRecord);
  const clientIds = [...new Set(rentals.map((r) => r.clientId))];
  const [views, clients] = await Promise.all([
    withCars(rentals),
    User.find({ _id: { $in: clientIds } }, { email: 1 }).lean(),
  ]);
  const emailById = new Map(clients.map((u) => [String(u._id), u.email]));

  const rows: AdminRentalRow[] = views.map((r) => {
    const email = emailById.get(r.clientId);
    return {
      id: r.id,
      status: r.status,
      startDate: r.startDate,
      endDate: r.endDate,
      totalPrice: r.totalPrice,
      createdAt: r.createdAt,
      car: r.car
        ? {
            id: r.car.id,
            licensePlate: r.car.licensePlate,
            brand: r.car.brand?.name ?? null,
            model: r.car.model?.name ?? null,
          }
        : null,
      client: email !== undefined ? { id: r.clientId, email } : null,
    };
  });
  return sortAdminRentals(filterAdminRentals(rows, q), q.sortField, q.sortDir);
}

/** Sum of PAID rentals, minor units. */
export async function totalRevenue(): Promise<number> {
  await connectMongo();
  const [row] = await Rental.aggregate<{ total: number }>([
    { $match: { status: "PAID" } },
    { $group: { _id: null, total: { $sum: "$totalPrice" } } },
  ]);
  return row?.total ?? 0;
}

export async function countRentalsOf(userId: string): Promise<number> {
  await connectMongo();
  return Rental.countDocuments({ clientId: userId });
}
