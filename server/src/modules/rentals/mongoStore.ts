import mongoose, { type ClientSession } from "mongoose";

import { Rental } from "./model.js";
import type { CarSnapshot, RentalRecord, RentalStore, RentalUnitOfWork } from "./store.js";
import { connectMongo } from "../../config/db.js";
import type { CarStatus, RentalStatus } from "../../domain/enums.js";
import { Car } from "../cars/model.js";

const LIVE: RentalStatus[] = ["PENDING_PAYMENT", "PAID"];

type LeanRental = {
  _id: unknown;
  clientId: unknown;
  carId: unknown;
  startDate: Date;
  endDate: Date;
  totalPrice: number;
  status: RentalStatus;
  createdAt: Date;
};

export function toRentalRecord(doc: LeanRental): RentalRecord {
  return {
    id: String(doc._id),
    clientId: String(doc.clientId),
    carId: String(doc.carId),
    startDate: doc.startDate,
    endDate: doc.endDate,
    totalPrice: doc.totalPrice,
    status: doc.status,
    createdAt: doc.createdAt,
  };
}

function unitOfWork(session: ClientSession): RentalUnitOfWork {
  return {
    async getCar(carId) {
      if (!mongoose.isValidObjectId(carId)) return null;
      const car = await Car.findById(carId, { status: 1, pricePerDay: 1 }).session(session).lean();
      if (!car) return null;
      const snapshot: CarSnapshot = { id: String(car._id), status: car.status, pricePerDay: car.pricePerDay };
      return snapshot;
    },

    async transitionCar(carId: string, from: readonly CarStatus[], to: CarStatus) {
      if (!mongoose.isValidObjectId(carId)) return false;
      const res = await Car.updateOne(
        { _id: carId, status: { $in: [...from] } },
        { $set: { status: to } },
        { session }
      );
      return res.matchedCount === 1;
    },

    async insertRental(input) {
      const [doc] = await Rental.create(
        [
          {
            clientId: input.clientId,
            carId: input.carId,
            startDate: input.startDate,
            endDate: input.endDate,
            totalPrice: input.totalPrice,
            status: input.status,
            createdAt: input.createdAt,
          },
        ],
        { session }
      );
      return toRentalRecord(doc.toObject());
    },

    async getRental(rentalId) {
      if (!mongoose.isValidObjectId(rentalId)) return null;
      const doc = await Rental.findById(rentalId).session(session).lean();
      return doc ? toRentalRecord(doc) : null;
    },

    async transitionRental(rentalId: string, from: RentalStatus, to: RentalStatus) {
      if (!mongoose.isValidObjectId(rentalId)) return null;
      const doc = await Rental.findOneAndUpdate(
        { _id: rentalId, status: from },
        { $set: { status: to } },
        { new: true, session }
      ).lean();
      return doc ? toRentalRecord(doc) : null;
    },

    async deleteRental(rentalId, status) {
      if (!mongoose.isValidObjectId(rentalId)) return false;
      const res = await Rental.deleteOne({ _id: rentalId, status }, { session });
      return res.deletedCount === 1;
    },

    async countLiveRentalsForCar(carId, exceptRentalId) {
      if (!mongoose.isValidObjectId(carId)) return 0;
      const except =
        exceptRentalId && mongoose.isValidObjectId(exceptRentalId) ? { _id: { $ne: exceptRentalId } } : {};
      return Rental.countDocuments({ carId, status: { $in: LIVE }, ...except }).session(session);
    },
  };
}

/** Mongo-backed store; needs a replica set (transactions). */
export function createMongoRentalStore(): RentalStore {
  return {
    async transaction<T>(work: (uow: RentalUnitOfWork) => Promise<T>): Promise<T> {
      await connectMongo();
      const session = await mongoose.startSession();
      try {
        // withTransaction may retry the callback on transient errors; keep the last result
        const holder: { result?: { value: T } } = {};
        await session.withTransaction(async () => {
          holder.result = { value: await work(unitOfWork(session)) };
        });
        if (!holder.result) throw new Error("Transaction finished without a result");
        return holder.result.value;
      } finally {
        await session.endSession();
      }
    },

    async listPendingPayment() {
      await connectMongo();
      const docs = await Rental.find({ status: "PENDING_PAYMENT" }, { _id: 1, createdAt: 1 })
        .sort({ createdAt: 1 })
        .lean();
      return docs.map((d) => ({ id: String(d._id), createdAt: d.createdAt }));
    },
  };
}
