import mongoose, { Schema, type Model, type Types } from "mongoose";

import { RENTAL_STATUSES, type RentalStatus } from "../../domain/enums.js";

export interface RentalDoc {
  _id: Types.ObjectId;
  clientId: Types.ObjectId;
  carId: Types.ObjectId;
  /** whole days, stored as UTC midnight */
  startDate: Date;
  endDate: Date;
  /** integer minor units, fixed at booking time */
  totalPrice: number;
  status: RentalStatus;
  /** set by the lifecycle clock; the payment window counts from here */
  createdAt: Date;
  updatedAt: Date;
}

const RentalSchema = new Schema<RentalDoc>(
  {
    clientId: { type: Schema.Types.ObjectId, ref: "User", required: true },
    carId: { type: Schema.Types.ObjectId, ref: "Car", required: true },
    startDate: { type: Date, required: true },
    endDate: { type: Date, required: true },
    totalPrice: { type: Number, required: true, min: 0 },
    status: { type: String, enum: RENTAL_STATUSES, required: true },
    createdAt: { type: Date, required: true },
  },
  { timestamps: { createdAt: false, updatedAt: true } }
);

RentalSchema.pre("validate", function (next) {
  if (this.startDate >= this.endDate) {
    return next(new Error("endDate must be after startDate"));
  }
  next();
});

// "my rentals" newest first
RentalSchema.index({ clientId: 1, createdAt: -1 });
// sweeper scan + live-rental lookups per car
RentalSchema.index({ status: 1, createdAt: 1 });
RentalSchema.index({ carId: 1, status: 1 });

export const Rental: Model<RentalDoc> =
  mongoose.models.Rental || mongoose.model<RentalDoc>("Rental", RentalSchema);
