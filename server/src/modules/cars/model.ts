import mongoose, { Schema, type Model, type Types } from "mongoose";

import { CAR_STATUSES, type CarStatus } from "../../domain/enums.js";

export interface CarDoc {
  _id: Types.ObjectId;
  licensePlate: string;
  year?: number | null;
  color?: string | null;
  /** integer minor units */
  pricePerDay: number;
  status: CarStatus;
  city?: string | null;
  brandId?: Types.ObjectId | null;
  modelId?: Types.ObjectId | null;
  createdAt: Date;
  updatedAt: Date;
}

const CarSchema = new Schema<CarDoc>(
  {
    licensePlate: { type: String, required: true, trim: true, maxlength: 255 },
    year: { type: Number, min: 1900, max: 2100 },
    color: { type: String, trim: true, maxlength: 255 },
    pricePerDay: {
      type: Number,
      required: true,
      min: 0,
      validate: { validator: Number.isInteger, message: "pricePerDay must be whole minor units" },
    },
    status: { type: String, enum: CAR_STATUSES, default: "AVAILABLE", index: true },
    city: { type: String, trim: true, maxlength: 255 },
    brandId: { type: Schema.Types.ObjectId, ref: "Brand", index: true },
    modelId: { type: Schema.Types.ObjectId, ref: "CarModel", index: true },
  },
  { timestamps: true }
);

CarSchema.index({ licensePlate: 1 }, { unique: true });
// public browse: status + price sort
CarSchema.index({ status: 1, pricePerDay: 1 });

export const Car: Model<CarDoc> = mongoose.models.Car || mongoose.model<CarDoc>("Car", CarSchema);
