import mongoose, { Schema, type Model, type Types } from "mongoose";

/** A vehicle model ("Camry") belonging to a brand ("Toyota"). */
export interface CarModelDoc {
  _id: Types.ObjectId;
  name: string;
  brandId: Types.ObjectId;
  createdAt: Date;
  updatedAt: Date;
}

const CarModelSchema = new Schema<CarModelDoc>(
  {
    name: { type: String, required: true, trim: true, maxlength: 255 },
    brandId: { type: Schema.Types.ObjectId, ref: "Brand", required: true, index: true },
  },
  { timestamps: true }
);

CarModelSchema.index({ brandId: 1, name: 1 });

export const CarModel: Model<CarModelDoc> =
  mongoose.models.CarModel || mongoose.model<CarModelDoc>("CarModel", CarModelSchema, "models");
