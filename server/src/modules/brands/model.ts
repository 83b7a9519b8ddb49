import mongoose, { Schema, type Model, type Types } from "mongoose";

export interface BrandDoc {
  _id: Types.ObjectId;
  name: string;
  createdAt: Date;
  updatedAt: Date;
}

const BrandSchema = new Schema<BrandDoc>(
  {
    name: { type: String, required: true, trim: true, maxlength: 255 },
  },
  { timestamps: true }
);

/** Case-insensitive uniqueness ("BMW" == "bmw") */
BrandSchema.index({ name: 1 }, { unique: true, collation: { locale: "en", strength: 2 } });

export const Brand: Model<BrandDoc> =
  mongoose.models.Brand || mongoose.model<BrandDoc>("Brand", BrandSchema);
