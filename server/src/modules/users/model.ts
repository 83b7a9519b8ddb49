import mongoose, { Schema, type Model, type Types } from "mongoose";

import { ROLES, type Role } from "../../domain/enums.js";

const CYRILLIC_NAME = /^[А-ЯЁа-яё\s-]+$/;

export interface UserDoc {
  _id: Types.ObjectId;
  email: string;
  /** bcrypt; excluded from queries unless selected with +passwordHash */
  passwordHash: string;
  firstName: string;
  lastName: string;
  middleName?: string | null;
  phone: string;
  driverLicenseSeries: string;
  driverLicenseNumber: string;
  passportSeries: string;
  passportNumber: string;
  birthDate: Date;
  role: Role;
  createdAt: Date;
  updatedAt: Date;
}

const UserSchema = new Schema<UserDoc>(
  {
    email: {
      type: String,
      required: true,
      lowercase: true,
      trim: true,
      match: [/.+@.+\..+/, "Must use a valid email address"],
    },
    passwordHash: { type: String, required: true, select: false },

    firstName: { type: String, required: true, trim: true, maxlength: 50, match: CYRILLIC_NAME },
    lastName: { type: String, required: true, trim: true, maxlength: 50, match: CYRILLIC_NAME },
    middleName: { type: String, trim: true, maxlength: 50, default: null },

    phone: { type: String, required: true, match: /^\+7\d{10}$/ },
    driverLicenseSeries: { type: String, required: true, match: /^\d{4}$/ },
    driverLicenseNumber: { type: String, required: true, match: /^\d{6}$/ },
    passportSeries: { type: String, required: true, match: /^\d{4}$/ },
    passportNumber: { type: String, required: true, match: /^\d{6}$/ },
    birthDate: { type: Date, required: true },

    role: { type: String, enum: ROLES, default: "USER" },
  },
  { timestamps: true }
);

/** Indexes (duplicate-key errors on these surface as IntegrityError) */
UserSchema.index({ email: 1 }, { unique: true });
UserSchema.index({ phone: 1 }, { unique: true });
UserSchema.index({ driverLicenseSeries: 1, driverLicenseNumber: 1 }, { unique: true });
UserSchema.index({ passportSeries: 1, passportNumber: 1 }, { unique: true });
UserSchema.index({ role: 1 });

export const User: Model<UserDoc> =
  mongoose.models.User || mongoose.model<UserDoc>("User", UserSchema);
