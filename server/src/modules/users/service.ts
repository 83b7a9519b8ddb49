/** Users service: accounts, credentials, profile edits; keeps controllers thin */
import bcrypt from "bcrypt";
import mongoose from "mongoose";

import { clashError, clashQuery, findClashes, integrityFromIndexKeys, type IdentityFields } from "./integrity.js";
import { User, type UserDoc } from "./model.js";
import { connectMongo } from "../../config/db.js";
import { env } from "../../config/env.js";
import type { Role } from "../../domain/enums.js";
import { translateDuplicateKey } from "../../utils/mongoErrors.js";
import type { AccountDirectory } from "../rentals/store.js";

type UserRecord = Omit<UserDoc, "passwordHash">;

/** Normalize emails consistently */
function normEmail(email: string) {
  return email.trim().toLowerCase();
}

export async function hashPassword(plain: string): Promise<string> {
  return bcrypt.hash(plain, env.BCRYPT_ROUNDS);
}

/** Rejects with one IntegrityError naming every unique field already taken. */
export async function assertIdentityAvailable(candidate: IdentityFields, exceptUserId?: string) {
  const or = clashQuery(candidate);
  if (or.length === 0) return;
  const except = exceptUserId ? { _id: { $ne: exceptUserId } } : {};
  const others = await User.find(
    { $or: or, ...except },
    { email: 1, phone: 1, driverLicenseSeries: 1, driverLicenseNumber: 1, passportSeries: 1, passportNumber: 1 }
  ).lean();
  const clashes = findClashes(candidate, others);
  if (clashes.length > 0) throw clashError(clashes);
}

export type CreateUserInput = {
  email: string;
  password: string;
  firstName: string;
  lastName: string;
  middleName?: string | null;
  phone: string;
  driverLicenseSeries: string;
  driverLicenseNumber: string;
  passportSeries: string;
  passportNumber: string;
  birthDate: Date;
  role?: Role;
};

export async function createUser(input: CreateUserInput): Promise<UserRecord> {
  await connectMongo();
  const { password, ...fields } = input;
  const email = normEmail(fields.email);
  await assertIdentityAvailable({ ...fields, email });

  // the unique indexes still catch a concurrent registration
  const doc = await translateDuplicateKey(
    User.create({
      ...fields,
      email,
      middleName: fields.middleName || null,
      role: fields.role ?? "USER",
      passwordHash: await hashPassword(password),
    }),
    integrityFromIndexKeys
  );
  const { passwordHash: _hash, ...user } = doc.toObject();
  return user;
}

export async function findByEmail(email: string): Promise<UserRecord | null> {
  await connectMongo();
  return User.findOne({ email: normEmail(email) }).lean();
}

export async function findById(id: string): Promise<UserRecord | null> {
  await connectMongo();
  if (!mongoose.isValidObjectId(id)) return null;
  return User.findById(id).lean();
}

/** The account behind `email` when `password` matches its hash. */
export async function verifyCredentials(email: string, password: string): Promise<UserRecord | null> {
  await connectMongo();
  const user = await User.findOne({ email: normEmail(email) }).select("+passwordHash").lean();
  if (!user) return null;
  const { passwordHash, ...rest } = user;
  const ok = await bcrypt.compare(password, passwordHash);
  return ok ? rest : null;
}

export type ProfilePatch = {
  firstName?: string;
  lastName?: string;
  middleName?: string | null;
  phone?: string;
  driverLicenseSeries?: string;
  driverLicenseNumber?: string;
  passportSeries?: string;
  passportNumber?: string;
};

/** Email, birth date, password and role are not editable here. */
export async function updateProfile(userId: string, patch: ProfilePatch): Promise<UserRecord | null> {
  await connectMongo();
  const current = await findById(userId);
  if (!current) return null;

  // pair fields are checked as a pair, completed from the stored values
  const candidate: IdentityFields = {
    phone: patch.phone,
    driverLicenseSeries: patch.driverLicenseSeries ?? current.driverLicenseSeries,
    driverLicenseNumber: patch.driverLicenseNumber ?? current.driverLicenseNumber,
    passportSeries: patch.passportSeries ?? current.passportSeries,
    passportNumber: patch.passportNumber ?? current.passportNumber,
  };
  await assertIdentityAvailable(candidate, userId);

  return translateDuplicateKey(
    User.findByIdAndUpdate(userId, { $set: patch }, { new: true, runValidators: true }).lean().exec(),
    integrityFromIndexKeys
  );
}

/** Safe public shape for API responses */
export function toPublicUser(u: UserRecord) {
  return {
    id: String(u._id),
    email: u.email,
    role: u.role,
    firstName: u.firstName,
    lastName: u.lastName,
    middleName: u.middleName ?? null,
    fullName: [u.lastName, u.firstName, u.middleName].filter(Boolean).join(" "),
    phone: u.phone,
    driverLicenseSeries: u.driverLicenseSeries,
    driverLicenseNumber: u.driverLicenseNumber,
    passportSeries: u.passportSeries,
    passportNumber: u.passportNumber,
    birthDate: u.birthDate,
    createdAt: u.createdAt,
    updatedAt: u.updatedAt,
  };
}

/** Login identity (user id or email) -> account, for the rental lifecycle. */
export const userAccounts: AccountDirectory = {
  async findAccount(identity) {
    const user = mongoose.isValidObjectId(identity) ? await findById(identity) : await findByEmail(identity);
    return user ? { id: String(user._id) } : null;
  },
};
