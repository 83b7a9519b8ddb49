import mongoose from "mongoose";

import type { ListUsersQuery } from "./schemas.js";
import { connectMongo } from "../../config/db.js";
import { logger } from "../../config/logger.js";
import type { Role } from "../../domain/enums.js";
import { InvalidStateError, NotFoundError } from "../../utils/errors.js";
import { writeAudit, type AuditEntry } from "../audit/service.js";
import { revokeAllSessionsForUser } from "../auth/sessions.js";
import { Car } from "../cars/model.js";
import { countCarsByStatus } from "../cars/service.js";
import { countRentalsOf, totalRevenue } from "../rentals/service.js";
import { User } from "../users/model.js";
import { toPublicUser } from "../users/service.js";

/** Runs an admin mutation, then records it. */
export async function audited<T>(
  actorId: string,
  action: string,
  target: AuditEntry["target"],
  op: () => Promise<T>,
  diff?: (result: T) => unknown
): Promise<T> {
  const result = await op();
  await writeAudit({ actorId, action, target, diff: diff ? diff(result) : result });
  return result;
}

export async function dashboard() {
  await connectMongo();
  const [totalCars, totalUsers, revenue, carStatusCounts] = await Promise.all([
    Car.estimatedDocumentCount(),
    User.countDocuments({ role: "USER" }),
    totalRevenue(),
    countCarsByStatus(),
  ]);
  return { totalCars, totalUsers, totalRevenue: revenue, carStatusCounts };
}

function escapeRegex(s: string) {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export async function adminListUsers(filters: ListUsersQuery) {
  await connectMongo();
  const query = {
    ...(filters.role ? { role: filters.role } : {}),
    ...(filters.email ? { email: new RegExp(escapeRegex(filters.email), "i") } : {}),
  };
  const users = await User.find(query).sort({ createdAt: -1 }).lean();
  return users.map(toPublicUser);
}

export async function adminSetRole(adminId: string, userId: string, role: Role) {
  await connectMongo();
  const before = mongoose.isValidObjectId(userId) ? await User.findById(userId).lean() : null;
  if (!before) throw new NotFoundError("User not found", "USER_NOT_FOUND");

  const after = await audited(
    adminId,
    "user.role",
    { type: "user", id: userId },
    async () => {
      const doc = await User.findByIdAndUpdate(userId, { $set: { role } }, { new: true }).lean();
      if (!doc) throw new NotFoundError("User not found", "USER_NOT_FOUND");
      return doc;
    },
    () => ({ before: before.role, after: role })
  );

  // tokens carry the role; force a fresh login
  if (before.role !== role) {
    const revoked = await revokeAllSessionsForUser(userId);
    logger.info("user.role_changed", { userId, role, revoked });
  }
  return toPublicUser(after);
}

/** Refused while the user owns rentals (history included). */
export async function adminDeleteUser(adminId: string, userId: string) {
  await connectMongo();
  const user = mongoose.isValidObjectId(userId) ? await User.findById(userId).lean() : null;
  if (!user) throw new NotFoundError("User not found", "USER_NOT_FOUND");
  if (adminId === userId) throw new InvalidStateError("Admins cannot delete themselves");

  const rentals = await countRentalsOf(userId);
  if (rentals > 0) {
    throw new InvalidStateError(`User has ${rentals} rental(s) and cannot be deleted`, { rentals });
  }

  await audited(
    adminId,
    "user.delete",
    { type: "user", id: userId },
    () => User.deleteOne({ _id: userId }).exec(),
    () => ({ email: user.email })
  );
  await revokeAllSessionsForUser(userId);
  return toPublicUser(user);
}
