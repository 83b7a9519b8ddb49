/** Domain enums (closed string unions; the arrays feed Mongoose enums and Zod schemas) */

export const CAR_STATUSES = ["AVAILABLE", "RESERVED", "RENTED", "MAINTENANCE"] as const;
export type CarStatus = (typeof CAR_STATUSES)[number];

/** Rental lifecycle: PENDING_PAYMENT -> PAID -> CANCELLED, or PENDING_PAYMENT -> (deleted) */
export const RENTAL_STATUSES = ["PENDING_PAYMENT", "PAID", "CANCELLED"] as const;
export type RentalStatus = (typeof RENTAL_STATUSES)[number];

export const ROLES = ["USER", "ADMIN"] as const;
export type Role = (typeof ROLES)[number];

export function isCarStatus(v: unknown): v is CarStatus {
  return typeof v === "string" && (CAR_STATUSES as readonly string[]).includes(v);
}

export function isRentalStatus(v: unknown): v is RentalStatus {
  return typeof v === "string" && (RENTAL_STATUSES as readonly string[]).includes(v);
}

export function isRole(v: unknown): v is Role {
  return typeof v === "string" && (ROLES as readonly string[]).includes(v);
}
