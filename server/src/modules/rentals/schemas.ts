import { z } from "zod";

import { ADMIN_RENTAL_SORTS } from "./query.js";
import { RENTAL_STATUSES } from "../../domain/enums.js";
import { objectId } from "../../utils/ids.js";

export const createRentalBody = z.object({
  carId: objectId,
  startDate: z.string().trim(),
  endDate: z.string().trim(),
});

/** Card data is only checked for shape; nothing is charged or stored. */
export const paymentBody = z.object({
  cardNumber: z
    .string()
    .transform((v) => v.replace(/\s+/g, ""))
    .pipe(z.string().regex(/^\d{16,}$/, "Invalid card number")),
  cardHolder: z.string().trim().min(1, "Card holder is required").max(100),
  expiryDate: z.string().trim().regex(/^(0[1-9]|1[0-2])\/\d{2}$/, "Expiry must be MM/YY"),
  cvv: z.string().trim().regex(/^\d{3,4}$/, "Invalid CVV"),
});

export const adminRentalsQuery = z.object({
  plate: z.string().trim().optional(),
  email: z.string().trim().optional(),
  status: z.preprocess((v) => (v === "" ? undefined : v), z.enum(RENTAL_STATUSES).optional()),
  sortField: z.enum(ADMIN_RENTAL_SORTS).default("createdAt"),
  sortDir: z.enum(["asc", "desc"]).default("desc"),
});

export type CreateRentalInput = z.infer<typeof createRentalBody>;
export type AdminRentalsQuery = z.infer<typeof adminRentalsQuery>;
