import { z } from "zod";

import { CAR_STATUSES } from "../../domain/enums.js";
import { objectId } from "../../utils/ids.js";

/** Statuses an admin may set by hand; RESERVED/RENTED belong to the rental lifecycle. */
export const ADMIN_CAR_STATUSES = ["AVAILABLE", "MAINTENANCE"] as const;

const optionalText = z
  .string()
  .trim()
  .max(255)
  .optional()
  .transform((v) => v || undefined);

// "0" and "" from form selects mean "any"
const optionalPositive = z.preprocess(
  (v) => (v === "" || v === "0" ? undefined : v),
  z.coerce.number().int().positive().optional()
);

export const browseCarsQuery = z.object({
  sortOrder: z.enum(["default", "priceAsc", "priceDesc"]).default("default"),
  brandId: z.preprocess((v) => (v === "" || v === "0" ? undefined : v), objectId.optional()),
  year: optionalPositive,
  color: optionalText,
  city: optionalText,
  minPrice: optionalPositive,
  maxPrice: optionalPositive,
});

export const adminCarsQuery = z.object({
  brandId: z.preprocess((v) => (v === "" || v === "0" ? undefined : v), objectId.optional()),
  plate: optionalText,
  city: optionalText,
  status: z.preprocess((v) => (v === "" ? undefined : v), z.enum(CAR_STATUSES).optional()),
  sortField: z.enum(["model", "price"]).default("model"),
  sortDir: z.enum(["asc", "desc"]).default("asc"),
});

export const carBody = z.object({
  licensePlate: z.string().trim().min(1, "Licence plate is required").max(255),
  year: z.coerce.number().int().min(1900).max(2100).nullish(),
  color: z.string().trim().max(255).nullish(),
  /** integer minor units */
  pricePerDay: z.coerce.number().int().nonnegative(),
  status: z.enum(ADMIN_CAR_STATUSES).default("AVAILABLE"),
  city: z.string().trim().max(255).nullish(),
  brandId: objectId,
  modelId: objectId,
});

export const carPatch = carBody.omit({ status: true }).partial().extend({
  status: z.enum(ADMIN_CAR_STATUSES).optional(),
});

export type BrowseCarsQuery = z.infer<typeof browseCarsQuery>;
export type AdminCarsQuery = z.infer<typeof adminCarsQuery>;
export type CarInput = z.infer<typeof carBody>;
export type CarPatch = z.infer<typeof carPatch>;
