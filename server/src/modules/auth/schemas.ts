import { z } from "zod";

import { env } from "../../config/env.js";
import { ageInYears, localDay, parseDay } from "../../utils/dates.js";

export const MIN_AGE = 18;

const SPECIAL = /[!@#$%^&*(),.?":{}|<>]/;

export const passwordPolicy = z
  .string()
  .min(8, "Password must be at least 8 characters")
  .regex(/\d/, "Password needs at least one number")
  .regex(/[A-Z]/, "Password needs at least one uppercase letter")
  .regex(SPECIAL, 'Password needs at least one special character (!@#$%^&*(),.?":{}|<>)')
  .refine((v) => !/(.)\1{3,}/.test(v), "Password must not repeat a character 4 or more times in a row");

const cyrillicName = (label: string) =>
  z
    .string()
    .trim()
    .min(1, `${label} is required`)
    .max(50)
    .regex(/^[А-ЯЁа-яё\s-]+$/, `${label} may contain only Cyrillic letters, spaces and hyphens`);

export const phone = z.string().trim().regex(/^\+7\d{10}$/, "Phone must be +7 followed by 10 digits");
export const series = z.string().trim().regex(/^\d{4}$/, "Series must be 4 digits");
export const documentNumber = z.string().trim().regex(/^\d{6}$/, "Number must be 6 digits");

/** Optional middle name: empty string means none. */
const middleName = z
  .union([z.literal(""), cyrillicName("Middle name")])
  .nullish()
  .transform((v) => v || null);

export const day = z.string().transform((v, ctx) => {
  const d = parseDay(v);
  if (!d) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Date must be YYYY-MM-DD" });
    return z.NEVER;
  }
  return d;
});

export const registerSchema = z
  .object({
    firstName: cyrillicName("First name"),
    lastName: cyrillicName("Last name"),
    middleName,
    email: z.string().trim().toLowerCase().email("Must use a valid email address"),
    password: passwordPolicy,
    confirmPassword: z.string(),
    phone,
    driverLicenseSeries: series,
    driverLicenseNumber: documentNumber,
    passportSeries: series,
    passportNumber: documentNumber,
    birthDate: day,
  })
  .refine((data) => data.password === data.confirmPassword, {
    message: "Passwords do not match",
    path: ["confirmPassword"],
  })
  // an unparseable birth date is already reported by `day`
  .refine((data) => !(data.birthDate instanceof Date) || ageInYears(data.birthDate, localDay(new Date(), env.APP_TIMEZONE)) >= MIN_AGE, {
    message: `You must be at least ${MIN_AGE} years old`,
    path: ["birthDate"],
  });

export const loginSchema = z.object({
  email: z.string().trim().toLowerCase().email("Must use a valid email address"),
  password: z.string().min(1, "Password is required"),
});

export const refreshSchema = z.object({
  refreshToken: z.string().min(1, "refreshToken is required"),
});

export const profileSchema = z
  .object({
    firstName: cyrillicName("First name"),
    lastName: cyrillicName("Last name"),
    middleName,
    phone,
    driverLicenseSeries: series,
    driverLicenseNumber: documentNumber,
    passportSeries: series,
    passportNumber: documentNumber,
  })
  .partial()
  .strict();

export type RegisterInput = z.infer<typeof registerSchema>;
export type LoginInput = z.infer<typeof loginSchema>;
export type RefreshInput = z.infer<typeof refreshSchema>;
export type ProfileInput = z.infer<typeof profileSchema>;
