// server/src/config/env.ts
/** Environment loader: reads .env, validates with Zod, exports typed config plus parsed lists. */
import "dotenv/config";
import { z } from "zod";

import { isTimeZone } from "../utils/dates.js";

const boolString = (fallback: "true" | "false") =>
  z
    .string()
    .default(fallback)
    .transform((v) => v.trim().toLowerCase() === "true");

const EnvSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  PORT: z.coerce.number().int().positive().default(3001),
  CORS_ORIGINS: z.string().default("http://localhost:5173,http://localhost:3000"),
  LOG_LEVEL: z.enum(["error", "warn", "info", "http", "verbose", "debug", "silly"]).default("info"),

  // Data layer (transactions need a replica set)
  MONGO_URI: z.string().default("mongodb://localhost:27017/car_rental_dev?replicaSet=rs0"),
  REDIS_URL: z.string().default("redis://localhost:6379"),
  REDIS_NAMESPACE: z.string().default("rent:dev"),

  // Auth
  JWT_SECRET: z
    .string()
    .min(16, "JWT_SECRET must be at least 16 chars")
    .default("dev_only_change_me"),
  JWT_REFRESH_SECRET: z
    .string()
    .min(16, "JWT_REFRESH_SECRET must be at least 16 chars")
    .default("dev_only_change_me_refresh"),
  JWT_ACCESS_TTL: z.string().regex(/^\d+[smhd]?$/, "TTL like 15m or 30d").default("15m"),
  JWT_REFRESH_TTL: z.string().regex(/^\d+[smhd]?$/, "TTL like 15m or 30d").default("30d"),
  JWT_ISS: z.string().default("car-rental-api"),
  JWT_AUD: z.string().default("car-rental-clients"),
  BCRYPT_ROUNDS: z.coerce.number().int().min(8).max(15).default(12),

  // Money display
  CURRENCY: z.string().length(3).default("RUB"),
  CURRENCY_LOCALE: z.string().default("ru-RU"),
  // IANA zone deciding the booking "tomorrow" and ages; the host's zone when unset
  APP_TIMEZONE: z
    .string()
    .optional()
    .transform((v) => v?.trim() || undefined)
    .refine((v) => v === undefined || isTimeZone(v), "Unknown time zone"),

  // Catalog
  CAR_CITIES: z.string().default("Izhevsk,Votkinsk,Sarapul,Glazov,Mozhga"),

  // Rentals
  RENTAL_PAYMENT_WINDOW_MINUTES: z.coerce.number().int().positive().default(5),
  RENTAL_SWEEP_INTERVAL_MS: z.coerce.number().int().min(1000).default(60_000),
  RENTAL_SWEEP_ENABLED: boolString("true"),
});

export type Env = z.infer<typeof EnvSchema>;

const parsed = EnvSchema.safeParse(process.env);
if (!parsed.success) {
  // logger depends on env, so this one goes straight to stderr
  console.error("Invalid environment variables:", parsed.error.flatten().fieldErrors);
  process.exit(1);
}

export const env: Env = parsed.data;

function splitList(raw: string): string[] {
  return raw
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}

// parsed CORS allowlist as array
export const corsOrigins = splitList(env.CORS_ORIGINS);

/** Cities offered in the admin car filters and forms. */
export const carCities = splitList(env.CAR_CITIES);
