// server/src/routes.ts
/** API surface: health endpoints plus feature routers (auth, catalog, rentals, admin). */
import { Router } from "express";

import { pingMongo } from "./config/db.js";
import { pingRedis } from "./config/redis.js";
import adminRouter from "./modules/admin/routes.js";
import authRouter from "./modules/auth/routes.js";
import { carsRouter, catalogRouter } from "./modules/cars/routes.js";
import rentalsRouter from "./modules/rentals/routes.js";
import usersRouter from "./modules/users/routes.js";
import { asyncHandler, jsonOk } from "./utils/http.js";

export const router = Router();

// Feature mounts
router.use("/auth", authRouter);
router.use("/", usersRouter); // GET/PATCH /me
router.use("/cars", carsRouter); // public browse
router.use("/catalog", catalogRouter); // brands, models for selects
router.use("/rentals", rentalsRouter);
router.use("/admin", adminRouter);

// Basic health (no deps)
router.get(
  "/health",
  asyncHandler(async (_req, res) => {
    const uptime = process.uptime();
    const version = process.env.npm_package_version || "0.0.0";
    jsonOk(res, { status: "ok", uptime, version });
  })
);

// Dependencies health (actual pings)
router.get(
  "/health/deps",
  asyncHandler(async (_req, res) => {
    const [mongo, redis] = await Promise.all([pingMongo(), pingRedis()]);
    const ok = mongo.status === "ok" && redis.status === "ok";
    jsonOk(
      res,
      {
        mongo: mongo.status,
        redis: redis.status,
        ...(ok ? {} : { details: { mongo: mongo.message, redis: redis.message } }),
      },
      ok ? 200 : 503
    );
  })
);

export default router;
