/** Boot file: connects stores, starts the expiry sweeper, listens, and shuts down gracefully. */

import http from "http";

import { createApp } from "./app.js";
import { connectMongo, closeMongo } from "./config/db.js";
import { env } from "./config/env.js";
import { logger } from "./config/logger.js";
import { pingRedis, closeRedis } from "./config/redis.js";
import { expirySweeper } from "./modules/rentals/runtime.js";

const server = http.createServer(createApp());

process.on("uncaughtException", (err) => {
  logger.error("Uncaught exception", { message: err.message, stack: err.stack });
});
process.on("unhandledRejection", (reason) => {
  logger.error("Unhandled rejection", { reason: reason instanceof Error ? reason.message : String(reason) });
});

const start = async () => {
  try {
    // ensure data deps are up before listening
    await connectMongo();
    const redis = await pingRedis();
    if (redis.status === "error") throw new Error(`Redis unavailable: ${redis.message}`);

    if (env.RENTAL_SWEEP_ENABLED) expirySweeper.start();

    server.listen(env.PORT, () => {
      logger.info(`Car rental API listening on :${env.PORT}`, { env: env.NODE_ENV });
    });
  } catch (err: unknown) {
    logger.error("Startup failed", {
      message: err instanceof Error ? err.message : String(err),
      stack: err instanceof Error ? err.stack : undefined,
    });
    process.exit(1);
  }
};

const shutdown = (signal: string) => {
  logger.warn(`Received ${signal}, shutting down...`);
  setTimeout(() => {
    logger.error("Forced shutdown");
    process.exit(1);
  }, 10_000).unref();

  // stop the sweeper first so no cancel runs against a closing connection
  void expirySweeper
    .stop()
    .then(() => Promise.allSettled([closeMongo(), closeRedis()]))
    .finally(() => {
      server.close(() => {
        logger.info("Server closed");
        process.exit(0);
      });
    });
};

(["SIGINT", "SIGTERM"] as const).forEach((sig) => process.on(sig, () => shutdown(sig)));

void start();
