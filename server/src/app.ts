/** Express app factory: helmet, CORS allowlist, body parsing, request ids, rate limit, routes, error rendering. */
import cors from "cors";
import express, { type Express } from "express";
import helmet from "helmet";
import morgan from "morgan";

import { corsOrigins, env } from "./config/env.js";
import { httpLogStream } from "./config/logger.js";
import { errorHandler } from "./middlewares/error.js";
import { notFound } from "./middlewares/notFound.js";
import { rateLimit } from "./middlewares/rateLimit.js";
import router from "./routes.js";
import { ForbiddenError } from "./utils/errors.js";
import { requestId } from "./utils/ids.js";

export type AppOptions = {
  /** morgan access lines; on in development by default */
  httpLogs?: boolean;
  origins?: string[];
};

export function createApp(opts: AppOptions = {}): Express {
  const origins = opts.origins ?? corsOrigins;
  const app = express();

  app.disable("x-powered-by");
  app.use(requestId);
  app.use(helmet());
  app.use(
    cors({
      origin(origin, cb) {
        // no Origin header: curl, server-to-server, same-origin
        if (!origin || origins.includes(origin)) return cb(null, true);
        cb(new ForbiddenError(`Origin ${origin} is not allowed`));
      },
      credentials: true,
    })
  );
  app.use(express.json({ limit: "100kb" }));

  if (opts.httpLogs ?? env.NODE_ENV === "development") {
    app.use(morgan("tiny", { stream: httpLogStream }));
  }
  app.use(rateLimit());

  app.use("/", router);

  app.use(notFound);
  app.use(errorHandler);
  return app;
}
