// server/src/middlewares/error.ts
import type { ErrorRequestHandler } from "express";
import { ZodError } from "zod";

import { logger } from "../config/logger.js";
import { isAppError } from "../utils/errors.js";

export const errorHandler: ErrorRequestHandler = (err: unknown, _req, res, _next) => {
  const requestId: unknown = res.locals.requestId;

  if (err instanceof ZodError) {
    const details = err.flatten();
    logger.warn("Validation error", { requestId, details });
    return res
      .status(422)
      .json({ error: { code: "UNPROCESSABLE_ENTITY", message: "Invalid request body", details, requestId } });
  }

  if (isAppError(err)) {
    // 4xx are the caller's problem; keep them out of the error log
    const log = err.status >= 500 ? logger.error.bind(logger) : logger.warn.bind(logger);
    log(err.message, { requestId, status: err.status, code: err.code });
    return res.status(err.status).json({
      error: {
        code: err.code,
        message: err.message,
        ...(err.details !== undefined ? { details: err.details } : {}),
        requestId,
      },
    });
  }

  const message = err instanceof Error ? err.message : "Unhandled error";
  logger.error(message, {
    requestId,
    status: 500,
    code: "INTERNAL_ERROR",
    stack: err instanceof Error ? err.stack : undefined,
  });

  res.status(500).json({
    error: { code: "INTERNAL_ERROR", message: "Internal server error", requestId },
  });
};
