import type { RequestHandler } from "express";

import { NotFoundError } from "../utils/errors.js";

/** Unmatched routes go through the error handler like any other 404. */
export const notFound: RequestHandler = (req, _res, next) => {
  next(new NotFoundError(`Route ${req.method} ${req.path} not found`));
};
