// server/src/utils/ids.ts
/** Request correlation ids plus the ObjectId param schema shared by routers. */

import { randomUUID } from "crypto";

import type { RequestHandler } from "express";
import mongoose from "mongoose";
import { z } from "zod";

export const requestId: RequestHandler = (req, res, next) => {
  const incoming = req.get("x-request-id");
  const id = incoming && incoming.length <= 64 ? incoming : randomUUID();
  res.locals.requestId = id;
  res.setHeader("x-request-id", id);
  next();
};

export const objectId = z
  .string()
  .refine((v) => mongoose.isValidObjectId(v) && v.length === 24, "Invalid id");

export const IdParam = z.object({ id: objectId });
