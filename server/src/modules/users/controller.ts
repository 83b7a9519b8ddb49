import type { Request, Response } from "express";

import { findById, toPublicUser, updateProfile } from "./service.js";
import { getAuth } from "../../middlewares/auth.js";
import { NotFoundError } from "../../utils/errors.js";
import { asyncHandler, jsonOk } from "../../utils/http.js";
import { profileSchema } from "../auth/schemas.js";

export const getMe = asyncHandler(async (req: Request, res: Response) => {
  const { userId } = getAuth(req);
  const user = await findById(userId);
  if (!user) throw new NotFoundError("User not found", "USER_NOT_FOUND");
  return jsonOk(res, { user: toPublicUser(user) });
});

export const patchMe = asyncHandler(async (req: Request, res: Response) => {
  const { userId } = getAuth(req);
  const patch = profileSchema.parse(req.body);
  const user = await updateProfile(userId, patch);
  if (!user) throw new NotFoundError("User not found", "USER_NOT_FOUND");
  return jsonOk(res, { user: toPublicUser(user) });
});
