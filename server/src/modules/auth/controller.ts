import type { Request, Response } from "express";

import { loginSchema, refreshSchema, registerSchema } from "./schemas.js";
import { consumeSession, openSession } from "./sessions.js";
import { signAccessToken, signRefreshToken, TokenError, verifyRefresh } from "./tokens.js";
import { logger } from "../../config/logger.js";
import type { Role } from "../../domain/enums.js";
import { AppError } from "../../utils/errors.js";
import { asyncHandler, jsonOk } from "../../utils/http.js";
import { createUser, findById, toPublicUser, verifyCredentials } from "../users/service.js";

export type TokenPair = { accessToken: string; refreshToken: string };

async function issueTokens(req: Request, user: { id: string; role: Role }): Promise<TokenPair> {
  const accessToken = signAccessToken({ sub: user.id, role: user.role });
  const refreshToken = signRefreshToken({ sub: user.id });

  const claims = verifyRefresh(refreshToken);
  await openSession({
    userId: user.id,
    jti: claims.jti,
    exp: claims.exp,
    iat: claims.iat,
    ip: req.ip ?? null,
    ua: req.get("user-agent") ?? null,
  });
  return { accessToken, refreshToken };
}

function refreshClaims(token: string) {
  try {
    return verifyRefresh(token);
  } catch (err: unknown) {
    if (err instanceof TokenError) throw new TokenError("Invalid refresh token", "INVALID_REFRESH");
    throw err;
  }
}

export const register = asyncHandler(async (req: Request, res: Response) => {
  const { confirmPassword: _confirm, ...input } = registerSchema.parse(req.body);

  const user = await createUser({ ...input, role: "USER" });
  const userId = String(user._id);
  logger.info("user.registered", { userId });

  jsonOk(res, { user: toPublicUser(user), tokens: await issueTokens(req, { id: userId, role: user.role }) }, 201);
});

export const login = asyncHandler(async (req: Request, res: Response) => {
  const { email, password } = loginSchema.parse(req.body);

  const user = await verifyCredentials(email, password);
  if (!user) throw new AppError("Invalid email or password", { status: 401, code: "INVALID_CREDENTIALS" });

  const userId = String(user._id);
  logger.info("user.logged_in", { userId });
  jsonOk(res, { user: toPublicUser(user), tokens: await issueTokens(req, { id: userId, role: user.role }) });
});

/** Rotation: the presented session is consumed before a new pair is issued. */
export const refresh = asyncHandler(async (req: Request, res: Response) => {
  const claims = refreshClaims(refreshSchema.parse(req.body).refreshToken);

  if (!(await consumeSession(claims.sub, claims.jti))) {
    logger.warn("auth.refresh_rejected", { userId: claims.sub });
    throw new TokenError("Refresh session not found or expired", "INVALID_REFRESH");
  }

  const user = await findById(claims.sub);
  if (!user) throw new TokenError("User no longer exists", "INVALID_REFRESH");

  jsonOk(res, await issueTokens(req, { id: String(user._id), role: user.role }));
});

export const logout = asyncHandler(async (req: Request, res: Response) => {
  const claims = refreshClaims(refreshSchema.parse(req.body).refreshToken);
  await consumeSession(claims.sub, claims.jti);
  jsonOk(res, { success: true });
});
