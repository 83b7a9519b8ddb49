/** JWT helpers: sign/verify access & refresh tokens, with rotation support. */
import { randomUUID } from "crypto";

import jwt, { type JwtPayload, type SignOptions } from "jsonwebtoken";

import { env } from "../../config/env.js";
import { isRole, type Role } from "../../domain/enums.js";
import { AppError } from "../../utils/errors.js";

export type AccessClaims = {
  sub: string; // user id
  role: Role;
  type: "access";
  jti: string;
  iat?: number;
  exp?: number;
};

export type RefreshClaims = {
  sub: string;
  type: "refresh";
  jti: string; // session id, stored in Redis
  iat?: number;
  exp?: number;
};

export class TokenError extends AppError {
  constructor(message = "Invalid token", code = "INVALID_TOKEN") {
    super(message, { status: 401, code });
  }
}

export function newJti(): string {
  return randomUUID();
}

const UNIT_SECONDS: Record<string, number> = { s: 1, m: 60, h: 3600, d: 86_400 };

/** "15m", "30d", "3600" -> seconds */
export function ttlSeconds(ttl: string): number {
  const m = /^(\d+)([smhd]?)$/.exec(ttl.trim());
  if (!m) throw new Error(`Invalid token TTL: ${ttl}`);
  return Number(m[1]) * (UNIT_SECONDS[m[2]] ?? 1);
}

function signOptions(ttl: string, jti: string): SignOptions {
  return {
    algorithm: "HS256",
    expiresIn: ttlSeconds(ttl),
    issuer: env.JWT_ISS,
    audience: env.JWT_AUD,
    jwtid: jti,
  };
}

export function signAccessToken(input: { sub: string; role: Role; jti?: string }): string {
  return jwt.sign({ role: input.role, type: "access" }, env.JWT_SECRET, {
    ...signOptions(env.JWT_ACCESS_TTL, input.jti ?? newJti()),
    subject: input.sub,
  });
}

export function signRefreshToken(input: { sub: string; jti?: string }): string {
  return jwt.sign({ type: "refresh" }, env.JWT_REFRESH_SECRET, {
    ...signOptions(env.JWT_REFRESH_TTL, input.jti ?? newJti()),
    subject: input.sub,
  });
}

function verify(token: string, secret: string): JwtPayload {
  let decoded: string | JwtPayload;
  try {
    decoded = jwt.verify(token, secret, {
      algorithms: ["HS256"],
      issuer: env.JWT_ISS,
      audience: env.JWT_AUD,
    });
  } catch (err: unknown) {
    throw new TokenError(err instanceof Error ? err.message : "Invalid token");
  }
  if (typeof decoded === "string") throw new TokenError();
  return decoded;
}

export function verifyAccess(token: string): AccessClaims {
  const d = verify(token, env.JWT_SECRET);
  if (d.type !== "access") throw new TokenError("Invalid token type");
  if (typeof d.sub !== "string" || typeof d.jti !== "string" || !isRole(d.role)) throw new TokenError();
  return { sub: d.sub, role: d.role, type: "access", jti: d.jti, iat: d.iat, exp: d.exp };
}

export function verifyRefresh(token: string): RefreshClaims {
  const d = verify(token, env.JWT_REFRESH_SECRET);
  if (d.type !== "refresh") throw new TokenError("Invalid token type", "INVALID_REFRESH");
  if (typeof d.sub !== "string" || typeof d.jti !== "string") throw new TokenError("Invalid token", "INVALID_REFRESH");
  return { sub: d.sub, type: "refresh", jti: d.jti, iat: d.iat, exp: d.exp };
}
