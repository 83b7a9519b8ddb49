/** Refresh sessions in Redis: one key per (user, jti), expiring together with the token. */
import { key, redisClient } from "../../config/redis.js";

export type RefreshSession = {
  userId: string;
  jti: string;
  /** epoch seconds, from the JWT */
  exp?: number;
  iat?: number;
  ip?: string | null;
  ua?: string | null;
};

const sessionKey = (userId: string, jti: string) => key("refresh", userId, jti);

function secondsLeft(exp: number | undefined, nowSec = Math.floor(Date.now() / 1000)): number {
  return typeof exp === "number" ? Math.max(exp - nowSec, 1) : 1;
}

export async function openSession(s: RefreshSession): Promise<void> {
  const c = await redisClient();
  const value = JSON.stringify({ ip: s.ip ?? null, ua: s.ua ?? null, iat: s.iat ?? null, exp: s.exp ?? null });
  await c.set(sessionKey(s.userId, s.jti), value, { EX: secondsLeft(s.exp) });
}

/**
 * Deletes the session and reports whether it existed. Only one caller can win the
 * DEL, so a refresh token replayed concurrently is honoured once.
 */
export async function consumeSession(userId: string, jti: string): Promise<boolean> {
  const c = await redisClient();
  return (await c.del(sessionKey(userId, jti))) === 1;
}

/** Drops every refresh session of a user (role change, account removal). */
export async function revokeAllSessionsForUser(userId: string): Promise<number> {
  const c = await redisClient();
  const keys: string[] = [];
  for await (const k of c.scanIterator({ MATCH: sessionKey(userId, "*"), COUNT: 100 })) keys.push(k);
  return keys.length ? c.del(keys) : 0;
}
