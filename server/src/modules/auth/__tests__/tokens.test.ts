import { describe, it, expect } from "vitest";

import { signAccessToken, signRefreshToken, TokenError, ttlSeconds, verifyAccess, verifyRefresh } from "../tokens.js";

describe("ttlSeconds", () => {
  it("reads unit suffixes", () => {
    expect(ttlSeconds("45s")).toBe(45);
    expect(ttlSeconds("15m")).toBe(900);
    expect(ttlSeconds("2h")).toBe(7200);
    expect(ttlSeconds("30d")).toBe(2_592_000);
    expect(ttlSeconds("3600")).toBe(3600);
  });

  it("rejects anything else", () => {
    expect(() => ttlSeconds("soon")).toThrow("Invalid token TTL: soon");
  });
});

describe("access and refresh tokens", () => {
  it("round-trips access claims", () => {
    const claims = verifyAccess(signAccessToken({ sub: "user-1", role: "ADMIN", jti: "jti-1" }));
    expect(claims).toMatchObject({ sub: "user-1", role: "ADMIN", type: "access", jti: "jti-1" });
    expect(claims.exp).toBeTypeOf("number");
  });

  it("round-trips refresh claims", () => {
    const claims = verifyRefresh(signRefreshToken({ sub: "user-1", jti: "session-1" }));
    expect(claims).toMatchObject({ sub: "user-1", type: "refresh", jti: "session-1" });
  });

  it("refuses a refresh token where an access token belongs", () => {
    expect(() => verifyAccess(signRefreshToken({ sub: "user-1" }))).toThrow(TokenError);
  });

  it("refuses garbage with a 401", () => {
    try {
      verifyRefresh("not-a-token");
      expect.unreachable();
    } catch (err: unknown) {
      expect(err).toBeInstanceOf(TokenError);
      expect(err).toMatchObject({ status: 401, code: "INVALID_TOKEN" });
    }
  });
});
