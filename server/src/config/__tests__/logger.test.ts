import { describe, it, expect } from "vitest";

import { redact } from "../logger.js";

describe("redact", () => {
  it("masks sensitive keys at any depth", () => {
    expect(
      redact({
        email: "driver@example.com",
        password: "test-password",
        payment: { cardNumber: "4111111111111111", last4: "1111" },
        headers: [{ Authorization: "Bearer test-token" }],
      })
    ).toEqual({
      email: "driver@example.com",
      password: "[redacted]",
      payment: { cardNumber: "[redacted]", last4: "1111" },
      headers: [{ Authorization: "[redacted]" }],
    });
  });

  it("leaves scalars and dates alone", () => {
    const at = new Date("2030-01-01T00:00:00Z");
    expect(redact("plain")).toBe("plain");
    expect(redact(null)).toBeNull();
    expect(redact({ at })).toEqual({ at });
  });

  it("stops descending past the depth limit", () => {
    const deep = { a: { b: { c: { d: { e: { secret: "x" } } } } } };
    expect(redact(deep)).toEqual({ a: { b: { c: { d: { e: { secret: "x" } } } } } });
  });
});
