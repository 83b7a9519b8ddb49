import express from "express";
import { describe, it, expect } from "vitest";

import { call } from "./harness.js";
import { rateLimit, rateLimitIP } from "../rateLimit.js";

describe("rateLimit (fixed window)", () => {
  it("counts down and then refuses", async () => {
    let t = 1_000_000;
    const app = express();
    app.use(rateLimit({ windowMs: 10_000, max: 2, now: () => t }));
    app.get("/", (_req, res) => {
      res.json({ ok: true });
    });

    const first = await call(app, "/");
    expect(first.status).toBe(200);
    expect(first.headers.get("x-ratelimit-remaining")).toBe("1");
    expect((await call(app, "/")).status).toBe(200);

    const third = await call(app, "/");
    expect(third.status).toBe(429);
    expect(third.body).toEqual({ error: { code: "RATE_LIMITED", message: "Too many requests" } });

    t += 10_001;
    expect((await call(app, "/")).status).toBe(200);
  });
});

describe("rateLimitIP (sliding window)", () => {
  it("reports when to retry", async () => {
    let t = 0;
    const app = express();
    app.post("/login", rateLimitIP({ windowMs: 60_000, max: 1, now: () => t }), (_req, res) => {
      res.json({ ok: true });
    });

    expect((await call(app, "/login", { method: "POST" })).status).toBe(200);
    t = 15_000;
    const blocked = await call(app, "/login", { method: "POST" });

    expect(blocked.status).toBe(429);
    expect(blocked.body).toEqual({
      error: { code: "RATE_LIMIT", message: "Too many attempts, try again later.", retryAfterSeconds: 45 },
    });
  });
});

describe("limiter memory", () => {
  const from = (ip: string) => ({ headers: { "x-forwarded-for": ip } });

  it("forgets clients whose fixed window has ended", async () => {
    let t = 100_000;
    const limiter = rateLimit({ windowMs: 10_000, max: 5, now: () => t });
    const app = express();
    app.set("trust proxy", true);
    app.use(limiter);
    app.get("/", (_req, res) => {
      res.json({ ok: true });
    });

    await call(app, "/", from("10.0.0.1"));
    await call(app, "/", from("10.0.0.2"));
    expect(limiter.tracked()).toBe(2);

    t += 20_000;
    await call(app, "/", from("10.0.0.3"));
    expect(limiter.tracked()).toBe(1);
  });

  it("forgets clients with no hit inside the sliding window", async () => {
    let t = 100_000;
    const limiter = rateLimitIP({ windowMs: 60_000, max: 5, now: () => t });
    const app = express();
    app.set("trust proxy", true);
    app.post("/login", limiter, (_req, res) => {
      res.json({ ok: true });
    });

    await call(app, "/login", { method: "POST", ...from("10.0.0.1") });
    t += 30_000;
    await call(app, "/login", { method: "POST", ...from("10.0.0.2") });
    expect(limiter.tracked()).toBe(2);

    // 10.0.0.1 last seen 70s ago, 10.0.0.2 40s ago
    t += 40_000;
    await call(app, "/login", { method: "POST", ...from("10.0.0.3") });
    expect(limiter.tracked()).toBe(2);
  });
});
