import { Router } from "express";

import { register, login, refresh, logout } from "./controller.js";
import { rateLimitIP } from "../../middlewares/rateLimit.js";

export const authRouter = Router();

// Register: full identity + strong password; auto-login
authRouter.post("/register", rateLimitIP({ windowMs: 60_000, max: 10 }), register);

// Login: light IP rate limit (5/min)
authRouter.post("/login", rateLimitIP({ windowMs: 60_000, max: 5 }), login);

// Refresh: rotate token, 10/min per IP
authRouter.post("/refresh", rateLimitIP({ windowMs: 60_000, max: 10 }), refresh);

// Logout: revoke current session, 30/min per IP
authRouter.post("/logout", rateLimitIP({ windowMs: 60_000, max: 30 }), logout);

export default authRouter;
