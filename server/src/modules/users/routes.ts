import { Router } from "express";

import { getMe, patchMe } from "./controller.js";
import { requireAuth } from "../../middlewares/auth.js";

const usersRouter = Router();

// current user
usersRouter.get("/me", requireAuth, getMe);
usersRouter.patch("/me", requireAuth, patchMe);

export default usersRouter;
