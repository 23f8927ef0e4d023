// backend/src/routes/auth.ts

import { Router, type RequestHandler } from "express";
import { createAuthController } from "../controllers/authController";
import type { AccountStore } from "../storage/types";

export function createAuthRouter(accounts: AccountStore, requireAuth: RequestHandler) {
  const router = Router();
  const auth = createAuthController(accounts);

  router.post("/register", auth.register);
  router.post("/login", auth.login);
  router.post("/change-password", requireAuth, auth.changePassword);
  router.post("/logout", requireAuth, auth.logout);

  return router;
}
