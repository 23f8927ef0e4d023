// backend/src/routes/profile.ts

import { Router } from "express";
import { createProfileController } from "../controllers/profileController";
import { createDashboardController } from "../controllers/dashboardController";
import type { ProgressionController } from "../state/progressionController";
import type { AccountStore } from "../storage/types";

// /me and /dashboard: everything about the signed-in learner.
export function createProfileRouter(accounts: AccountStore, progression: ProgressionController) {
  const router = Router();
  const profile = createProfileController(accounts);
  const dashboard = createDashboardController(progression);

  router.get("/me", profile.getMe);
  router.put("/me", profile.updateMe);
  router.get("/dashboard", dashboard.getDashboard);

  return router;
}
