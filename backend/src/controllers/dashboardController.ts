// backend/src/controllers/dashboardController.ts

import type { Request, Response } from "express";
import type { ProgressionController } from "../state/progressionController";
import { ProgressionError } from "../state/progressionErrors";
import type { Attempt } from "../storage/types";
import { sendError } from "../http/sendError";
import { sendProgressionError } from "../http/progressionErrorResponse";
import { authUser } from "../middleware/auth";
import { logServerError } from "../utils/logger";

export function toAttemptView(a: Attempt) {
  return {
    id: a.id,
    domain: a.domain,
    step_index: a.stepIndex,
    score: a.score,
    total: a.total,
    passed: a.passed,
    created_at: a.createdAt.toISOString(),
  };
}

export function createDashboardController(progression: ProgressionController) {
  // GET /dashboard
  const getDashboard = async (_req: Request, res: Response) => {
    const user = authUser(res);
    if (!user) return sendError(res, 401, "Unauthorized", "UNAUTHORIZED");

    try {
      const dashboard = await progression.getDashboard(user.userId);
      return res.status(200).json({
        attempts: dashboard.attempts.map(toAttemptView),
        progress: dashboard.progressPercent,
      });
    } catch (err) {
      if (err instanceof ProgressionError) return sendProgressionError(res, err);
      logServerError("getDashboard", err, res.locals?.requestId);
      return sendError(res, 500, "Failed to load dashboard", "SERVER_ERROR");
    }
  };

  return { getDashboard };
}
