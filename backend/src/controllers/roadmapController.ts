// backend/src/controllers/roadmapController.ts

import type { Request, Response } from "express";
import type { ProgressionController } from "../state/progressionController";
import { ProgressionError } from "../state/progressionErrors";
import { sendError } from "../http/sendError";
import { sendProgressionError } from "../http/progressionErrorResponse";
import { authUser } from "../middleware/auth";
import { logServerError } from "../utils/logger";

export function createRoadmapController(progression: ProgressionController) {
  // GET /domains
  const listDomains = (_req: Request, res: Response) => {
    return res.status(200).json({ domains: progression.listDomains() });
  };

  // GET /roadmap/:domain
  const getRoadmap = async (req: Request, res: Response) => {
    const user = authUser(res);
    if (!user) return sendError(res, 401, "Unauthorized", "UNAUTHORIZED");

    const domain = typeof req.params.domain === "string" ? req.params.domain : "";

    try {
      const view = await progression.getRoadmap(domain, user.userId);
      return res.status(200).json({ steps: view.steps, progress: view.progress });
    } catch (err) {
      if (err instanceof ProgressionError) return sendProgressionError(res, err);
      logServerError("getRoadmap", err, res.locals?.requestId);
      return sendError(res, 500, "Failed to load roadmap", "SERVER_ERROR");
    }
  };

  return { listDomains, getRoadmap };
}
