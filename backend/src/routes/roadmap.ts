// backend/src/routes/roadmap.ts

import { Router } from "express";
import { createRoadmapController } from "../controllers/roadmapController";
import type { ProgressionController } from "../state/progressionController";

export function createRoadmapRouter(progression: ProgressionController) {
  const router = Router();
  const roadmap = createRoadmapController(progression);

  router.get("/:domain", roadmap.getRoadmap);

  return router;
}
