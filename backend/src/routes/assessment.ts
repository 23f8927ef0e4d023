// backend/src/routes/assessment.ts

import { Router } from "express";
import { createAssessmentController } from "../controllers/assessmentController";
import type { ProgressionController } from "../state/progressionController";

export function createAssessmentRouter(progression: ProgressionController) {
  const router = Router();
  const assessment = createAssessmentController(progression);

  router.post("/submit", assessment.submit);

  return router;
}
