// backend/src/routes/resume.ts

import { Router } from "express";
import { createResumeController } from "../controllers/resumeController";
import type { ResumeStore } from "../storage/types";

export function createResumeRouter(resumes: ResumeStore) {
  const router = Router();
  const resume = createResumeController(resumes);

  router.post("/", resume.upsertResume);
  router.get("/", resume.getResume);
  router.get("/download", resume.downloadResume);

  return router;
}
