// backend/src/controllers/resumeController.ts

import type { Request, Response } from "express";
import { emptyResume, type ResumeStore } from "../storage/types";
import { parseResumeBody } from "../validation/requestValidators";
import { renderResumeHtml } from "../services/resumeRenderer";
import { sendError } from "../http/sendError";
import { authUser } from "../middleware/auth";
import { logServerError } from "../utils/logger";

export function createResumeController(resumes: ResumeStore) {
  // POST /resume
  const upsertResume = async (req: Request, res: Response) => {
    const user = authUser(res);
    if (!user) return sendError(res, 401, "Unauthorized", "UNAUTHORIZED");

    const parsed = parseResumeBody(req.body);
    if (!parsed.ok) return sendError(res, 400, parsed.errors.join("; "), "INVALID_REQUEST");

    try {
      await resumes.upsertResume(user.userId, parsed.value);
      return res.status(200).json({ ok: true });
    } catch (err) {
      logServerError("upsertResume", err, res.locals?.requestId);
      return sendError(res, 500, "Failed to save resume", "SERVER_ERROR");
    }
  };

  // GET /resume
  const getResume = async (_req: Request, res: Response) => {
    const user = authUser(res);
    if (!user) return sendError(res, 401, "Unauthorized", "UNAUTHORIZED");

    try {
      const resume = (await resumes.getResume(user.userId)) ?? emptyResume();
      return res.status(200).json(resume);
    } catch (err) {
      logServerError("getResume", err, res.locals?.requestId);
      return sendError(res, 500, "Failed to load resume", "SERVER_ERROR");
    }
  };

  // GET /resume/download
  const downloadResume = async (_req: Request, res: Response) => {
    const user = authUser(res);
    if (!user) return sendError(res, 401, "Unauthorized", "UNAUTHORIZED");

    try {
      const resume = (await resumes.getResume(user.userId)) ?? emptyResume();
      return res.status(200).json({ html: renderResumeHtml(user, resume) });
    } catch (err) {
      logServerError("downloadResume", err, res.locals?.requestId);
      return sendError(res, 500, "Failed to render resume", "SERVER_ERROR");
    }
  };

  return { upsertResume, getResume, downloadResume };
}
