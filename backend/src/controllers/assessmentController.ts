// backend/src/controllers/assessmentController.ts

import type { Request, Response } from "express";
import type { ProgressionController } from "../state/progressionController";
import { ProgressionError } from "../state/progressionErrors";
import { parseSubmitAssessmentBody } from "../validation/requestValidators";
import { sendError } from "../http/sendError";
import { sendProgressionError } from "../http/progressionErrorResponse";
import { authUser } from "../middleware/auth";
import { logServerError } from "../utils/logger";

export function createAssessmentController(progression: ProgressionController) {
  // POST /assessment/submit
  const submit = async (req: Request, res: Response) => {
    const user = authUser(res);
    if (!user) return sendError(res, 401, "Unauthorized", "UNAUTHORIZED");

    const parsed = parseSubmitAssessmentBody(req.body);
    if (!parsed.ok) {
      return sendError(res, 400, parsed.errors.join("; "), "INVALID_REQUEST");
    }

    const { domain, stepIndex, answers } = parsed.value;

    try {
      const result = await progression.submitAssessment({
        domain,
        stepIndex,
        answers,
        userId: user.userId,
      });

      return res.status(200).json({
        score: result.score,
        total: result.total,
        passed: result.passed,
        results: result.results,
        advanced: result.advanced,
        progress: result.progress,
      });
    } catch (err) {
      if (err instanceof ProgressionError) return sendProgressionError(res, err);
      logServerError("submitAssessment", err, res.locals?.requestId);
      return sendError(res, 500, "Failed to submit assessment", "SERVER_ERROR");
    }
  };

  return { submit };
}
