// backend/src/controllers/profileController.ts

import type { Request, Response } from "express";
import type { AccountStore } from "../storage/types";
import { parseProfilePatch } from "../validation/requestValidators";
import { sendError } from "../http/sendError";
import { authUser } from "../middleware/auth";
import { logServerError } from "../utils/logger";

export function createProfileController(accounts: AccountStore) {
  // GET /me
  const getMe = (_req: Request, res: Response) => {
    const user = authUser(res);
    if (!user) return sendError(res, 401, "Unauthorized", "UNAUTHORIZED");

    return res.status(200).json({
      first_name: user.firstName,
      last_name: user.lastName,
      email: user.email,
      phone: user.phone,
      qualification: user.qualification,
      progress: user.progress,
    });
  };

  // PUT /me
  const updateMe = async (req: Request, res: Response) => {
    const user = authUser(res);
    if (!user) return sendError(res, 401, "Unauthorized", "UNAUTHORIZED");

    const parsed = parseProfilePatch(req.body);
    if (!parsed.ok) return sendError(res, 400, parsed.errors.join("; "), "INVALID_REQUEST");

    try {
      await accounts.updateProfile(user.userId, parsed.value);
      return res.status(200).json({ ok: true });
    } catch (err) {
      logServerError("updateMe", err, res.locals?.requestId);
      return sendError(res, 500, "Failed to update profile", "SERVER_ERROR");
    }
  };

  return { getMe, updateMe };
}
