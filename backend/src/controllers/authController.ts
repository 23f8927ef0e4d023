// backend/src/controllers/authController.ts

import type { Request, Response } from "express";
import { DuplicateEmailError, type AccountStore } from "../storage/types";
import {
  ALLOWED_QUALIFICATIONS,
  parseChangePasswordBody,
  parseLoginBody,
  parseRegisterBody,
} from "../validation/requestValidators";
import { hashPassword, issueToken, verifyPassword } from "../services/credentials";
import { sendError } from "../http/sendError";
import { authUser } from "../middleware/auth";
import { logServerError } from "../utils/logger";

export function createAuthController(accounts: AccountStore) {
  // POST /auth/register
  const register = async (req: Request, res: Response) => {
    const parsed = parseRegisterBody(req.body);
    if (!parsed.ok) return sendError(res, 400, parsed.errors.join("; "), "INVALID_REQUEST");

    const body = parsed.value;
    if (!ALLOWED_QUALIFICATIONS.has(body.qualification)) {
      return sendError(
        res,
        400,
        "Only IT-related student qualifications are allowed",
        "INVALID_QUALIFICATION"
      );
    }

    try {
      if (await accounts.findUserByEmail(body.email)) {
        return sendError(res, 409, "Email already registered", "EMAIL_TAKEN");
      }

      const { hash, salt } = await hashPassword(body.password);
      const userId = await accounts.createUser({
        firstName: body.firstName,
        lastName: body.lastName,
        email: body.email,
        phone: body.phone,
        qualification: body.qualification,
        passwordHash: hash,
        salt,
      });

      return res.status(200).json({ ok: true, user_id: userId });
    } catch (err) {
      // Lost a race with a concurrent registration for the same email.
      if (err instanceof DuplicateEmailError) {
        return sendError(res, 409, "Email already registered", "EMAIL_TAKEN");
      }
      logServerError("register", err, res.locals?.requestId);
      return sendError(res, 500, "Failed to register", "SERVER_ERROR");
    }
  };

  // POST /auth/login
  const login = async (req: Request, res: Response) => {
    const parsed = parseLoginBody(req.body);
    if (!parsed.ok) return sendError(res, 400, parsed.errors.join("; "), "INVALID_REQUEST");

    try {
      const user = await accounts.findUserByEmail(parsed.value.email);
      const valid = user
        ? await verifyPassword(parsed.value.password, user.salt, user.passwordHash)
        : false;
      if (!user || !valid) {
        return sendError(res, 401, "Invalid credentials", "INVALID_CREDENTIALS");
      }

      const token = issueToken();
      await accounts.addToken(user.userId, token);

      return res.status(200).json({
        token,
        first_name: user.firstName,
        last_name: user.lastName,
      });
    } catch (err) {
      logServerError("login", err, res.locals?.requestId);
      return sendError(res, 500, "Failed to log in", "SERVER_ERROR");
    }
  };

  // POST /auth/change-password
  const changePassword = async (req: Request, res: Response) => {
    const user = authUser(res);
    if (!user) return sendError(res, 401, "Unauthorized", "UNAUTHORIZED");

    const parsed = parseChangePasswordBody(req.body);
    if (!parsed.ok) return sendError(res, 400, parsed.errors.join("; "), "INVALID_REQUEST");

    try {
      const ok = await verifyPassword(parsed.value.oldPassword, user.salt, user.passwordHash);
      if (!ok) return sendError(res, 400, "Old password incorrect", "INVALID_PASSWORD");

      const { hash, salt } = await hashPassword(parsed.value.newPassword);
      await accounts.updatePassword(user.userId, hash, salt);
      return res.status(200).json({ ok: true });
    } catch (err) {
      logServerError("changePassword", err, res.locals?.requestId);
      return sendError(res, 500, "Failed to change password", "SERVER_ERROR");
    }
  };

  // POST /auth/logout
  const logout = async (_req: Request, res: Response) => {
    const user = authUser(res);
    const token: unknown = res.locals.token;
    if (!user || typeof token !== "string") return sendError(res, 401, "Unauthorized", "UNAUTHORIZED");

    try {
      await accounts.removeToken(user.userId, token);
      return res.status(200).json({ ok: true });
    } catch (err) {
      logServerError("logout", err, res.locals?.requestId);
      return sendError(res, 500, "Failed to log out", "SERVER_ERROR");
    }
  };

  return { register, login, changePassword, logout };
}
