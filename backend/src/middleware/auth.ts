// backend/src/middleware/auth.ts

import type { NextFunction, Request, Response } from "express";
import { sendError } from "../http/sendError";
import type { AccountStore, UserRecord } from "../storage/types";
import { logServerError } from "../utils/logger";

export function extractBearerToken(rawAuth: string | undefined): string | null {
  if (!rawAuth) return null;
  const m = rawAuth.match(/^Bearer\s+(.+)$/i);
  if (!m) return null;
  const token = m[1]?.trim();
  return token ? token : null;
}

/**
 * Resolves the bearer token to a user and stores it on res.locals.user
 * (and the token on res.locals.token). Rejects with 401 otherwise.
 */
export function createAuthMiddleware(accounts: Pick<AccountStore, "findUserByToken">) {
  return async function authMiddleware(req: Request, res: Response, next: NextFunction) {
    if (req.method === "OPTIONS") return next();

    const rawAuth = req.get("authorization");
    if (!rawAuth) {
      return sendError(res, 401, "Missing Authorization token", "MISSING_TOKEN");
    }

    const token = extractBearerToken(rawAuth);
    if (!token) {
      return sendError(res, 401, "Invalid token", "UNAUTHORIZED");
    }

    let user: UserRecord | null;
    try {
      user = await accounts.findUserByToken(token);
    } catch (err) {
      logServerError("authMiddleware", err, res.locals?.requestId);
      return sendError(res, 500, "Server error", "SERVER_ERROR");
    }

    if (!user) {
      return sendError(res, 401, "Invalid token", "UNAUTHORIZED");
    }

    res.locals.user = user;
    res.locals.token = token;
    return next();
  };
}

/** The user placed on the response by the auth middleware, if any. */
export function authUser(res: Response): UserRecord | null {
  const user: UserRecord | undefined = res.locals.user;
  return user ?? null;
}
