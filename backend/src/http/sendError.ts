// backend/src/http/sendError.ts

import type { Response } from "express";

export function getRequestId(res: Response): string | undefined {
  const rid: unknown = res.locals?.requestId;
  return typeof rid === "string" && rid.trim() ? rid : undefined;
}

export function sendError(
  res: Response,
  status: number,
  message: string,
  code?: string
): Response {
  const requestId = getRequestId(res);

  return res.status(status).json({
    error: message,
    ...(code ? { code } : {}),
    ...(requestId ? { requestId } : {}),
  });
}
