// backend/src/middleware/errorEnvelope.ts

import type { Request, Response, NextFunction } from "express";
import { isRecord } from "../validation/guards";
import { getRequestId } from "../http/sendError";

function isErrorPayload(body: unknown): body is Record<string, unknown> & { error: unknown } {
  return isRecord(body) && "error" in body;
}

/** Adds the request id to every `{ error }` payload, however it was produced. */
export function errorEnvelopeMiddleware(_req: Request, res: Response, next: NextFunction) {
  const originalJson = res.json.bind(res);

  res.json = (body?: unknown) => {
    const requestId = getRequestId(res);
    if (requestId && isErrorPayload(body) && !("requestId" in body)) {
      return originalJson({ ...body, requestId });
    }
    return originalJson(body);
  };

  next();
}
