// backend/src/http/progressionErrorResponse.ts

import type { Response } from "express";
import type { ProgressionError, ProgressionErrorKind } from "../state/progressionErrors";
import { sendError } from "./sendError";

const STATUS_BY_KIND: Record<ProgressionErrorKind, number> = {
  DOMAIN_NOT_FOUND: 404,
  STEP_NOT_FOUND: 404,
  USER_NOT_FOUND: 404,
  OUT_OF_SEQUENCE: 400,
  ANSWER_COUNT_MISMATCH: 400,
};

export function statusForProgressionError(err: ProgressionError): number {
  return STATUS_BY_KIND[err.kind];
}

export function sendProgressionError(res: Response, err: ProgressionError): Response {
  return sendError(res, statusForProgressionError(err), err.message, err.kind);
}
