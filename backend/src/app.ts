// backend/src/app.ts

import express, { type NextFunction, type Request, type Response } from "express";
import cors from "cors";
import type { Catalog } from "./state/curriculumCatalog";
import { createProgressionController } from "./state/progressionController";
import type { AppStore } from "./storage/types";
import { createRoadmapController } from "./controllers/roadmapController";
import { createAuthRouter } from "./routes/auth";
import { createRoadmapRouter } from "./routes/roadmap";
import { createAssessmentRouter } from "./routes/assessment";
import { createProfileRouter } from "./routes/profile";
import { createResumeRouter } from "./routes/resume";
import { createAuthMiddleware } from "./middleware/auth";
import { requestContextMiddleware } from "./middleware/requestContext";
import { errorEnvelopeMiddleware } from "./middleware/errorEnvelope";
import { createRateLimitMiddleware, type RateLimitOptions } from "./middleware/rateLimit";
import { sendError, getRequestId } from "./http/sendError";
import { isRecord } from "./validation/guards";
import { logServerError } from "./utils/logger";

export type AppDeps = {
  catalog: Catalog;
  store: AppStore;
  corsOrigin?: string;
  rateLimit?: RateLimitOptions;
};

function isBodyParseError(err: unknown): boolean {
  return isRecord(err) && err.type === "entity.parse.failed";
}

export function createApp({ catalog, store, corsOrigin = "*", rateLimit }: AppDeps) {
  const progression = createProgressionController({ catalog, store });
  const requireAuth = createAuthMiddleware(store);

  const app = express();

  app.use(
    cors({
      origin: corsOrigin,
      methods: ["GET", "POST", "PUT"],
    })
  );

  app.use(requestContextMiddleware);
  app.use(errorEnvelopeMiddleware);

  //body size limit
  app.use(express.json({ limit: "1mb" }));

  app.use(createRateLimitMiddleware(rateLimit ?? { max: 120, windowMs: 60_000 }));

  // public routes BEFORE auth
  app.get("/", (_req, res) => res.status(200).json({ ok: true, message: "Roadmap backend running" }));
  app.get("/health", (_req, res) => res.status(200).json({ status: "ok" }));
  app.get("/domains", createRoadmapController(progression).listDomains);
  app.use("/auth", createAuthRouter(store, requireAuth));

  app.use(requireAuth);

  app.use("/roadmap", createRoadmapRouter(progression));
  app.use("/assessment", createAssessmentRouter(progression));
  app.use("/resume", createResumeRouter(store));
  app.use("/", createProfileRouter(store, progression));

  //404
  app.use((_req, res) => sendError(res, 404, "Not Found", "NOT_FOUND"));

  //error handler
  app.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (isBodyParseError(err)) {
      return sendError(res, 400, "Invalid JSON body", "INVALID_JSON");
    }
    logServerError("unhandled_error", err, getRequestId(res));
    if (res.headersSent) return next(err);
    return sendError(res, 500, "Server error", "SERVER_ERROR");
  });

  return app;
}
