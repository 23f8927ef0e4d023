// backend/src/controllers/__tests__/roadmap.dashboard.test.ts

import { describe, expect, it, vi, beforeEach } from "vitest";
import type { Request, Response } from "express";
import { createRoadmapController } from "../roadmapController";
import { createDashboardController, toAttemptView } from "../dashboardController";
import { createProgressionController, type ProgressionController } from "../../state/progressionController";
import { loadCatalog } from "../../state/curriculumCatalog";
import { createMemoryStore } from "../../storage/memoryStore";
import type { UserRecord } from "../../storage/types";

function makeRes(user?: UserRecord) {
  const res: Partial<Response> = { locals: user ? { user } : {} };
  res.status = vi.fn().mockReturnValue(res);
  res.json = vi.fn().mockReturnValue(res);
  return res as Response;
}

function body(res: Response) {
  return (res.json as any).mock.calls[0][0];
}

describe("roadmap and dashboard controllers", () => {
  let user: UserRecord;
  let progression: ProgressionController;

  beforeEach(async () => {
    const store = createMemoryStore(() => new Date("2026-05-04T12:00:00.000Z"));
    const userId = await store.createUser({
      firstName: "Test",
      lastName: "Learner",
      email: "learner@example.com",
      phone: "0123456789",
      qualification: "BCA",
      passwordHash: "00",
      salt: "00",
    });
    const found = await store.findUserById(userId);
    if (!found) throw new Error("user missing");
    user = found;
    progression = createProgressionController({ catalog: loadCatalog(), store });
  });

  it("lists domains without authentication", () => {
    const res = makeRes();

    createRoadmapController(progression).listDomains({} as Request, res);

    expect(body(res)).toEqual({ domains: ["Frontend Development", "Backend Development", "AI/ML"] });
  });

  it("returns the roadmap with lock flags for the user", async () => {
    const res = makeRes(user);
    const req = { params: { domain: "AI/ML" } } as unknown as Request;

    await createRoadmapController(progression).getRoadmap(req, res);

    expect(res.status).toHaveBeenCalledWith(200);
    const payload = body(res);
    expect(payload.progress).toBe(0);
    expect(payload.steps.map((s: { locked: boolean }) => s.locked)).toEqual([false, true, true, true, true]);
    expect(payload.steps[0].quiz.questions[0]).not.toHaveProperty("correctOptionIndex");
  });

  it("returns 404 for an unknown domain", async () => {
    const res = makeRes(user);
    const req = { params: { domain: "Cooking" } } as unknown as Request;

    await createRoadmapController(progression).getRoadmap(req, res);

    expect(res.status).toHaveBeenCalledWith(404);
    expect(body(res)).toEqual({ error: "Domain not found: Cooking", code: "DOMAIN_NOT_FOUND" });
  });

  it("reports attempts in wire form and percentages per domain", async () => {
    await progression.submitAssessment({ domain: "Backend Development", stepIndex: 1, answers: [0], userId: user.userId });
    const res = makeRes(user);

    await createDashboardController(progression).getDashboard({} as Request, res);

    expect(res.status).toHaveBeenCalledWith(200);
    const payload = body(res);
    expect(payload.progress).toEqual({
      "Frontend Development": 0,
      "Backend Development": 20,
      "AI/ML": 0,
    });
    expect(payload.attempts).toEqual([
      {
        id: expect.any(String),
        domain: "Backend Development",
        step_index: 1,
        score: 1,
        total: 1,
        passed: true,
        created_at: "2026-05-04T12:00:00.000Z",
      },
    ]);
  });

  it("maps an attempt to snake_case fields", () => {
    expect(
      toAttemptView({
        id: "a1",
        userId: "u1",
        domain: "AI/ML",
        stepIndex: 2,
        score: 12,
        total: 20,
        passed: true,
        createdAt: new Date("2026-01-01T00:00:00.000Z"),
      })
    ).toEqual({
      id: "a1",
      domain: "AI/ML",
      step_index: 2,
      score: 12,
      total: 20,
      passed: true,
      created_at: "2026-01-01T00:00:00.000Z",
    });
  });
});
