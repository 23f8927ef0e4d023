// backend/src/state/__tests__/curriculumCatalog.test.ts

import { describe, it, expect } from "vitest";
import {
  buildCatalog,
  catalogFromJson,
  CurriculumValidationError,
  loadCatalog,
} from "../curriculumCatalog";
import { DomainNotFoundError, StepNotFoundError } from "../progressionErrors";
import type { CurriculumSource } from "../../validation/curriculumValidator";

function makeBank(size = 20) {
  return Array.from({ length: size }, (_, i) => ({
    prompt: `Bank question ${i + 1}`,
    options: ["a", "b", "c"],
    correctOptionIndex: i % 3,
  }));
}

function makeSource(): CurriculumSource {
  return {
    domains: [
      {
        name: "Testing",
        lessons: [
          {
            title: "Unit tests",
            description: "Small checks.",
            videos: ["https://example.com/v1"],
            questions: [{ prompt: "Fast?", options: ["yes", "no"], correctOptionIndex: 0 }],
          },
          {
            title: "Mocks",
            description: "Stand-ins.",
            videos: [],
            questions: [{ prompt: "Real?", options: ["yes", "no"], correctOptionIndex: 1 }],
          },
        ],
      },
      { name: "Empty", lessons: [] },
    ],
    assessmentBank: makeBank(),
  };
}

describe("buildCatalog", () => {
  it("interleaves an assessment after every lesson and ends with a final assessment", () => {
    const catalog = buildCatalog(makeSource());
    const steps = catalog.getSteps("Testing");

    expect(steps.map((s) => s.index)).toEqual([1, 2, 3, 4, 5]);
    expect(steps.map((s) => s.kind)).toEqual([
      "lesson",
      "assessment",
      "lesson",
      "assessment",
      "assessment",
    ]);
    expect(steps[1]).toMatchObject({ kind: "assessment", covers: 1, title: "Assessment: Unit tests" });
    expect(steps[3]).toMatchObject({ kind: "assessment", covers: 3, title: "Assessment: Mocks" });
    expect(steps[4]).toMatchObject({ kind: "assessment", covers: "final", title: "Final Assessment" });
  });

  it("gives a domain without lessons a single final assessment", () => {
    const catalog = buildCatalog(makeSource());
    const steps = catalog.getSteps("Empty");

    expect(steps).toHaveLength(1);
    expect(steps[0]).toMatchObject({ index: 1, kind: "assessment", covers: "final" });
  });

  it("shares one question bank instance between every assessment step", () => {
    const catalog = buildCatalog(makeSource());
    const assessments = [...catalog.getSteps("Testing"), ...catalog.getSteps("Empty")].filter(
      (s) => s.kind === "assessment"
    );

    expect(assessments).toHaveLength(4);
    for (const a of assessments) {
      expect(a.quiz).toBe(assessments[0].quiz);
      expect(a.quiz).toHaveLength(20);
    }
  });

  it("is deterministic for the same source", () => {
    const first = buildCatalog(makeSource());
    const second = buildCatalog(makeSource());

    expect(second.listDomains()).toEqual(first.listDomains());
    expect(second.getSteps("Testing")).toEqual(first.getSteps("Testing"));
  });

  it("returns frozen steps", () => {
    const catalog = buildCatalog(makeSource());
    const steps = catalog.getSteps("Testing");

    expect(Object.isFrozen(steps)).toBe(true);
    expect(Object.isFrozen(steps[0])).toBe(true);
    expect(Object.isFrozen(steps[0].quiz)).toBe(true);
  });

  it("looks steps up by 1-based index", () => {
    const catalog = buildCatalog(makeSource());

    expect(catalog.getStep("Testing", 3)).toMatchObject({ kind: "lesson", title: "Mocks" });
    expect(catalog.stepCount("Testing")).toBe(5);
    expect(catalog.hasDomain("Testing")).toBe(true);
    expect(catalog.hasDomain("Cooking")).toBe(false);
  });

  it("signals unknown domains and steps", () => {
    const catalog = buildCatalog(makeSource());

    expect(() => catalog.getSteps("Cooking")).toThrow(DomainNotFoundError);
    expect(() => catalog.stepCount("Cooking")).toThrow(DomainNotFoundError);
    expect(() => catalog.getStep("Testing", 6)).toThrow(StepNotFoundError);
    expect(() => catalog.getStep("Testing", 0)).toThrow(StepNotFoundError);
    expect(() => catalog.getStep("Testing", 1.5)).toThrow(StepNotFoundError);
  });
});

describe("catalogFromJson", () => {
  it("rejects content that fails validation", () => {
    const bad = { domains: [{ name: "Broken", lessons: [{ title: "", description: "x", questions: [] }] }] };

    expect(() => catalogFromJson(bad, { questions: makeBank() })).toThrow(CurriculumValidationError);
  });
});

describe("loadCatalog", () => {
  it("loads the shipped roadmaps once", () => {
    const catalog = loadCatalog();

    expect(loadCatalog()).toBe(catalog);
    expect(catalog.listDomains()).toEqual(["Frontend Development", "Backend Development", "AI/ML"]);
  });

  it("keeps every shipped domain contiguous and closed by an assessment", () => {
    const catalog = loadCatalog();

    for (const domain of catalog.listDomains()) {
      const steps = catalog.getSteps(domain);
      expect(steps.map((s) => s.index)).toEqual(steps.map((_, i) => i + 1));
      expect(steps[steps.length - 1].kind).toBe("assessment");
      steps.forEach((s, i) => {
        if (s.kind === "lesson") expect(steps[i + 1].kind).toBe("assessment");
      });
    }
  });

  it("expands Backend Development into five steps", () => {
    const steps = loadCatalog().getSteps("Backend Development");

    expect(steps.map((s) => `${s.kind}:${s.title}`)).toEqual([
      "lesson:HTTP & REST",
      "assessment:Assessment: HTTP & REST",
      "lesson:Databases",
      "assessment:Assessment: Databases",
      "assessment:Final Assessment",
    ]);
    expect(steps[0].quiz).toHaveLength(1);
    expect(steps[1].quiz).toHaveLength(20);
  });
});
