// backend/src/state/curriculumCatalog.ts

import fs from "fs";
import path from "path";
import {
  validateCurriculum,
  type CurriculumSource,
  type QuestionSource,
} from "../validation/curriculumValidator";
import { DomainNotFoundError, StepNotFoundError } from "./progressionErrors";

export type Question = {
  readonly prompt: string;
  readonly options: readonly string[];
  readonly correctOptionIndex: number;
};

export type QuestionSet = readonly Question[];

type StepBase = {
  readonly index: number;
  readonly title: string;
  readonly description: string;
  readonly quiz: QuestionSet;
};

export type LessonStep = StepBase & {
  readonly kind: "lesson";
  readonly videos: readonly string[];
};

export type AssessmentStep = StepBase & {
  readonly kind: "assessment";
  // Index of the lesson this assessment follows, or "final" for the closing one.
  readonly covers: number | "final";
};

export type Step = LessonStep | AssessmentStep;

export interface Catalog {
  listDomains(): readonly string[];
  hasDomain(domain: string): boolean;
  getSteps(domain: string): readonly Step[];
  getStep(domain: string, index: number): Step;
  stepCount(domain: string): number;
}

export class CurriculumValidationError extends Error {
  constructor(readonly problems: string[]) {
    super(`Invalid curriculum content:\n${problems.join("\n")}`);
    this.name = "CurriculumValidationError";
  }
}

function freezeQuestion(q: QuestionSource): Question {
  return Object.freeze({
    prompt: q.prompt,
    options: Object.freeze([...q.options]),
    correctOptionIndex: q.correctOptionIndex,
  });
}

function freezeQuestionSet(questions: QuestionSource[]): QuestionSet {
  return Object.freeze(questions.map(freezeQuestion));
}

/**
 * Expands every domain's base lessons into
 * [Lesson1, Assessment1, ..., LessonN, AssessmentN, FinalAssessment]
 * numbered 1..2N+1. All assessment steps share one question-bank instance.
 */
export function buildCatalog(source: CurriculumSource): Catalog {
  const bank = freezeQuestionSet(source.assessmentBank);
  const stepsByDomain = new Map<string, readonly Step[]>();

  for (const domain of source.domains) {
    const steps: Step[] = [];

    domain.lessons.forEach((lesson) => {
      const lessonIndex = steps.length + 1;
      const lessonStep: LessonStep = {
        kind: "lesson",
        index: lessonIndex,
        title: lesson.title,
        description: lesson.description,
        videos: Object.freeze([...lesson.videos]),
        quiz: freezeQuestionSet(lesson.questions),
      };
      const check: AssessmentStep = {
        kind: "assessment",
        index: lessonIndex + 1,
        title: `Assessment: ${lesson.title}`,
        description: `${bank.length}-question check on ${lesson.title}.`,
        covers: lessonIndex,
        quiz: bank,
      };
      steps.push(Object.freeze(lessonStep), Object.freeze(check));
    });

    const finalStep: AssessmentStep = {
      kind: "assessment",
      index: steps.length + 1,
      title: "Final Assessment",
      description: `${bank.length}-question check covering the whole ${domain.name} roadmap.`,
      covers: "final",
      quiz: bank,
    };
    steps.push(Object.freeze(finalStep));

    stepsByDomain.set(domain.name, Object.freeze(steps));
  }

  const domainNames = Object.freeze(source.domains.map((d) => d.name));

  function stepsFor(domain: string): readonly Step[] {
    const steps = stepsByDomain.get(domain);
    if (!steps) throw new DomainNotFoundError(domain);
    return steps;
  }

  return Object.freeze({
    listDomains: () => domainNames,
    hasDomain: (domain: string) => stepsByDomain.has(domain),
    getSteps: stepsFor,
    getStep(domain: string, index: number): Step {
      const steps = stepsFor(domain);
      // Indices are contiguous from 1, so the position is index - 1.
      const step = Number.isInteger(index) ? steps[index - 1] : undefined;
      if (!step) throw new StepNotFoundError(domain, index);
      return step;
    },
    stepCount: (domain: string) => stepsFor(domain).length,
  });
}

export function catalogFromJson(roadmaps: unknown, bank: unknown, sourcePath?: string): Catalog {
  const checked = validateCurriculum(roadmaps, bank, sourcePath);
  if (!checked.ok) throw new CurriculumValidationError(checked.errors);
  return buildCatalog(checked.value);
}

function getContentDir(): string {
  const candidates = [
    path.resolve(__dirname, "..", "content"),
    path.join(process.cwd(), "src", "content"),
    path.join(process.cwd(), "backend", "src", "content"),
  ];
  const dir = candidates.find((p) => fs.existsSync(path.join(p, "roadmaps.json")));
  if (!dir) {
    throw new Error(`Curriculum content not found. Tried: ${candidates.join(", ")}`);
  }
  return dir;
}

function readJson(file: string): unknown {
  return JSON.parse(fs.readFileSync(file, "utf-8"));
}

let loaded: Catalog | null = null;

/**
 * Reads the roadmap content once per process. Later calls return the same
 * catalog handle.
 */
export function loadCatalog(): Catalog {
  if (loaded) return loaded;
  const dir = getContentDir();
  loaded = catalogFromJson(
    readJson(path.join(dir, "roadmaps.json")),
    readJson(path.join(dir, "assessmentBank.json")),
    dir
  );
  return loaded;
}
