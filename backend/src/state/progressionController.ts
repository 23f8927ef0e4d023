// backend/src/state/progressionController.ts

import type { Catalog, Step } from "./curriculumCatalog";
import { grade, type GradeResult } from "./gradingEngine";
import { OutOfSequenceError, UserNotFoundError } from "./progressionErrors";
import type { Attempt, ProgressMap, ProgressStore } from "../storage/types";
import { KeyedMutex } from "../utils/keyedMutex";

export type PublicQuestion = {
  prompt: string;
  options: string[];
};

export type RoadmapStepView = {
  index: number;
  kind: Step["kind"];
  title: string;
  description: string;
  videos: string[];
  covers?: number | "final";
  quiz: { questions: PublicQuestion[] };
  locked: boolean;
};

export type RoadmapView = {
  domain: string;
  steps: RoadmapStepView[];
  progress: number;
};

export type SubmitAssessmentInput = {
  domain: string;
  stepIndex: number;
  answers: readonly number[];
  userId: string;
};

export type SubmissionResult = GradeResult & {
  // True when this submission moved the stored progress forward.
  advanced: boolean;
  progress: number;
  attemptId: string;
};

export type Dashboard = {
  attempts: Attempt[];
  progressPercent: Record<string, number>;
};

export type ProgressionController = {
  listDomains(): readonly string[];
  getRoadmap(domain: string, userId: string): Promise<RoadmapView>;
  submitAssessment(input: SubmitAssessmentInput): Promise<SubmissionResult>;
  getDashboard(userId: string): Promise<Dashboard>;
};

export type ProgressionDeps = {
  catalog: Catalog;
  store: ProgressStore;
  mutex?: KeyedMutex;
};

export function completedIn(progress: ProgressMap, domain: string): number {
  const v = progress[domain];
  return typeof v === "number" && Number.isInteger(v) && v > 0 ? v : 0;
}

export function isLocked(stepIndex: number, completed: number): boolean {
  return stepIndex > completed + 1;
}

export function progressPercent(completed: number, stepCount: number): number {
  if (stepCount <= 0) return 0;
  return Math.floor((100 * completed) / stepCount);
}

function toStepView(step: Step, completed: number): RoadmapStepView {
  return {
    index: step.index,
    kind: step.kind,
    title: step.title,
    description: step.description,
    videos: step.kind === "lesson" ? [...step.videos] : [],
    ...(step.kind === "assessment" ? { covers: step.covers } : {}),
    // The answer key stays on the server.
    quiz: { questions: step.quiz.map((q) => ({ prompt: q.prompt, options: [...q.options] })) },
    locked: isLocked(step.index, completed),
  };
}

export function createProgressionController(deps: ProgressionDeps): ProgressionController {
  const { catalog, store } = deps;
  const mutex = deps.mutex ?? new KeyedMutex();

  async function readProgress(userId: string): Promise<ProgressMap> {
    const user = await store.findUser(userId);
    if (!user) throw new UserNotFoundError(userId);
    return user.progress;
  }

  return {
    listDomains: () => catalog.listDomains(),

    async getRoadmap(domain, userId) {
      const steps = catalog.getSteps(domain);
      const completed = completedIn(await readProgress(userId), domain);
      return {
        domain,
        steps: steps.map((s) => toStepView(s, completed)),
        progress: completed,
      };
    },

    async submitAssessment({ domain, stepIndex, answers, userId }) {
      const step = catalog.getStep(domain, stepIndex);

      // Read, check, grade and write as one unit per (user, domain).
      return mutex.runExclusive(`${userId}\u0000${domain}`, async () => {
        const completed = completedIn(await readProgress(userId), domain);
        if (stepIndex !== completed + 1) {
          throw new OutOfSequenceError(stepIndex, completed);
        }

        const graded = grade(step.quiz, answers);

        const attempt = await store.appendAttempt({
          userId,
          domain,
          stepIndex,
          score: graded.score,
          total: graded.total,
          passed: graded.passed,
        });

        if (!graded.passed) {
          return { ...graded, advanced: false, progress: completed, attemptId: attempt.id };
        }

        const advanced = await store.updateUserProgress(userId, domain, completed, stepIndex);
        if (advanced) {
          return { ...graded, advanced: true, progress: stepIndex, attemptId: attempt.id };
        }

        // Another writer moved this domain first; report what is stored now.
        const current = completedIn(await readProgress(userId), domain);
        return { ...graded, advanced: false, progress: current, attemptId: attempt.id };
      });
    },

    async getDashboard(userId) {
      const progress = await readProgress(userId);
      const attempts = await store.findAttempts(userId);

      const percent: Record<string, number> = {};
      for (const domain of catalog.listDomains()) {
        percent[domain] = progressPercent(completedIn(progress, domain), catalog.stepCount(domain));
      }

      return { attempts, progressPercent: percent };
    },
  };
}
