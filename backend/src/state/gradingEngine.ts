// backend/src/state/gradingEngine.ts

import type { QuestionSet } from "./curriculumCatalog";
import { AnswerCountMismatchError } from "./progressionErrors";

export const PASS_THRESHOLD = 0.6;

export type GradeResult = {
  score: number;
  total: number;
  passed: boolean;
  results: boolean[];
};

/**
 * Scores a list of chosen option indices against a question set.
 * An empty question set counts as passed.
 */
export function grade(questions: QuestionSet, answers: readonly number[]): GradeResult {
  if (answers.length !== questions.length) {
    throw new AnswerCountMismatchError(questions.length, answers.length);
  }

  const results = questions.map((q, i) => answers[i] === q.correctOptionIndex);
  const score = results.filter(Boolean).length;
  const total = questions.length;
  const passed = total === 0 ? true : score / total >= PASS_THRESHOLD;

  return { score, total, passed, results };
}
