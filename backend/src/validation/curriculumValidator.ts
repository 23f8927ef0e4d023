// backend/src/validation/curriculumValidator.ts

import { isNonEmptyString, isRecord } from "./guards";

export const ASSESSMENT_QUESTION_COUNT = 20;

export type QuestionSource = {
  prompt: string;
  options: string[];
  correctOptionIndex: number;
};

export type LessonSource = {
  title: string;
  description: string;
  videos: string[];
  questions: QuestionSource[];
};

export type DomainSource = {
  name: string;
  lessons: LessonSource[];
};

export type CurriculumSource = {
  domains: DomainSource[];
  assessmentBank: QuestionSource[];
};

export type CurriculumValidation =
  | { ok: true; value: CurriculumSource }
  | { ok: false; errors: string[] };

function parseQuestion(
  input: unknown,
  path: string,
  pushError: (path: string, message: string) => void
): QuestionSource | null {
  if (!isRecord(input)) {
    pushError(path, "must be an object");
    return null;
  }

  let ok = true;
  if (!isNonEmptyString(input.prompt)) {
    pushError(`${path}.prompt`, "is required");
    ok = false;
  }

  const options = input.options;
  const optionList: string[] = [];
  if (!Array.isArray(options) || options.length < 2) {
    pushError(`${path}.options`, "must be an array with at least 2 entries");
    ok = false;
  } else {
    options.forEach((opt, i) => {
      if (isNonEmptyString(opt)) optionList.push(opt.trim());
      else {
        pushError(`${path}.options[${i}]`, "must be a non-empty string");
        ok = false;
      }
    });
  }

  const correct = input.correctOptionIndex;
  if (typeof correct !== "number" || !Number.isInteger(correct)) {
    pushError(`${path}.correctOptionIndex`, "must be an integer");
    ok = false;
  } else if (Array.isArray(options) && (correct < 0 || correct >= options.length)) {
    pushError(`${path}.correctOptionIndex`, `must point into options (0..${options.length - 1})`);
    ok = false;
  }

  if (!ok || typeof correct !== "number" || !isNonEmptyString(input.prompt)) return null;
  return { prompt: input.prompt.trim(), options: optionList, correctOptionIndex: correct };
}

function parseQuestionList(
  input: unknown,
  path: string,
  pushError: (path: string, message: string) => void
): QuestionSource[] | null {
  if (!Array.isArray(input) || input.length === 0) {
    pushError(path, "must be a non-empty array");
    return null;
  }
  const parsed = input.map((q, i) => parseQuestion(q, `${path}[${i}]`, pushError));
  const questions = parsed.filter((q): q is QuestionSource => q !== null);
  return questions.length === parsed.length ? questions : null;
}

function parseLesson(
  input: unknown,
  path: string,
  pushError: (path: string, message: string) => void
): LessonSource | null {
  if (!isRecord(input)) {
    pushError(path, "must be an object");
    return null;
  }

  if (!isNonEmptyString(input.title)) pushError(`${path}.title`, "is required");

  if (!("description" in input)) {
    pushError(`${path}.description`, "must exist");
  } else if (typeof input.description !== "string") {
    pushError(`${path}.description`, "must be a string");
  }

  const videosRaw = input.videos ?? [];
  const videos: string[] = [];
  if (!Array.isArray(videosRaw)) {
    pushError(`${path}.videos`, "must be an array");
  } else {
    videosRaw.forEach((v, i) => {
      if (isNonEmptyString(v)) videos.push(v.trim());
      else pushError(`${path}.videos[${i}]`, "must be a non-empty string");
    });
  }

  const questions = parseQuestionList(input.questions, `${path}.questions`, pushError);

  if (
    !questions ||
    !isNonEmptyString(input.title) ||
    typeof input.description !== "string" ||
    !Array.isArray(videosRaw) ||
    videos.length !== videosRaw.length
  ) {
    return null;
  }

  return {
    title: input.title.trim(),
    description: input.description.trim(),
    videos,
    questions,
  };
}

/**
 * Checks the raw roadmap and question-bank documents and returns them as typed
 * sources. Every problem found is reported, not just the first one.
 */
export function validateCurriculum(
  roadmaps: unknown,
  bank: unknown,
  sourcePath = "curriculum"
): CurriculumValidation {
  const errors: string[] = [];
  const pushError = (path: string, message: string) => {
    errors.push(`${sourcePath}: ${path} ${message}`);
  };

  const domains: DomainSource[] = [];
  const seenNames = new Set<string>();

  const domainsRaw = isRecord(roadmaps) ? roadmaps.domains : undefined;
  if (!Array.isArray(domainsRaw)) {
    pushError("domains", "must be an array");
  } else {
    domainsRaw.forEach((d, i) => {
      const dPath = `domains[${i}]`;
      if (!isRecord(d)) {
        pushError(dPath, "must be an object");
        return;
      }

      const name = typeof d.name === "string" ? d.name.trim() : "";
      if (!name) {
        pushError(`${dPath}.name`, "is required");
      } else if (/[.$]/.test(name)) {
        // Domain names are stored as keys of the progress map.
        pushError(`${dPath}.name`, "must not contain '.' or '$'");
      } else if (seenNames.has(name)) {
        pushError(`${dPath}.name`, "must be unique");
      } else {
        seenNames.add(name);
      }

      if (!Array.isArray(d.lessons)) {
        pushError(`${dPath}.lessons`, "must be an array");
        return;
      }
      const lessons = d.lessons.map((l, j) => parseLesson(l, `${dPath}.lessons[${j}]`, pushError));
      const valid = lessons.filter((l): l is LessonSource => l !== null);
      if (name && valid.length === lessons.length) domains.push({ name, lessons: valid });
    });
  }

  const bankRaw = isRecord(bank) ? bank.questions : undefined;
  const assessmentBank = parseQuestionList(bankRaw, "assessmentBank.questions", pushError);
  if (assessmentBank && assessmentBank.length !== ASSESSMENT_QUESTION_COUNT) {
    pushError(
      "assessmentBank.questions",
      `must contain exactly ${ASSESSMENT_QUESTION_COUNT} questions (got ${assessmentBank.length})`
    );
  }

  if (errors.length > 0 || !assessmentBank) {
    return { ok: false, errors };
  }
  return { ok: true, value: { domains, assessmentBank } };
}
