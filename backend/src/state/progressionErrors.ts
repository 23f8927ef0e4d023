// backend/src/state/progressionErrors.ts

export type ProgressionErrorKind =
  | "DOMAIN_NOT_FOUND"
  | "STEP_NOT_FOUND"
  | "USER_NOT_FOUND"
  | "OUT_OF_SEQUENCE"
  | "ANSWER_COUNT_MISMATCH";

const NOT_FOUND_KINDS: ReadonlySet<ProgressionErrorKind> = new Set([
  "DOMAIN_NOT_FOUND",
  "STEP_NOT_FOUND",
  "USER_NOT_FOUND",
]);

export class ProgressionError extends Error {
  readonly kind: ProgressionErrorKind;

  constructor(kind: ProgressionErrorKind, message: string) {
    super(message);
    this.name = "ProgressionError";
    this.kind = kind;
  }

  get isNotFound(): boolean {
    return NOT_FOUND_KINDS.has(this.kind);
  }
}

export class DomainNotFoundError extends ProgressionError {
  constructor(readonly domain: string) {
    super("DOMAIN_NOT_FOUND", `Domain not found: ${domain}`);
  }
}

export class StepNotFoundError extends ProgressionError {
  constructor(readonly domain: string, readonly stepIndex: number) {
    super("STEP_NOT_FOUND", `Step ${stepIndex} not found in ${domain}`);
  }
}

export class UserNotFoundError extends ProgressionError {
  constructor(readonly userId: string) {
    super("USER_NOT_FOUND", "User not found");
  }
}

export class OutOfSequenceError extends ProgressionError {
  constructor(readonly stepIndex: number, readonly completed: number) {
    super(
      "OUT_OF_SEQUENCE",
      `You must complete previous step first (requested ${stepIndex}, next is ${completed + 1})`
    );
  }
}

export class AnswerCountMismatchError extends ProgressionError {
  constructor(readonly expected: number, readonly received: number) {
    super("ANSWER_COUNT_MISMATCH", `Answer count mismatch (expected ${expected}, got ${received})`);
  }
}
