// backend/src/validation/requestValidators.ts

import { asString, isRecord } from "./guards";
import type {
  EducationEntry,
  ExperienceEntry,
  ProfilePatch,
  ProjectEntry,
  Resume,
} from "../storage/types";

export type Parsed<T> = { ok: true; value: T } | { ok: false; errors: string[] };

export const ALLOWED_QUALIFICATIONS: ReadonlySet<string> = new Set([
  "BCA",
  "MCA",
  "BSc CS",
  "MSc CS",
  "B.Tech CSE",
  "BE CSE",
  "B.Tech IT",
  "BE IT",
  "Data Science",
  "AI/ML",
  "Computer Engineering",
  "Information Technology",
]);

const EMAIL_RE = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

type FieldCheck = { min: number; max: number };

const NAME: FieldCheck = { min: 2, max: 50 };
const PHONE: FieldCheck = { min: 10, max: 15 };
const PASSWORD: FieldCheck = { min: 6, max: 128 };
const DOMAIN: FieldCheck = { min: 1, max: 100 };

class FieldErrors {
  readonly errors: string[] = [];

  text(body: Record<string, unknown>, field: string, limits?: FieldCheck, trim = true): string {
    const raw = body[field];
    if (typeof raw !== "string") {
      this.errors.push(`${field} is required`);
      return "";
    }
    const value = trim ? raw.trim() : raw;
    if (limits && (value.length < limits.min || value.length > limits.max)) {
      this.errors.push(`${field} must be ${limits.min}-${limits.max} characters`);
    }
    return value;
  }

  optionalText(body: Record<string, unknown>, field: string, limits: FieldCheck): string | undefined {
    const raw = body[field];
    if (raw === undefined || raw === null) return undefined;
    return this.text(body, field, limits);
  }

  done<T>(value: T): Parsed<T> {
    return this.errors.length > 0 ? { ok: false, errors: this.errors } : { ok: true, value };
  }
}

function notAnObject<T>(): Parsed<T> {
  return { ok: false, errors: ["body must be a JSON object"] };
}

export type RegisterInput = {
  firstName: string;
  lastName: string;
  email: string;
  phone: string;
  qualification: string;
  password: string;
};

export function parseRegisterBody(body: unknown): Parsed<RegisterInput> {
  if (!isRecord(body)) return notAnObject();
  const f = new FieldErrors();
  const firstName = f.text(body, "first_name", NAME);
  const lastName = f.text(body, "last_name", NAME);
  const email = f.text(body, "email").toLowerCase();
  if (email && !EMAIL_RE.test(email)) f.errors.push("email must be a valid email address");
  const phone = f.text(body, "phone", PHONE);
  const qualification = f.text(body, "qualification");
  const password = f.text(body, "password", PASSWORD, false);
  return f.done({ firstName, lastName, email, phone, qualification, password });
}

export type LoginInput = { email: string; password: string };

export function parseLoginBody(body: unknown): Parsed<LoginInput> {
  if (!isRecord(body)) return notAnObject();
  const f = new FieldErrors();
  const email = f.text(body, "email").toLowerCase();
  const password = f.text(body, "password", undefined, false);
  return f.done({ email, password });
}

export type ChangePasswordInput = { oldPassword: string; newPassword: string };

export function parseChangePasswordBody(body: unknown): Parsed<ChangePasswordInput> {
  if (!isRecord(body)) return notAnObject();
  const f = new FieldErrors();
  const oldPassword = f.text(body, "old_password", undefined, false);
  const newPassword = f.text(body, "new_password", PASSWORD, false);
  return f.done({ oldPassword, newPassword });
}

export function parseProfilePatch(body: unknown): Parsed<ProfilePatch> {
  if (!isRecord(body)) return notAnObject();
  const f = new FieldErrors();
  const patch: ProfilePatch = {};
  const firstName = f.optionalText(body, "first_name", NAME);
  const lastName = f.optionalText(body, "last_name", NAME);
  const phone = f.optionalText(body, "phone", PHONE);
  if (firstName !== undefined) patch.firstName = firstName;
  if (lastName !== undefined) patch.lastName = lastName;
  if (phone !== undefined) patch.phone = phone;
  return f.done(patch);
}

export type SubmitAssessmentBody = {
  domain: string;
  stepIndex: number;
  answers: number[];
};

export function parseSubmitAssessmentBody(body: unknown): Parsed<SubmitAssessmentBody> {
  if (!isRecord(body)) return notAnObject();
  const f = new FieldErrors();
  const domain = f.text(body, "domain", DOMAIN);

  const stepIndex = body.step_index;
  if (typeof stepIndex !== "number" || !Number.isInteger(stepIndex)) {
    f.errors.push("step_index must be an integer");
  }

  const answersRaw = body.answers;
  const answers: number[] = [];
  if (!Array.isArray(answersRaw)) {
    f.errors.push("answers must be an array of integers");
  } else {
    answersRaw.forEach((a, i) => {
      if (typeof a === "number" && Number.isInteger(a)) answers.push(a);
      else f.errors.push(`answers[${i}] must be an integer`);
    });
  }

  return f.done({ domain, stepIndex: typeof stepIndex === "number" ? stepIndex : 0, answers });
}

function parseEntries<T>(
  f: FieldErrors,
  raw: unknown,
  field: string,
  map: (entry: Record<string, unknown>) => T
): T[] {
  if (!Array.isArray(raw)) {
    f.errors.push(`${field} must be an array`);
    return [];
  }
  const out: T[] = [];
  raw.forEach((entry, i) => {
    if (isRecord(entry)) out.push(map(entry));
    else f.errors.push(`${field}[${i}] must be an object`);
  });
  return out;
}

export function parseResumeBody(body: unknown): Parsed<Resume> {
  if (!isRecord(body)) return notAnObject();
  const f = new FieldErrors();
  const summary = f.text(body, "summary", undefined, false);

  const skills: string[] = [];
  if (!Array.isArray(body.skills)) {
    f.errors.push("skills must be an array of strings");
  } else {
    body.skills.forEach((s, i) => {
      if (typeof s === "string") skills.push(s);
      else f.errors.push(`skills[${i}] must be a string`);
    });
  }

  const education = parseEntries<EducationEntry>(f, body.education, "education", (e) => ({
    degree: asString(e.degree),
    institution: asString(e.institution),
    year: asString(e.year),
  }));
  const experience = parseEntries<ExperienceEntry>(f, body.experience, "experience", (e) => ({
    role: asString(e.role),
    company: asString(e.company),
    duration: asString(e.duration),
    details: asString(e.details),
  }));
  const projects = parseEntries<ProjectEntry>(f, body.projects, "projects", (p) => ({
    name: asString(p.name),
    description: asString(p.description),
  }));

  return f.done({ summary, skills, education, experience, projects });
}
