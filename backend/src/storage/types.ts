// backend/src/storage/types.ts

/** Domain name -> highest completed step index. Missing domains count as 0. */
export type ProgressMap = Record<string, number>;

export type ProgressSnapshot = {
  userId: string;
  progress: ProgressMap;
};

export type NewAttempt = {
  userId: string;
  domain: string;
  stepIndex: number;
  score: number;
  total: number;
  passed: boolean;
};

export type Attempt = NewAttempt & {
  id: string;
  createdAt: Date;
};

export interface ProgressStore {
  findUser(userId: string): Promise<ProgressSnapshot | null>;
  /**
   * Compare-and-set on one domain's progress. Writes only when the stored value
   * equals `expected` (a missing entry equals 0) and never lowers the stored
   * value. Resolves true when the value was changed.
   */
  updateUserProgress(userId: string, domain: string, expected: number, next: number): Promise<boolean>;
  appendAttempt(attempt: NewAttempt): Promise<Attempt>;
  findAttempts(userId: string): Promise<Attempt[]>;
}

export type UserRecord = ProgressSnapshot & {
  firstName: string;
  lastName: string;
  email: string;
  phone: string;
  qualification: string;
  passwordHash: string;
  salt: string;
  domains: string[];
  tokens: string[];
};

export type NewUser = Omit<UserRecord, "userId" | "progress" | "tokens" | "domains">;

export type ProfilePatch = Partial<Pick<UserRecord, "firstName" | "lastName" | "phone">>;

export class DuplicateEmailError extends Error {
  constructor(readonly email: string) {
    super("Email already registered");
    this.name = "DuplicateEmailError";
  }
}

export interface AccountStore {
  /** Rejects with DuplicateEmailError when the email is taken. */
  createUser(user: NewUser): Promise<string>;
  findUserById(userId: string): Promise<UserRecord | null>;
  findUserByEmail(email: string): Promise<UserRecord | null>;
  findUserByToken(token: string): Promise<UserRecord | null>;
  addToken(userId: string, token: string): Promise<void>;
  removeToken(userId: string, token: string): Promise<void>;
  updatePassword(userId: string, passwordHash: string, salt: string): Promise<void>;
  updateProfile(userId: string, patch: ProfilePatch): Promise<void>;
}

export type EducationEntry = { degree: string; institution: string; year: string };
export type ExperienceEntry = { role: string; company: string; duration: string; details: string };
export type ProjectEntry = { name: string; description: string };

export type Resume = {
  summary: string;
  skills: string[];
  education: EducationEntry[];
  experience: ExperienceEntry[];
  projects: ProjectEntry[];
};

export function emptyResume(): Resume {
  return { summary: "", skills: [], education: [], experience: [], projects: [] };
}

export interface ResumeStore {
  getResume(userId: string): Promise<Resume | null>;
  upsertResume(userId: string, resume: Resume): Promise<void>;
}

export type AppStore = ProgressStore & AccountStore & ResumeStore;
