// backend/src/storage/memoryStore.ts
//
// Process-local store used when no MONGO_URI is configured and by tests.
// Same contract as the Mongo store; data is lost on restart.

import crypto from "node:crypto";
import {
  DuplicateEmailError,
  type AppStore,
  type Attempt,
  type Resume,
  type UserRecord,
} from "./types";

function cloneUser(u: UserRecord): UserRecord {
  return { ...u, domains: [...u.domains], tokens: [...u.tokens], progress: { ...u.progress } };
}

function cloneResume(r: Resume): Resume {
  return {
    summary: r.summary,
    skills: [...r.skills],
    education: r.education.map((e) => ({ ...e })),
    experience: r.experience.map((e) => ({ ...e })),
    projects: r.projects.map((p) => ({ ...p })),
  };
}

export type MemoryStore = AppStore & {
  attemptCount(): number;
};

export function createMemoryStore(now: () => Date = () => new Date()): MemoryStore {
  const users = new Map<string, UserRecord>();
  const attempts: Attempt[] = [];
  const resumes = new Map<string, Resume>();

  const byEmail = (email: string) => {
    const normalized = email.trim().toLowerCase();
    for (const u of users.values()) if (u.email === normalized) return u;
    return null;
  };

  return {
    async findUser(userId) {
      const u = users.get(userId);
      return u ? { userId: u.userId, progress: { ...u.progress } } : null;
    },

    async updateUserProgress(userId, domain, expected, next) {
      const u = users.get(userId);
      if (!u) return false;
      const current = u.progress[domain] ?? 0;
      if (current !== expected || next <= current) return false;
      u.progress[domain] = next;
      return true;
    },

    async appendAttempt(attempt) {
      const stored: Attempt = { ...attempt, id: crypto.randomUUID(), createdAt: now() };
      attempts.push(stored);
      return { ...stored };
    },

    async findAttempts(userId) {
      return attempts.filter((a) => a.userId === userId).map((a) => ({ ...a }));
    },

    async createUser(user) {
      const email = user.email.trim().toLowerCase();
      if (byEmail(email)) throw new DuplicateEmailError(email);
      const userId = crypto.randomBytes(12).toString("hex");
      users.set(userId, { ...user, email, userId, domains: [], tokens: [], progress: {} });
      return userId;
    },

    async findUserById(userId) {
      const u = users.get(userId);
      return u ? cloneUser(u) : null;
    },

    async findUserByEmail(email) {
      const u = byEmail(email);
      return u ? cloneUser(u) : null;
    },

    async findUserByToken(token) {
      for (const u of users.values()) if (u.tokens.includes(token)) return cloneUser(u);
      return null;
    },

    async addToken(userId, token) {
      const u = users.get(userId);
      if (u && !u.tokens.includes(token)) u.tokens.push(token);
    },

    async removeToken(userId, token) {
      const u = users.get(userId);
      if (u) u.tokens = u.tokens.filter((t) => t !== token);
    },

    async updatePassword(userId, passwordHash, salt) {
      const u = users.get(userId);
      if (u) Object.assign(u, { passwordHash, salt });
    },

    async updateProfile(userId, patch) {
      const u = users.get(userId);
      if (!u) return;
      if (patch.firstName !== undefined) u.firstName = patch.firstName;
      if (patch.lastName !== undefined) u.lastName = patch.lastName;
      if (patch.phone !== undefined) u.phone = patch.phone;
    },

    async getResume(userId) {
      const r = resumes.get(userId);
      return r ? cloneResume(r) : null;
    },

    async upsertResume(userId, resume) {
      resumes.set(userId, cloneResume(resume));
    },

    attemptCount: () => attempts.length,
  };
}
