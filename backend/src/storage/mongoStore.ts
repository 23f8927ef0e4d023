// backend/src/storage/mongoStore.ts

import mongoose from "mongoose";
import { UserModel } from "../state/userState";
import { AttemptModel } from "../state/attemptState";
import { ResumeModel } from "../state/resumeState";
import { asString, asStringList, isRecord } from "../validation/guards";
import {
  DuplicateEmailError,
  type AppStore,
  type Attempt,
  type ProgressMap,
  type Resume,
  type UserRecord,
} from "./types";

function toObjectId(id: string): mongoose.Types.ObjectId | null {
  return mongoose.Types.ObjectId.isValid(id) ? new mongoose.Types.ObjectId(id) : null;
}

function toProgressMap(raw: unknown): ProgressMap {
  const entries = raw instanceof Map ? [...raw.entries()] : isRecord(raw) ? Object.entries(raw) : [];
  const out: ProgressMap = {};
  for (const [domain, value] of entries) {
    if (typeof domain === "string" && typeof value === "number") out[domain] = value;
  }
  return out;
}

export function toUserRecord(doc: unknown): UserRecord | null {
  if (!isRecord(doc) || doc._id == null) return null;
  return {
    userId: String(doc._id),
    firstName: asString(doc.firstName),
    lastName: asString(doc.lastName),
    email: asString(doc.email),
    phone: asString(doc.phone),
    qualification: asString(doc.qualification),
    passwordHash: asString(doc.passwordHash),
    salt: asString(doc.salt),
    domains: asStringList(doc.domains),
    tokens: asStringList(doc.tokens),
    progress: toProgressMap(doc.progress),
  };
}

export function toAttempt(doc: unknown): Attempt | null {
  if (!isRecord(doc) || doc._id == null) return null;
  const { stepIndex, score, total, passed, createdAt } = doc;
  if (typeof stepIndex !== "number" || typeof score !== "number" || typeof total !== "number") {
    return null;
  }
  return {
    id: String(doc._id),
    userId: asString(doc.userId),
    domain: asString(doc.domain),
    stepIndex,
    score,
    total,
    passed: passed === true,
    createdAt: createdAt instanceof Date ? createdAt : new Date(0),
  };
}

function toResume(doc: unknown): Resume | null {
  if (!isRecord(doc)) return null;
  const records = (v: unknown) => (Array.isArray(v) ? v.filter(isRecord) : []);
  return {
    summary: asString(doc.summary),
    skills: asStringList(doc.skills),
    education: records(doc.education).map((e) => ({
      degree: asString(e.degree),
      institution: asString(e.institution),
      year: asString(e.year),
    })),
    experience: records(doc.experience).map((e) => ({
      role: asString(e.role),
      company: asString(e.company),
      duration: asString(e.duration),
      details: asString(e.details),
    })),
    projects: records(doc.projects).map((p) => ({
      name: asString(p.name),
      description: asString(p.description),
    })),
  };
}

function isDuplicateKeyError(err: unknown): boolean {
  return isRecord(err) && err.code === 11000;
}

export function createMongoStore(): AppStore {
  return {
    async findUser(userId) {
      const _id = toObjectId(userId);
      if (!_id) return null;
      const doc: unknown = await UserModel.findById(_id, { progress: 1 }).lean();
      if (!isRecord(doc)) return null;
      return { userId: String(doc._id), progress: toProgressMap(doc.progress) };
    },

    async updateUserProgress(userId, domain, expected, next) {
      const _id = toObjectId(userId);
      if (!_id) return false;

      const key = `progress.${domain}`;
      // A user that never passed anything in this domain has no entry at all.
      const filter =
        expected === 0
          ? { _id, $or: [{ [key]: { $exists: false } }, { [key]: 0 }] }
          : { _id, [key]: expected };

      const res = await UserModel.updateOne(filter, { $max: { [key]: next } });
      return res.modifiedCount === 1;
    },

    async appendAttempt(attempt) {
      const doc = await AttemptModel.create(attempt);
      const stored = toAttempt(doc.toObject());
      if (!stored) throw new Error("Stored attempt could not be read back");
      return stored;
    },

    async findAttempts(userId) {
      const docs: unknown = await AttemptModel.find({ userId }).sort({ createdAt: 1, _id: 1 }).lean();
      if (!Array.isArray(docs)) return [];
      return docs.map(toAttempt).filter((a): a is Attempt => a !== null);
    },

    async createUser(user) {
      try {
        const doc = await UserModel.create(user);
        return String(doc._id);
      } catch (err) {
        if (isDuplicateKeyError(err)) throw new DuplicateEmailError(user.email);
        throw err;
      }
    },

    async findUserById(userId) {
      const _id = toObjectId(userId);
      if (!_id) return null;
      return toUserRecord(await UserModel.findById(_id).lean());
    },

    async findUserByEmail(email) {
      return toUserRecord(await UserModel.findOne({ email: email.trim().toLowerCase() }).lean());
    },

    async findUserByToken(token) {
      return toUserRecord(await UserModel.findOne({ tokens: token }).lean());
    },

    async addToken(userId, token) {
      const _id = toObjectId(userId);
      if (!_id) return;
      await UserModel.updateOne({ _id }, { $addToSet: { tokens: token } });
    },

    async removeToken(userId, token) {
      const _id = toObjectId(userId);
      if (!_id) return;
      await UserModel.updateOne({ _id }, { $pull: { tokens: token } });
    },

    async updatePassword(userId, passwordHash, salt) {
      const _id = toObjectId(userId);
      if (!_id) return;
      await UserModel.updateOne({ _id }, { $set: { passwordHash, salt } });
    },

    async updateProfile(userId, patch) {
      const set: Record<string, string> = {};
      if (patch.firstName !== undefined) set.firstName = patch.firstName;
      if (patch.lastName !== undefined) set.lastName = patch.lastName;
      if (patch.phone !== undefined) set.phone = patch.phone;
      if (Object.keys(set).length === 0) return;
      const _id = toObjectId(userId);
      if (!_id) return;
      await UserModel.updateOne({ _id }, { $set: set });
    },

    async getResume(userId) {
      return toResume(await ResumeModel.findOne({ userId }).lean());
    },

    async upsertResume(userId, resume) {
      await ResumeModel.updateOne({ userId }, { $set: { userId, ...resume } }, { upsert: true });
    },
  };
}
