// backend/src/storage/__tests__/mongoStore.test.ts

import { describe, expect, it, vi, beforeEach } from "vitest";
import mongoose from "mongoose";

const userUpdateOneMock = vi.hoisted(() => vi.fn());
const userFindByIdMock = vi.hoisted(() => vi.fn());
const userFindOneMock = vi.hoisted(() => vi.fn());
const userCreateMock = vi.hoisted(() => vi.fn());
const attemptCreateMock = vi.hoisted(() => vi.fn());
const attemptFindMock = vi.hoisted(() => vi.fn());
const resumeFindOneMock = vi.hoisted(() => vi.fn());
const resumeUpdateOneMock = vi.hoisted(() => vi.fn(async () => ({})));

vi.mock("../../state/userState", () => ({
  UserModel: {
    updateOne: userUpdateOneMock,
    findById: userFindByIdMock,
    findOne: userFindOneMock,
    create: userCreateMock,
  },
}));

vi.mock("../../state/attemptState", () => ({
  AttemptModel: {
    create: attemptCreateMock,
    find: attemptFindMock,
  },
}));

vi.mock("../../state/resumeState", () => ({
  ResumeModel: {
    findOne: resumeFindOneMock,
    updateOne: resumeUpdateOneMock,
  },
}));

import { createMongoStore, toAttempt, toUserRecord } from "../mongoStore";
import { DuplicateEmailError } from "../types";

const USER_ID = "64b7f0c2a1b2c3d4e5f60718";

function lean<T>(value: T) {
  return { lean: vi.fn(async () => value) };
}

describe("mongo store", () => {
  const store = createMongoStore();

  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe("updateUserProgress", () => {
    it("matches a missing or zero entry when nothing was completed yet", async () => {
      userUpdateOneMock.mockResolvedValueOnce({ modifiedCount: 1 });

      const ok = await store.updateUserProgress(USER_ID, "AI/ML", 0, 1);

      expect(ok).toBe(true);
      const [filter, update] = userUpdateOneMock.mock.calls[0] ?? [];
      expect(String(filter._id)).toBe(USER_ID);
      expect(filter.$or).toEqual([{ "progress.AI/ML": { $exists: false } }, { "progress.AI/ML": 0 }]);
      expect(update).toEqual({ $max: { "progress.AI/ML": 1 } });
    });

    it("matches the exact expected value otherwise", async () => {
      userUpdateOneMock.mockResolvedValueOnce({ modifiedCount: 0 });

      const ok = await store.updateUserProgress(USER_ID, "Backend Development", 2, 3);

      expect(ok).toBe(false);
      const [filter, update] = userUpdateOneMock.mock.calls[0] ?? [];
      expect(filter["progress.Backend Development"]).toBe(2);
      expect(filter.$or).toBeUndefined();
      expect(update).toEqual({ $max: { "progress.Backend Development": 3 } });
    });

    it("does not query for an id that is not an ObjectId", async () => {
      expect(await store.updateUserProgress("not-an-id", "AI/ML", 0, 1)).toBe(false);
      expect(userUpdateOneMock).not.toHaveBeenCalled();
    });
  });

  describe("findUser", () => {
    it("reads only the progress map", async () => {
      userFindByIdMock.mockReturnValueOnce(
        lean({ _id: new mongoose.Types.ObjectId(USER_ID), progress: { "AI/ML": 2, junk: "x" } })
      );

      const snapshot = await store.findUser(USER_ID);

      expect(snapshot).toEqual({ userId: USER_ID, progress: { "AI/ML": 2 } });
      expect(userFindByIdMock.mock.calls[0]?.[1]).toEqual({ progress: 1 });
    });

    it("returns null for a missing user", async () => {
      userFindByIdMock.mockReturnValueOnce(lean(null));
      expect(await store.findUser(USER_ID)).toBeNull();
    });
  });

  describe("attempts", () => {
    it("creates an attempt and reads it back", async () => {
      const createdAt = new Date("2026-01-02T03:04:05.000Z");
      attemptCreateMock.mockImplementationOnce(async (attempt: Record<string, unknown>) => ({
        toObject: () => ({ ...attempt, _id: "a1", createdAt }),
      }));

      const stored = await store.appendAttempt({
        userId: USER_ID,
        domain: "AI/ML",
        stepIndex: 1,
        score: 1,
        total: 1,
        passed: true,
      });

      expect(stored).toEqual({
        id: "a1",
        userId: USER_ID,
        domain: "AI/ML",
        stepIndex: 1,
        score: 1,
        total: 1,
        passed: true,
        createdAt,
      });
    });

    it("lists attempts oldest first and drops unreadable documents", async () => {
      const sort = vi.fn(() =>
        lean([
          { _id: "a1", userId: USER_ID, domain: "AI/ML", stepIndex: 1, score: 1, total: 1, passed: true },
          { _id: "a2", userId: USER_ID, domain: "AI/ML", stepIndex: "2" },
        ])
      );
      attemptFindMock.mockReturnValueOnce({ sort });

      const attempts = await store.findAttempts(USER_ID);

      expect(attemptFindMock).toHaveBeenCalledWith({ userId: USER_ID });
      expect(sort).toHaveBeenCalledWith({ createdAt: 1, _id: 1 });
      expect(attempts.map((a) => a.id)).toEqual(["a1"]);
    });
  });

  describe("accounts", () => {
    it("maps a duplicate key error to DuplicateEmailError", async () => {
      userCreateMock.mockRejectedValueOnce(Object.assign(new Error("E11000"), { code: 11000 }));

      await expect(
        store.createUser({
          firstName: "Test",
          lastName: "Learner",
          email: "learner@example.com",
          phone: "0123456789",
          qualification: "BCA",
          passwordHash: "00",
          salt: "00",
        })
      ).rejects.toBeInstanceOf(DuplicateEmailError);
    });

    it("looks users up by normalized email and by token", async () => {
      userFindOneMock.mockReturnValue(lean(null));

      await store.findUserByEmail("  Learner@Example.com ");
      await store.findUserByToken("tok");

      expect(userFindOneMock).toHaveBeenNthCalledWith(1, { email: "learner@example.com" });
      expect(userFindOneMock).toHaveBeenNthCalledWith(2, { tokens: "tok" });
    });

    it("adds and removes tokens with set operators", async () => {
      userUpdateOneMock.mockResolvedValue({ modifiedCount: 1 });

      await store.addToken(USER_ID, "tok");
      await store.removeToken(USER_ID, "tok");

      expect(userUpdateOneMock.mock.calls[0]?.[1]).toEqual({ $addToSet: { tokens: "tok" } });
      expect(userUpdateOneMock.mock.calls[1]?.[1]).toEqual({ $pull: { tokens: "tok" } });
    });

    it("skips an empty profile patch", async () => {
      await store.updateProfile(USER_ID, {});
      expect(userUpdateOneMock).not.toHaveBeenCalled();
    });
  });

  describe("resumes", () => {
    it("upserts by user id", async () => {
      const resume = { summary: "s", skills: ["ts"], education: [], experience: [], projects: [] };

      await store.upsertResume(USER_ID, resume);

      expect(resumeUpdateOneMock).toHaveBeenCalledWith(
        { userId: USER_ID },
        { $set: { userId: USER_ID, ...resume } },
        { upsert: true }
      );
    });

    it("returns null when no resume is stored", async () => {
      resumeFindOneMock.mockReturnValueOnce(lean(null));
      expect(await store.getResume(USER_ID)).toBeNull();
    });
  });
});

describe("document mapping", () => {
  it("reads a lean user with a progress Map", () => {
    const record = toUserRecord({
      _id: "u1",
      firstName: "Test",
      email: "learner@example.com",
      tokens: ["t1", 5],
      progress: new Map([["AI/ML", 3]]),
    });

    expect(record).toMatchObject({
      userId: "u1",
      firstName: "Test",
      lastName: "",
      tokens: ["t1"],
      domains: [],
      progress: { "AI/ML": 3 },
    });
  });

  it("rejects an attempt without numeric fields", () => {
    expect(toAttempt({ _id: "a1", stepIndex: 1, score: "1", total: 1 })).toBeNull();
    expect(toAttempt(null)).toBeNull();
  });
});
