// backend/src/services/credentials.ts

import crypto from "node:crypto";
import { promisify } from "node:util";

const pbkdf2 = promisify(crypto.pbkdf2);

const ITERATIONS = 100_000;
const KEY_LENGTH = 32;
const DIGEST = "sha256";

export type PasswordHash = { hash: string; salt: string };

export async function hashPassword(password: string, salt?: string): Promise<PasswordHash> {
  const useSalt = salt ?? crypto.randomBytes(16).toString("hex");
  const derived = await pbkdf2(password, Buffer.from(useSalt, "hex"), ITERATIONS, KEY_LENGTH, DIGEST);
  return { hash: derived.toString("hex"), salt: useSalt };
}

export async function verifyPassword(password: string, salt: string, passwordHash: string): Promise<boolean> {
  if (!salt || !passwordHash) return false;
  const { hash } = await hashPassword(password, salt);
  const a = Buffer.from(hash, "hex");
  const b = Buffer.from(passwordHash, "hex");
  return a.length === b.length && crypto.timingSafeEqual(a, b);
}

/** Opaque bearer token, 48 hex chars. */
export function issueToken(): string {
  return crypto.randomBytes(24).toString("hex");
}
