// backend/src/config/env.ts

function intFromEnv(name: string, fallback: number): number {
  const raw = String(process.env[name] ?? "").trim();
  if (!raw) return fallback;
  const n = Number(raw);
  return Number.isInteger(n) && n > 0 ? n : fallback;
}

export function getPort(): number {
  return intFromEnv("PORT", 3000);
}

/** null means "no database configured": the in-memory store is used. */
export function getMongoUri(): string | null {
  const raw = String(process.env.MONGO_URI ?? "").trim();
  return raw ? raw : null;
}

export function getCorsOrigin(): string {
  const raw = String(process.env.CORS_ORIGIN ?? "").trim();
  return raw || "*";
}

export function getRateLimitConfig(): { max: number; windowMs: number } {
  return {
    max: intFromEnv("RATE_LIMIT_MAX", 120),
    windowMs: intFromEnv("RATE_LIMIT_WINDOW_MS", 60_000),
  };
}
