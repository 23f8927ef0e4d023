// backend/src/index.ts
// this is also known as the backend entry file

import "dotenv/config";
import { createApp } from "./app";
import { connectMongo } from "./db/mongo";
import { loadCatalog } from "./state/curriculumCatalog";
import { createMongoStore } from "./storage/mongoStore";
import { createMemoryStore } from "./storage/memoryStore";
import type { AppStore } from "./storage/types";
import { getCorsOrigin, getMongoUri, getPort, getRateLimitConfig } from "./config/env";
import { logEvent, logServerError } from "./utils/logger";

async function main() {
  // Fails fast on broken roadmap content.
  const catalog = loadCatalog();

  const mongoUri = getMongoUri();
  let store: AppStore;
  if (mongoUri) {
    await connectMongo(mongoUri);
    store = createMongoStore();
  } else {
    logEvent("warn", "mongo_uri_missing", { store: "memory" });
    store = createMemoryStore();
  }

  const app = createApp({
    catalog,
    store,
    corsOrigin: getCorsOrigin(),
    rateLimit: getRateLimitConfig(),
  });

  const port = getPort();
  app.listen(port, () => {
    logEvent("info", "server_started", { port, domains: catalog.listDomains().length });
  });
}

main().catch((err: unknown) => {
  logServerError("startup", err);
  process.exit(1);
});
