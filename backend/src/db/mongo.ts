// backend/src/db/mongo.ts

import mongoose from "mongoose";
import { logEvent } from "../utils/logger";

export async function connectMongo(uri: string): Promise<void> {
  await mongoose.connect(uri);
  logEvent("info", "mongo_connected");
}

export async function disconnectMongo(): Promise<void> {
  await mongoose.disconnect();
}
