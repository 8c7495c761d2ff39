// backend/src/db/mongo.ts

import mongoose from "mongoose";
import { ExternalCallError } from "../utils/errors";
import { logInfo, logServerError } from "../utils/logger";

export async function connectMongo(uri: string) {
  try {
    await mongoose.connect(uri);
    logInfo("mongo_connected");
  } catch (err) {
    logServerError("mongo", err);
    process.exit(1);
  }
}

export function isMongoReady(): boolean {
  // 0 = disconnected, 1 = connected, 2 = connecting, 3 = disconnecting
  return mongoose.connection.readyState === 1;
}

/** Fails fast instead of letting mongoose buffer the operation. */
export function requireMongo(): void {
  if (!isMongoReady()) throw new ExternalCallError("storage", new Error("MongoDB is not connected"));
}
