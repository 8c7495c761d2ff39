// backend/src/index.ts
// backend entry file

import "dotenv/config";
import { createApp } from "./app";
import { getPipelineConfig } from "./config/pipelineConfig";
import { connectMongo } from "./db/mongo";
import { logInfo, logServerError } from "./utils/logger";

const PORT = process.env.PORT || 3000;

async function main() {
  const config = getPipelineConfig();
  await connectMongo(process.env.MONGO_URI ?? "mongodb://127.0.0.1:27017/corpus-tutor");

  createApp(config).listen(PORT, () => {
    logInfo("server_started", { url: `http://localhost:${PORT}` });
  });
}

main().catch((err: unknown) => {
  logServerError("startup", err);
  process.exit(1);
});
