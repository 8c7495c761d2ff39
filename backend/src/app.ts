// backend/src/app.ts

import cors from "cors";
import express from "express";
import type { PipelineConfig } from "./config/pipelineConfig";
import { authMiddleware } from "./middleware/auth";
import { errorEnvelope, notFoundHandler } from "./middleware/errorEnvelope";
import { createRateLimitMiddleware } from "./middleware/rateLimit";
import { requestContext } from "./middleware/requestContext";
import routingRoutes from "./routes/routing";
import sessionRoutes from "./routes/sessions";
import tutoringRoutes from "./routes/tutoring";

export function createApp(config: PipelineConfig) {
  const app = express();

  app.use(requestContext);
  app.use(
    cors({
      origin: "*",
      methods: ["GET", "POST", "PATCH"],
    })
  );

  // body size limit; uploads carry whole documents
  app.use(express.json({ limit: "5mb" }));

  // basic rate limit (no PII)
  app.use(createRateLimitMiddleware(config.rateLimit));

  // health BEFORE auth
  app.get("/health", (_req, res) => res.status(200).json({ status: "ok" }));

  app.use(authMiddleware);

  app.use("/api", routingRoutes);
  app.use("/api", sessionRoutes);
  app.use("/api", tutoringRoutes);

  app.use(notFoundHandler);
  app.use(errorEnvelope);

  return app;
}
