// backend/src/middleware/requestContext.ts

import type { NextFunction, Request, Response } from "express";
import crypto from "node:crypto";
import { logInfo } from "../utils/logger";

function normalizeIncomingRequestId(v: unknown): string | null {
  if (typeof v !== "string") return null;
  const t = v.trim();
  if (!t || t.length > 64) return null;
  if (!/^[A-Za-z0-9_-]+$/.test(t)) return null;
  return t;
}

export function requestContext(req: Request, res: Response, next: NextFunction) {
  const requestId = normalizeIncomingRequestId(req.get("x-request-id")) ?? crypto.randomUUID();

  res.locals.requestId = requestId;
  if (!res.headersSent) res.setHeader("x-request-id", requestId);

  const start = process.hrtime.bigint();

  res.on("finish", () => {
    const latencyMs = Number(process.hrtime.bigint() - start) / 1_000_000;
    // route template, so ids in the URL stay out of the logs
    const routePath: unknown = req.route?.path;
    const path = (req.baseUrl || "") + (typeof routePath === "string" ? routePath : req.path);

    logInfo("request", {
      requestId,
      method: req.method,
      path,
      status: res.statusCode,
      latencyMs: Math.round(latencyMs * 10) / 10,
    });
  });

  next();
}
