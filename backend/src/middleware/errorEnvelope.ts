// backend/src/middleware/errorEnvelope.ts

import type { NextFunction, Request, Response } from "express";
import { requestIdOf, sendError } from "../http/sendError";
import { logServerError } from "../utils/logger";

export function notFoundHandler(_req: Request, res: Response) {
  sendError(res, 404, "Not Found", "NOT_FOUND");
}

/** Last stop for anything a controller let escape. Body-parser errors keep their 4xx. */
export function errorEnvelope(err: unknown, _req: Request, res: Response, next: NextFunction) {
  if (res.headersSent) return next(err);

  const status = clientErrorStatus(err);
  if (status !== null) {
    return sendError(res, status, status === 413 ? "Request body too large" : "Malformed request body", "INVALID_REQUEST");
  }

  logServerError("unhandled_error", err, requestIdOf(res));
  return sendError(res, 500, "Server error", "SERVER_ERROR");
}

function clientErrorStatus(err: unknown): number | null {
  if (typeof err !== "object" || err === null || !("status" in err)) return null;
  const status = err.status;
  return typeof status === "number" && status >= 400 && status < 500 ? status : null;
}
