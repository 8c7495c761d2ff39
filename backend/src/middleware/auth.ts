// backend/src/middleware/auth.ts

import type { NextFunction, Request, Response } from "express";
import { sendError } from "../http/sendError";

function extractBearerToken(rawAuth: string | undefined): string | null {
  if (!rawAuth) return null;
  const m = rawAuth.match(/^Bearer\s+(.+)$/i);
  const token = m?.[1]?.trim();
  return token ? token : null;
}

/**
 * When AUTH_TOKEN is set every request must carry it, as a bearer token or
 * in x-auth-token. Unset means open access.
 */
export function authMiddleware(req: Request, res: Response, next: NextFunction) {
  if (req.method === "OPTIONS") return next();
  const expected = process.env.AUTH_TOKEN?.trim();
  if (!expected) return next();

  const bearer = extractBearerToken(req.get("authorization"));
  const xToken = (req.get("x-auth-token") ?? "").trim();
  const provided = bearer ?? (xToken.length > 0 ? xToken : null);

  if (!provided || provided !== expected) {
    return sendError(res, 401, "Unauthorized", "UNAUTHORIZED");
  }

  return next();
}
