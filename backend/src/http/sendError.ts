// backend/src/http/sendError.ts

import type { Response } from "express";

export type ErrorCode =
  | "INVALID_REQUEST"
  | "UNAUTHORIZED"
  | "NOT_FOUND"
  | "RATE_LIMITED"
  | "SERVER_ERROR";

export function requestIdOf(res: Response): string | undefined {
  const rid: unknown = res.locals?.requestId;
  return typeof rid === "string" ? rid : undefined;
}

export function sendError(
  res: Response,
  status: number,
  message: string,
  code?: ErrorCode
): Response {
  const requestId = requestIdOf(res);

  return res.status(status).json({
    error: message,
    ...(code ? { code } : {}),
    ...(requestId ? { requestId } : {}),
  });
}
