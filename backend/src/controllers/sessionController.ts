// backend/src/controllers/sessionController.ts

import type { Request, Response } from "express";
import { requestIdOf, sendError } from "../http/sendError";
import { chatHistoryQuery, parseRequest, sessionCreateBody, sessionPatchBody } from "../http/requestSchemas";
import { getServices } from "../services/container";
import { logServerError } from "../utils/logger";

// POST /api/sessions
export const createSession = async (req: Request, res: Response) => {
  const body = parseRequest(sessionCreateBody, req.body, res);
  if (!body) return;

  try {
    const session = await getServices().stores.sessions.create(body.metadata);
    return res.status(201).json({ session });
  } catch (err) {
    logServerError("createSession", err, requestIdOf(res));
    return sendError(res, 500, "Failed to create session", "SERVER_ERROR");
  }
};

// GET /api/sessions/:id
export const getSession = async (req: Request, res: Response) => {
  try {
    const session = await getServices().stores.sessions.get(req.params.id ?? "");
    if (!session) return sendError(res, 404, "Session not found", "NOT_FOUND");
    return res.status(200).json({ session });
  } catch (err) {
    logServerError("getSession", err, requestIdOf(res));
    return sendError(res, 500, "Failed to fetch session", "SERVER_ERROR");
  }
};

// PATCH /api/sessions/:id
export const patchSession = async (req: Request, res: Response) => {
  const body = parseRequest(sessionPatchBody, req.body, res);
  if (!body) return;

  try {
    const session = await getServices().stores.sessions.patchMetadata(req.params.id ?? "", body.metadata);
    if (!session) return sendError(res, 404, "Session not found", "NOT_FOUND");
    return res.status(200).json({ session });
  } catch (err) {
    logServerError("patchSession", err, requestIdOf(res));
    return sendError(res, 500, "Failed to update session", "SERVER_ERROR");
  }
};

// GET /api/chat-history/:sessionId?limit=&offset=
export const getChatHistory = async (req: Request, res: Response) => {
  const page = parseRequest(chatHistoryQuery, req.query, res);
  if (!page) return;
  const sessionId = req.params.sessionId ?? "";

  try {
    const { turns, total } = await getServices().stores.conversations.listBySession(sessionId, page);
    return res.status(200).json({ sessionId, turns, total, limit: page.limit, offset: page.offset });
  } catch (err) {
    logServerError("getChatHistory", err, requestIdOf(res));
    return sendError(res, 500, "Failed to fetch chat history", "SERVER_ERROR");
  }
};
