// backend/src/controllers/tutoringController.ts

import type { Request, Response } from "express";
import { requestIdOf, sendError } from "../http/sendError";
import { parseRequest, tutoringEndBody, tutoringStartBody } from "../http/requestSchemas";
import { getServices } from "../services/container";
import { logServerError } from "../utils/logger";

// POST /api/tutoring/sessions
export const startTutoringSession = async (req: Request, res: Response) => {
  const body = parseRequest(tutoringStartBody, req.body, res);
  if (!body) return;

  try {
    const outcome = await getServices().tutoringSessions.start(body.learnerId, body.topic);
    if (outcome.status === "error") return sendError(res, 404, outcome.message, "NOT_FOUND");
    return res.status(201).json({
      session: outcome.session,
      endedPrevious: outcome.endedPrevious,
    });
  } catch (err) {
    logServerError("startTutoringSession", err, requestIdOf(res));
    return sendError(res, 500, "Failed to start tutoring session", "SERVER_ERROR");
  }
};

// POST /api/tutoring/sessions/:learnerId/end
export const endTutoringSession = async (req: Request, res: Response) => {
  const body = parseRequest(tutoringEndBody, req.body, res);
  if (!body) return;

  try {
    const outcome = await getServices().tutoringSessions.end(req.params.learnerId ?? "", body.endedBy);
    if (outcome.status === "error") return sendError(res, 404, outcome.message, "NOT_FOUND");
    return res.status(200).json({ session: outcome.session, summary: outcome.summary });
  } catch (err) {
    logServerError("endTutoringSession", err, requestIdOf(res));
    return sendError(res, 500, "Failed to end tutoring session", "SERVER_ERROR");
  }
};

// GET /api/tutoring/sessions/:learnerId/context
export const getTutoringContext = async (req: Request, res: Response) => {
  try {
    const context = await getServices().tutoringSessions.loadContext(req.params.learnerId ?? "");
    if (context.status === "error") return sendError(res, 404, context.message, "NOT_FOUND");
    return res.status(200).json({
      profile: context.profile,
      activeSession: context.activeSession,
      learningProgress: context.learningProgress,
    });
  } catch (err) {
    logServerError("getTutoringContext", err, requestIdOf(res));
    return sendError(res, 500, "Failed to load tutoring context", "SERVER_ERROR");
  }
};
