// backend/src/controllers/routerController.ts

import type { Request, Response } from "express";
import { requestIdOf, sendError } from "../http/sendError";
import { parseRequest, routerBody } from "../http/requestSchemas";
import { getServices } from "../services/container";
import { logServerError } from "../utils/logger";

// POST /api/router
export const routeMessage = async (req: Request, res: Response) => {
  const body = parseRequest(routerBody, req.body, res);
  if (!body) return;
  const requestId = requestIdOf(res);

  try {
    const outcome = await getServices().router.route({
      utterance: body.message,
      sessionId: body.sessionId,
      documentId: body.documentId,
      learnerId: body.learnerId,
      currentPage: body.currentPage,
      state: body.state,
      requestId,
    });

    if (outcome.kind === "action") {
      return res.status(200).json({
        classification: outcome.intent,
        action: outcome.decision,
        result: outcome.result,
      });
    }
    return res.status(200).json({
      classification: outcome.intent,
      query: outcome.decision,
      route: outcome.route,
      result: outcome.result,
    });
  } catch (err) {
    logServerError("routeMessage", err, requestId);
    return sendError(res, 500, "Failed to route message", "SERVER_ERROR");
  }
};

// POST /api/action_route
export const routeActionOnly = async (req: Request, res: Response) => {
  const body = parseRequest(routerBody, req.body, res);
  if (!body) return;
  const requestId = requestIdOf(res);

  try {
    const { decision, result } = await getServices().router.routeAction({
      utterance: body.message,
      sessionId: body.sessionId,
      documentId: body.documentId,
      learnerId: body.learnerId,
      currentPage: body.currentPage,
      state: body.state,
      requestId,
    });
    return res.status(200).json({ action: decision, result });
  } catch (err) {
    logServerError("routeActionOnly", err, requestId);
    return sendError(res, 500, "Failed to route action", "SERVER_ERROR");
  }
};
