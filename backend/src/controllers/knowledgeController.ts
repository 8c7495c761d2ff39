// backend/src/controllers/knowledgeController.ts

import type { Request, Response } from "express";
import { requestIdOf, sendError } from "../http/sendError";
import { agentsBody, knowledgeBody, parseRequest } from "../http/requestSchemas";
import { getServices } from "../services/container";
import type { QueryRoute } from "../types";
import { logServerError } from "../utils/logger";

function queryHandler(route: Extract<QueryRoute, "qa" | "summarization">, context: string) {
  return async (req: Request, res: Response) => {
    const body = parseRequest(knowledgeBody, req.body, res);
    if (!body) return;
    const requestId = requestIdOf(res);

    try {
      const result = await getServices().dispatcher.dispatchQuery(
        {
          route,
          query: body.query,
          sessionId: body.sessionId,
          documentId: body.documentId,
          learnerId: null,
          state: {},
        },
        { requestId }
      );
      return res.status(200).json(result);
    } catch (err) {
      logServerError(context, err, requestId);
      return sendError(res, 500, "Failed to answer question", "SERVER_ERROR");
    }
  };
}

// POST /api/qa
export const answerQuestion = queryHandler("qa", "answerQuestion");

// POST /api/summarize
export const summarizeDocument = queryHandler("summarization", "summarizeDocument");

// POST /api/learning-unit
export const buildLearningUnit = async (req: Request, res: Response) => {
  const body = parseRequest(knowledgeBody, req.body, res);
  if (!body) return;
  const requestId = requestIdOf(res);

  try {
    const result = await getServices().learningUnit({
      query: body.query,
      sessionId: body.sessionId,
      filter: body.documentId ? { documentId: body.documentId } : undefined,
      requestId,
    });
    return res.status(200).json({
      status: result.status,
      answer: result.answer,
      learningUnit: result.payload,
      sources: result.sources,
    });
  } catch (err) {
    logServerError("buildLearningUnit", err, requestId);
    return sendError(res, 500, "Failed to build learning unit", "SERVER_ERROR");
  }
};

// POST /api/agents
export const runContentAgent = async (req: Request, res: Response) => {
  const body = parseRequest(agentsBody, req.body, res);
  if (!body) return;
  const requestId = requestIdOf(res);

  try {
    const result = await getServices().dispatcher.dispatchQuery(
      {
        route: "content_agent",
        query: body.query,
        sessionId: body.sessionId,
        documentId: body.documentId,
        learnerId: body.learnerId,
        state: body.state,
      },
      { requestId }
    );
    return res.status(200).json(result);
  } catch (err) {
    logServerError("runContentAgent", err, requestId);
    return sendError(res, 500, "Failed to run content agent", "SERVER_ERROR");
  }
};
