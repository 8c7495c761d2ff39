// backend/src/controllers/documentController.ts

import type { Request, Response } from "express";
import { requestIdOf, sendError } from "../http/sendError";
import { parseRequest, uploadBody } from "../http/requestSchemas";
import { getServices } from "../services/container";
import { logServerError } from "../utils/logger";

// POST /api/upload
export const uploadDocument = async (req: Request, res: Response) => {
  const body = parseRequest(uploadBody, req.body, res);
  if (!body) return;
  const requestId = requestIdOf(res);

  try {
    const { document, chunkCount } = await getServices().ingest(
      {
        title: body.title,
        sessionId: body.sessionId,
        metadata: body.metadata,
        pages: body.pages,
        text: body.text,
      },
      requestId
    );
    return res.status(201).json({
      document: {
        id: document.id,
        title: document.title,
        sessionId: document.sessionId,
        language: document.language,
        pageCount: Object.keys(document.pages).length,
        createdAt: document.createdAt,
      },
      chunkCount,
    });
  } catch (err) {
    logServerError("uploadDocument", err, requestId);
    return sendError(res, 500, "Failed to ingest document", "SERVER_ERROR");
  }
};
