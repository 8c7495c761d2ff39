// backend/src/controllers/learnerController.ts

import type { Request, Response } from "express";
import { requestIdOf, sendError } from "../http/sendError";
import { learnerCreateBody, learnerUpdateBody, parseRequest } from "../http/requestSchemas";
import { getServices } from "../services/container";
import { updateLearnerModel } from "../tutoring/learnerModel";
import { logServerError } from "../utils/logger";

// POST /api/learners
export const createLearner = async (req: Request, res: Response) => {
  const body = parseRequest(learnerCreateBody, req.body, res);
  if (!body) return;

  try {
    const profile = await getServices().stores.profiles.create(body);
    return res.status(201).json({ profile });
  } catch (err) {
    logServerError("createLearner", err, requestIdOf(res));
    return sendError(res, 500, "Failed to create learner profile", "SERVER_ERROR");
  }
};

// PATCH /api/learners/:id/model
export const updateLearner = async (req: Request, res: Response) => {
  const update = parseRequest(learnerUpdateBody, req.body, res);
  if (!update) return;

  try {
    const profile = await updateLearnerModel(getServices().stores.profiles, req.params.id ?? "", update);
    if (!profile) return sendError(res, 404, "Learner profile not found", "NOT_FOUND");
    return res.status(200).json({ profile });
  } catch (err) {
    logServerError("updateLearner", err, requestIdOf(res));
    return sendError(res, 500, "Failed to update learner model", "SERVER_ERROR");
  }
};
