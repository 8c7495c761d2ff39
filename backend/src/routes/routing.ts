// backend/src/routes/routing.ts

import { Router } from "express";
import { routeActionOnly, routeMessage } from "../controllers/routerController";
import {
  answerQuestion,
  buildLearningUnit,
  runContentAgent,
  summarizeDocument,
} from "../controllers/knowledgeController";
import { uploadDocument } from "../controllers/documentController";

const router = Router();

router.post("/router", routeMessage);
router.post("/action_route", routeActionOnly);
router.post("/qa", answerQuestion);
router.post("/summarize", summarizeDocument);
router.post("/learning-unit", buildLearningUnit);
router.post("/agents", runContentAgent);
router.post("/upload", uploadDocument);

export default router;
