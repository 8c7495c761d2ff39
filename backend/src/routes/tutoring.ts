// backend/src/routes/tutoring.ts

import { Router } from "express";
import { createLearner, updateLearner } from "../controllers/learnerController";
import {
  endTutoringSession,
  getTutoringContext,
  startTutoringSession,
} from "../controllers/tutoringController";

const router = Router();

router.post("/tutoring/sessions", startTutoringSession);
router.post("/tutoring/sessions/:learnerId/end", endTutoringSession);
router.get("/tutoring/sessions/:learnerId/context", getTutoringContext);

router.post("/learners", createLearner);
router.patch("/learners/:id/model", updateLearner);

export default router;
