// backend/src/routes/sessions.ts

import { Router } from "express";
import { createSession, getChatHistory, getSession, patchSession } from "../controllers/sessionController";

const router = Router();

router.post("/sessions", createSession);
router.get("/sessions/:id", getSession);
router.patch("/sessions/:id", patchSession);
router.get("/chat-history/:sessionId", getChatHistory);

export default router;
