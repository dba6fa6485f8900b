import { Router } from "express";
import { createSuggestion } from "../controllers/suggestion.controller";
import { honeypotMiddleware } from "../middlewares/honeypotMiddleware";
import { createLimiter } from "../middlewares/rateLimiter";
import { requireAuth } from "../middlewares/requireAuth";
import { loadVisitorState } from "../middlewares/sessionMiddleware";

const router = Router();

router.post("/", requireAuth, createLimiter, honeypotMiddleware, loadVisitorState, createSuggestion);

export default router;
