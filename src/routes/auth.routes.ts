import { Router } from "express";
import { getCurrentUser, login, logout, register } from "../controllers/auth.controller";
import { requireAuth } from "../middlewares/requireAuth";
import { honeypotMiddleware } from "../middlewares/honeypotMiddleware";
import { rateLimiter, loginLimiter } from "../middlewares/rateLimiter";

const router = Router();

// Public routes
router.post("/register", rateLimiter, honeypotMiddleware, register);
router.post("/login", loginLimiter, honeypotMiddleware, login);

// Authenticated user routes
router.post("/logout", requireAuth, logout);
router.get("/me", requireAuth, getCurrentUser);

export default router;
