import { Router } from "express";
import { getGameById, listGames } from "../controllers/game.controller";
import { searchLimiter } from "../middlewares/rateLimiter";
import { loadVisitorState } from "../middlewares/sessionMiddleware";

const router = Router();

router.use(loadVisitorState);

router.get("/", searchLimiter, listGames);
router.get("/:id", getGameById);

export default router;
