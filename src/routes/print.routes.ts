import { Router } from "express";
import { printCart, printGame, printSession } from "../controllers/print.controller";
import { requireAuth } from "../middlewares/requireAuth";
import { loadVisitorState } from "../middlewares/sessionMiddleware";

const router = Router();

router.get("/game/:id", printGame);
router.get("/session/:id", requireAuth, printSession);
router.get("/cart", loadVisitorState, printCart);

export default router;
