import { Router } from "express";
import {
  addGameToCart,
  checkoutCart,
  clearVisitorCart,
  removeGameFromCart,
  viewCart,
} from "../controllers/cart.controller";
import { createLimiter } from "../middlewares/rateLimiter";
import { loadVisitorState } from "../middlewares/sessionMiddleware";

const router = Router();

router.use(loadVisitorState);

router.get("/", viewCart);
router.post("/add", addGameToCart);
router.post("/remove", removeGameFromCart);
router.post("/clear", clearVisitorCart);
router.post("/checkout", createLimiter, checkoutCart);

export default router;
