import { Router } from "express";
import {
  createGameAdmin,
  deactivateGameAdmin,
  getAllGamesAdmin,
  updateGameAdmin,
} from "../../controllers/admin/game.controller";

const router = Router();

router.get("/", getAllGamesAdmin);
router.post("/", createGameAdmin);
router.patch("/:id", updateGameAdmin);
router.delete("/:id", deactivateGameAdmin);

export default router;
