import { Router } from "express";
import {
  addEntry,
  getMySession,
  getMySessions,
  removeEntry,
  removeSession,
  updateEntry,
} from "../controllers/trainingSession.controller";
import { requireAuth } from "../middlewares/requireAuth";

const router = Router();

router.use(requireAuth);

router.get("/", getMySessions);
router.get("/:id", getMySession);
router.delete("/:id", removeSession);
router.post("/:id/entries", addEntry);
router.patch("/:id/entries/:entryId", updateEntry);
router.delete("/:id/entries/:entryId", removeEntry);

export default router;
