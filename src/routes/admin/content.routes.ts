import { Router } from "express";
import {
  createBlockAdmin,
  deleteBlockAdmin,
  getBlocks,
  updateBlockAdmin,
} from "../../controllers/admin/content.controller";

const router = Router();

router.get("/:kind", getBlocks);
router.post("/:kind", createBlockAdmin);
router.patch("/:kind/:id", updateBlockAdmin);
router.delete("/:kind/:id", deleteBlockAdmin);

export default router;
