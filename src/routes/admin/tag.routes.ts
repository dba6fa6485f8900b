import { Router } from "express";
import { createTagAdmin, deleteTagAdmin, getTags, updateTagAdmin } from "../../controllers/admin/tag.controller";

const router = Router();

router.get("/:kind", getTags);
router.post("/:kind", createTagAdmin);
router.patch("/:kind/:id", updateTagAdmin);
router.delete("/:kind/:id", deleteTagAdmin);

export default router;
