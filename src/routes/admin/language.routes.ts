import { Router } from "express";
import { createLanguageAdmin, deleteLanguageAdmin, getLanguages } from "../../controllers/admin/tag.controller";

const router = Router();

router.get("/", getLanguages);
router.post("/", createLanguageAdmin);
router.delete("/:id", deleteLanguageAdmin);

export default router;
