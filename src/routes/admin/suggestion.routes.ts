import { Router } from "express";
import { getSuggestions, reviewSuggestionAdmin } from "../../controllers/admin/suggestion.controller";

const router = Router();

router.get("/", getSuggestions);
router.patch("/:id", reviewSuggestionAdmin);

export default router;
