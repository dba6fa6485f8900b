import { Router } from "express";
import { requireAuth } from "../../middlewares/requireAuth";
import { isAdmin } from "../../middlewares/isAdmin";
import gameRoutes from "./game.routes";
import tagRoutes from "./tag.routes";
import languageRoutes from "./language.routes";
import suggestionRoutes from "./suggestion.routes";
import contentRoutes from "./content.routes";

const router = Router();

// Admin routes - all require admin authentication
router.use(requireAuth, isAdmin);

router.use("/games", gameRoutes);
router.use("/tags", tagRoutes);
router.use("/languages", languageRoutes);
router.use("/suggestions", suggestionRoutes);
router.use("/content", contentRoutes);

export default router;
