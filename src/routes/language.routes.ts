import { Router } from "express";
import { changeLanguage, getLanguage } from "../controllers/language.controller";
import { loadVisitorState } from "../middlewares/sessionMiddleware";

const router = Router();

router.use(loadVisitorState);

router.get("/", getLanguage);
router.post("/", changeLanguage);

export default router;
