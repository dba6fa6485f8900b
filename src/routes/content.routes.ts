import { Router } from "express";
import { getContentPage } from "../controllers/content.controller";

const router = Router();

router.get("/about", getContentPage("about"));
router.get("/impressum", getContentPage("impressum"));

export default router;
