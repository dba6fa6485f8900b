import { Response } from "express";
import { AuthenticatedRequest } from "../types/express";
import { SUPPORTED_LANGUAGES } from "../config/catalog";
import { saveVisitor, setLanguage } from "../services/visitor.service";
import { sendError } from "../utils/httpErrors";
import { translate } from "../utils/i18n";

// GET /language
export const getLanguage = (req: AuthenticatedRequest, res: Response): void => {
  if (!req.visitor) {
    res.status(400).json({ error: "Missing session" });
    return;
  }

  res.json({ current: req.visitor.language, available: SUPPORTED_LANGUAGES });
};

// POST /language; unsupported codes leave the current language in place
export const changeLanguage = async (req: AuthenticatedRequest, res: Response): Promise<void> => {
  const visitor = req.visitor;
  if (!visitor) {
    res.status(400).json({ error: "Missing session" });
    return;
  }

  try {
    const code: unknown = req.body?.language;
    const accepted = setLanguage(visitor, code);
    await saveVisitor(visitor);

    const name = SUPPORTED_LANGUAGES.find((language) => language.code === visitor.language)?.name ?? visitor.language;
    res.json({
      success: accepted,
      current: visitor.language,
      message: translate(visitor.language, "language.changed", { language: name }),
    });
  } catch (err) {
    sendError(res, err, "Error changing language");
  }
};
