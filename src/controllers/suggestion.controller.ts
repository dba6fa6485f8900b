import { Response } from "express";
import { AuthenticatedRequest } from "../types/express";
import { submitSuggestion } from "../services/suggestion.service";
import { sendError } from "../utils/httpErrors";
import { translate } from "../utils/i18n";
import { DEFAULT_LANGUAGE } from "../config/catalog";

// POST /suggestions
export const createSuggestion = async (req: AuthenticatedRequest, res: Response): Promise<void> => {
  try {
    const suggestion = await submitSuggestion(req.body, req.user);
    res.status(201).json({
      success: true,
      message: translate(req.visitor?.language ?? DEFAULT_LANGUAGE, "suggestion.submitted"),
      suggestion,
    });
  } catch (err) {
    sendError(res, err, "Error submitting game suggestion");
  }
};
