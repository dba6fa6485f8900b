import { Request, Response } from "express";
import { SuggestionStatus } from "../../entities/GameSuggestion";
import { listSuggestions, reviewSuggestion } from "../../services/suggestion.service";
import { NotFoundError, ValidationError } from "../../utils/errors";
import { parseIdParam, sendError } from "../../utils/httpErrors";

const STATUSES: readonly string[] = Object.values(SuggestionStatus);

function isSuggestionStatus(value: unknown): value is SuggestionStatus {
  return typeof value === "string" && STATUSES.includes(value);
}

// GET /admin/suggestions?status=pending
export const getSuggestions = async (req: Request, res: Response): Promise<void> => {
  try {
    const { status } = req.query;
    if (status !== undefined && !isSuggestionStatus(status)) {
      throw ValidationError.forField("status", "Unknown suggestion status");
    }
    res.json(await listSuggestions(status));
  } catch (err) {
    sendError(res, err, "Error listing suggestions");
  }
};

// PATCH /admin/suggestions/:id
export const reviewSuggestionAdmin = async (req: Request, res: Response): Promise<void> => {
  try {
    const id = parseIdParam(req.params.id);
    if (id === null) throw new NotFoundError("Suggestion");
    res.json(await reviewSuggestion(id, req.body));
  } catch (err) {
    sendError(res, err, "Error reviewing suggestion");
  }
};
