import { z } from "zod";
import { SuggestionStatus } from "../entities/GameSuggestion";
import { optionalText } from "./common";

export const suggestionReviewSchema = z.object({
  status: z.nativeEnum(SuggestionStatus),
  adminNotes: optionalText(5000).optional(),
});

export type SuggestionReview = z.infer<typeof suggestionReviewSchema>;
