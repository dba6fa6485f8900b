import { z } from "zod";
import { DURATION_VALUES, PLAYER_COUNT_VALUES } from "../config/catalog";
import { idList, optionalText, requiredText } from "./common";

export const gameInputSchema = z.object({
  name: requiredText("Name", 200),
  description: requiredText("Description", 5000, true),
  playerCount: z.enum(PLAYER_COUNT_VALUES),
  duration: z.enum(DURATION_VALUES),
  variants: optionalText(5000),
  focusIds: idList,
  materialIds: idList,
  labelIds: idList,
  languageIds: idList.refine((ids) => ids.length > 0, "At least one language is required"),
});

export const gameUpdateSchema = gameInputSchema.partial().extend({
  isActive: z.boolean().optional(),
});

export type GameInput = z.infer<typeof gameInputSchema>;
export type GameUpdate = z.infer<typeof gameUpdateSchema>;
