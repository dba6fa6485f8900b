import { z } from "zod";
import { DURATION_MULTIPLIER } from "../config/catalog";
import { entityId, optionalText, requiredText } from "./common";

const multiplier = z.coerce
  .number()
  .min(DURATION_MULTIPLIER.MIN, `Multiplier must be at least ${DURATION_MULTIPLIER.MIN}`)
  .max(DURATION_MULTIPLIER.MAX, `Multiplier must be at most ${DURATION_MULTIPLIER.MAX}`);

export const cartItemSchema = z.object({
  gameId: entityId,
});

export const createSessionSchema = z.object({
  name: requiredText("Name", 200),
  description: optionalText(5000),
});

export const sessionEntrySchema = z.object({
  gameId: entityId,
  order: entityId,
  durationMultiplier: multiplier.default(DURATION_MULTIPLIER.DEFAULT),
  notes: optionalText(2000),
});

export const sessionEntryUpdateSchema = z.object({
  gameId: entityId.optional(),
  order: entityId.optional(),
  durationMultiplier: multiplier.optional(),
  notes: optionalText(2000).optional(),
});

export type CreateSessionInput = z.infer<typeof createSessionSchema>;
export type SessionEntryInput = z.infer<typeof sessionEntrySchema>;
export type SessionEntryUpdate = z.infer<typeof sessionEntryUpdateSchema>;
