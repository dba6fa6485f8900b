import { z } from "zod";
import { idList, optionalText, requiredText } from "./common";

export const tagInputSchema = z.object({
  name: requiredText("Name", 100),
  description: optionalText(2000),
  color: z
    .string()
    .regex(/^#[0-9a-fA-F]{6}$/, "Color must be a hex value like #007bff")
    .default("#007bff"),
  languageIds: idList,
});

export const tagUpdateSchema = tagInputSchema.partial();

export const languageInputSchema = z.object({
  code: z.string().trim().toLowerCase().min(2).max(10).regex(/^[a-z-]+$/, "Invalid language code"),
  name: requiredText("Name", 50),
});

export type TagInput = z.infer<typeof tagInputSchema>;
export type TagUpdate = z.infer<typeof tagUpdateSchema>;
export type LanguageInput = z.infer<typeof languageInputSchema>;
