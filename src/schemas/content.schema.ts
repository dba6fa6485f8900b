import { z } from "zod";
import { sanitizeMarkdown } from "../utils/sanitizeInput";
import { requiredText } from "./common";

const markdown = z
  .string()
  .transform((value) => sanitizeMarkdown(value))
  .pipe(z.string().min(1, "Content is required"));

export const contentBlockSchema = z.object({
  title: requiredText("Title", 200),
  content: markdown,
  isActive: z.boolean().default(true),
  order: z.coerce.number().int().min(0).default(0),
});

export const contentBlockUpdateSchema = z.object({
  title: requiredText("Title", 200).optional(),
  content: markdown.optional(),
  isActive: z.boolean().optional(),
  order: z.coerce.number().int().min(0).optional(),
});

export type ContentBlockInput = z.infer<typeof contentBlockSchema>;
export type ContentBlockUpdate = z.infer<typeof contentBlockUpdateSchema>;
