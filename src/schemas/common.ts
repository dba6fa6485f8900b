import { z } from "zod";
import { sanitizeInput } from "../utils/sanitizeInput";

// Trimmed, tag-free text capped at `max` characters
export const cleanText = (max: number, multiline = false) =>
  z.string().transform((value) => sanitizeInput(value, { maxLength: max, multiline }));

export const requiredText = (field: string, max: number, multiline = false) =>
  cleanText(max, multiline).pipe(z.string().min(1, `${field} is required`));

export const optionalText = (max: number, multiline = true) => cleanText(max, multiline).default("");

export const entityId = z.coerce.number().int().positive();

export const idList = z.array(entityId).default([]).transform((ids) => [...new Set(ids)]);
