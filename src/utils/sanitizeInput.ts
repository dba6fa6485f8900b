import validator from "validator";

export interface SanitizeOptions {
  maxLength?: number;
  // Keep line breaks (descriptions, notes, markdown)
  multiline?: boolean;
}

/**
 * Trims a free-text input and removes control characters and HTML tags.
 * Returns an empty string for non-string input.
 */
export function sanitizeInput(value: unknown, options: SanitizeOptions = {}): string {
  const { maxLength, multiline = false } = options;

  if (typeof value !== "string") return "";

  let cleaned = validator.stripLow(value, multiline)
    .replace(/<\/?[a-zA-Z][^>]*>/g, "")
    .trim();

  if (maxLength && cleaned.length > maxLength) {
    cleaned = cleaned.substring(0, maxLength);
  }

  return cleaned;
}

/**
 * Same as sanitizeInput but keeps markdown-significant characters and
 * angle brackets; the markdown renderer sanitizes the HTML it produces.
 */
export function sanitizeMarkdown(value: unknown, maxLength = 20000): string {
  if (typeof value !== "string") return "";

  const cleaned = validator.stripLow(value, true).trim();
  return cleaned.length > maxLength ? cleaned.substring(0, maxLength) : cleaned;
}
