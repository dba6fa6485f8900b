import { Marked } from "marked";
import sanitizeHtml from "sanitize-html";

// Headings are not allowed in content blocks
const HEADING_MARKER = /^\s{0,3}#{1,6}\s+/gm;

const ALLOWED_TAGS = [
  "p", "br", "strong", "b", "em", "i", "u",
  "ul", "ol", "li",
  "blockquote",
  "code", "pre",
];

const markdown = new Marked({ gfm: true, breaks: true });

/**
 * Converts admin-authored markdown into the restricted HTML subset that
 * About/Impressum blocks may contain. The result can be injected into a page
 * as-is.
 */
export function renderMarkdown(text: string | null | undefined): string {
  if (!text) return "";

  const withoutHeadings = text.replace(HEADING_MARKER, "");
  const html = markdown.parse(withoutHeadings, { async: false });
  if (typeof html !== "string") {
    throw new Error("Markdown renderer returned a promise");
  }

  return sanitizeHtml(html, {
    allowedTags: ALLOWED_TAGS,
    allowedAttributes: { "*": ["class"] },
    disallowedTagsMode: "discard",
  });
}
