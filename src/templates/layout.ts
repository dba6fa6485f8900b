import validator from "validator";

export function escapeHtml(value: string | null | undefined): string {
  return value ? validator.escape(value) : "";
}

// Keeps line breaks of free-text fields in printed output
export function multiline(value: string | null | undefined): string {
  return escapeHtml(value).replace(/\r?\n/g, "<br>");
}

export function joinNames(rows: { name: string }[] | undefined): string {
  return escapeHtml((rows ?? []).map((row) => row.name).join(", "));
}

/**
 * Standalone printable document; no external stylesheets or scripts.
 */
export function printDocument(title: string, body: string): string {
  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="utf-8">
  <title>${escapeHtml(title)}</title>
  <style>
    body { font-family: Arial, sans-serif; color: #222; max-width: 800px; margin: 24px auto; padding: 0 16px; }
    h1 { font-size: 26px; margin-bottom: 4px; }
    h2 { font-size: 20px; margin: 24px 0 4px; }
    .meta { color: #666; font-size: 13px; margin: 2px 0; }
    .game { border-top: 1px solid #ccc; padding-top: 12px; page-break-inside: avoid; }
    .notes { background: #f5f5f5; padding: 8px; font-size: 13px; }
    @media print { body { margin: 0; } }
  </style>
</head>
<body>
${body}
</body>
</html>
`;
}
