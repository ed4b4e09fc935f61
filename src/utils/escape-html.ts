/**
 * Escape "&", "<" and ">", plus '"' when the text goes into an attribute
 */
export function escapeHtml(text: string, quote: boolean = false): string {
  const escaped = text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;");
  return quote ? escaped.replace(/"/g, "&quot;") : escaped;
}
