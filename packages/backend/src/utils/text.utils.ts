export function compactWhitespace(text: string): string {
  return text.split(/\s+/).filter(Boolean).join(' ');
}

/**
 * Collapses horizontal whitespace on every line, trims lines and drops
 * blank ones. Line breaks survive so section headings stay detectable.
 */
export function normalizeLines(text: string): string {
  return text
    .replace(/\r\n?/g, '\n')
    .split('\n')
    .map((line) => line.replace(/[\t\f\v \u00a0]+/g, ' ').trim())
    .filter((line) => line.length > 0)
    .join('\n');
}

export function nowIso(): string {
  return new Date().toISOString();
}
