export function normalizeWhitespace(s: string) {
  return (s || "")
    .replace(/\r/g, "")
    .replace(/[ \t\u00a0]+/g, " ")
    .trim();
}

export type NumberedLine = { lineNumber: number; text: string };

/** Split text into trimmed, non-empty lines, keeping 1-based source line numbers. */
export function toNumberedLines(text: string): NumberedLine[] {
  const out: NumberedLine[] = [];
  const raw = (text || "").replace(/\r\n?/g, "\n").split("\n");
  for (let i = 0; i < raw.length; i += 1) {
    const line = normalizeWhitespace(raw[i]);
    if (line) out.push({ lineNumber: i + 1, text: line });
  }
  return out;
}

export function countLines(text: string): number {
  if (!text) return 0;
  let n = 1;
  for (let i = 0; i < text.length; i += 1) {
    if (text.charCodeAt(i) === 10) n += 1;
  }
  return n;
}
