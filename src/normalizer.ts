/**
 * Whitespace canonicalization applied to every page before chunking. Chunk
 * offsets refer to the output of {@link normalize}, never to the raw page.
 */

// Tab, vertical tab, form feed, no-break space.
const HORIZONTAL_SPACE = /[\t\v\f\u00a0]/g;
const LINE_BREAK = /\r\n?/g;
const TRAILING_SPACE = / +\n/g;
const EXCESS_BLANK_LINES = /\n{3,}/g;

export function normalize(text: string): string {
  if (text.length === 0) return text;
  return text
    .replace(HORIZONTAL_SPACE, " ")
    .replace(LINE_BREAK, "\n")
    .replace(TRAILING_SPACE, "\n")
    .replace(EXCESS_BLANK_LINES, "\n\n");
}
