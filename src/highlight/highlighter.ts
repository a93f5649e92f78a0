import type { RgbColor } from '../types.js';

export interface HighlightSpan {
  text: string;
  fg?: RgbColor;
  bg?: RgbColor;
}

export interface HighlightLine {
  spans: HighlightSpan[];
}

/**
 * Syntax highlighter seam. Implementations must be synchronous and return at least one
 * line, possibly empty, even for empty input.
 */
export interface Highlighter {
  highlight(lang: string | undefined, text: string): HighlightLine[];
}

/**
 * Split code into lines the way a line iterator does: a trailing line break does not
 * produce an extra empty line.
 */
export function splitCodeLines(text: string): string[] {
  if (!text) {
    return [''];
  }
  const lines = text.split('\n').map((line) => (line.endsWith('\r') ? line.slice(0, -1) : line));
  if (lines.length > 1 && lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

export const plainTextHighlighter: Highlighter = Object.freeze({
  highlight(_lang: string | undefined, text: string): HighlightLine[] {
    return splitCodeLines(text).map((line) => ({
      spans: line ? [{ text: line }] : [],
    }));
  },
});

let defaultHighlighter: Highlighter | null = null;

/**
 * Process-wide highlighter, built on first use and never mutated afterwards.
 */
export function getDefaultHighlighter(): Highlighter {
  if (!defaultHighlighter) {
    defaultHighlighter = plainTextHighlighter;
  }
  return defaultHighlighter;
}

/**
 * Run a highlighter, falling back to plain lines when it throws or returns nothing.
 */
export function highlightOrPlain(
  highlighter: Highlighter,
  lang: string | undefined,
  text: string,
): HighlightLine[] {
  try {
    const lines = highlighter.highlight(lang, text);
    if (Array.isArray(lines) && lines.length > 0) {
      return lines;
    }
    console.warn(`  Warning: Highlighter returned no lines for ${lang ?? 'plain'} code block`);
  } catch (err) {
    console.warn(`  Warning: Highlighter failed for ${lang ?? 'plain'} code block:`, err);
  }
  return plainTextHighlighter.highlight(lang, text);
}
