/**
 * Inline marker codec.
 *
 * Block text carries inline formatting as a flat string with private control characters
 * instead of a tree:
 *
 *   STYLE_START code ... STYLE_END code     style span (code is one of b, i, u, c, x, s)
 *   LINK_START target LINK_END              opens a link to `target`
 *   LINK_START LINK_END                     closes the current link
 *   ANCHOR_START name ANCHOR_END            zero-width named position
 *
 * Styles are reference counted, so overlapping spans of the same style compose.
 */

import { type TextStyle, defaultTextStyle } from '../types.js';

export const STYLE_START = '\u001e';
export const STYLE_END = '\u001f';
export const LINK_START = '\u001c';
export const LINK_END = '\u001d';
export const ANCHOR_START = '\u0018';
export const ANCHOR_END = '\u0017';

export type StyleCode = 'b' | 'i' | 'u' | 'c' | 'x' | 's';

const STYLE_CODES = new Set<string>(['b', 'i', 'u', 'c', 'x', 's']);

export type InlinePiece =
  | { kind: 'span'; text: string; style: TextStyle; link?: string }
  | { kind: 'anchor'; name: string };

interface StyleCounts {
  bold: number;
  italic: number;
  underline: number;
  code: number;
  strike: number;
  smallCaps: number;
}

export function isStyleCode(value: string): value is StyleCode {
  return STYLE_CODES.has(value);
}

export function styleOpen(code: StyleCode): string {
  return `${STYLE_START}${code}`;
}

export function styleClose(code: StyleCode): string {
  return `${STYLE_END}${code}`;
}

export function wrapStyle(text: string, code: StyleCode): string {
  return `${styleOpen(code)}${text}${styleClose(code)}`;
}

/**
 * Open a link. An empty target produces nothing, since an empty link span would close
 * whatever link is active.
 */
export function linkOpen(target: string): string {
  const trimmed = target.trim();
  if (!trimmed) {
    return '';
  }
  return `${LINK_START}${trimmed}${LINK_END}`;
}

export function linkClose(): string {
  return `${LINK_START}${LINK_END}`;
}

export function anchorMarker(name: string): string {
  const trimmed = name.trim();
  if (!trimmed) {
    return '';
  }
  return `${ANCHOR_START}${trimmed}${ANCHOR_END}`;
}

export function hasMarkers(text: string): boolean {
  return (
    text.includes(STYLE_START) ||
    text.includes(STYLE_END) ||
    text.includes(LINK_START) ||
    text.includes(ANCHOR_START)
  );
}

function createCounts(): StyleCounts {
  return { bold: 0, italic: 0, underline: 0, code: 0, strike: 0, smallCaps: 0 };
}

function countKey(code: StyleCode): keyof StyleCounts {
  switch (code) {
    case 'b':
      return 'bold';
    case 'i':
      return 'italic';
    case 'u':
      return 'underline';
    case 'c':
      return 'code';
    case 'x':
      return 'strike';
    case 's':
      return 'smallCaps';
  }
}

function applyStyleCode(counts: StyleCounts, code: StyleCode, isStart: boolean): void {
  const key = countKey(code);
  counts[key] = isStart ? counts[key] + 1 : Math.max(0, counts[key] - 1);
}

function styleFromCounts(counts: StyleCounts): TextStyle {
  const style = defaultTextStyle();
  style.bold = counts.bold > 0;
  style.italic = counts.italic > 0;
  style.underline = counts.underline > 0;
  style.dim = counts.code > 0;
  style.reverse = counts.code > 0;
  style.strikethrough = counts.strike > 0;
  style.smallCaps = counts.smallCaps > 0;
  return style;
}

/**
 * Decode marker-annotated text into styled spans and anchor events, in document order.
 *
 * Malformed input is kept: a marker that is not completed before the end of the input is
 * emitted as literal text together with whatever followed it.
 */
export function decodeInline(text: string): InlinePiece[] {
  const pieces: InlinePiece[] = [];
  const counts = createCounts();
  let link: string | undefined;
  let current = '';

  const flush = (): void => {
    if (!current) {
      return;
    }
    const piece: InlinePiece = { kind: 'span', text: current, style: styleFromCounts(counts) };
    if (link !== undefined) {
      piece.link = link;
    }
    pieces.push(piece);
    current = '';
  };

  // Iterate by code point so surrogate pairs never split.
  const chars = Array.from(text);
  let index = 0;

  while (index < chars.length) {
    const ch = chars[index];
    index++;

    if (ch === STYLE_START || ch === STYLE_END) {
      if (index >= chars.length) {
        current += ch;
        break;
      }

      const code = chars[index];
      index++;
      if (isStyleCode(code)) {
        flush();
        applyStyleCode(counts, code, ch === STYLE_START);
        continue;
      }

      current += ch + code;
      continue;
    }

    if (ch === LINK_START || ch === ANCHOR_START) {
      const closer = ch === LINK_START ? LINK_END : ANCHOR_END;
      const end = chars.indexOf(closer, index);
      if (end < 0) {
        current += ch + chars.slice(index).join('');
        break;
      }

      const target = chars.slice(index, end).join('');
      index = end + 1;
      flush();

      // Link targets are kept as written; anchor names are trimmed
      if (ch === LINK_START) {
        link = target.trim() ? target : undefined;
      } else if (target.trim()) {
        pieces.push({ kind: 'anchor', name: target.trim() });
      }
      continue;
    }

    current += ch;
  }

  flush();
  return pieces;
}

/**
 * Remove every marker, keeping exactly the text that decoding would render.
 */
export function stripMarkers(text: string): string {
  if (!hasMarkers(text)) {
    return text;
  }

  let out = '';
  for (const piece of decodeInline(text)) {
    if (piece.kind === 'span') {
      out += piece.text;
    }
  }
  return out;
}
