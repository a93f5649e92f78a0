import type { Segment, StyledLine, TextStyle } from '../types.js';
import {
  graphemes,
  isLineBreak,
  isWhitespace,
  makeSegment,
  pushGrapheme,
} from './graphemes.js';
import { type InlinePiece, decodeInline } from './markers.js';

export interface InlineWord {
  segments: Segment[];
  width: number;
}

export type InlineToken =
  | { kind: 'word'; word: InlineWord }
  | { kind: 'space'; style: TextStyle; link?: string }
  | { kind: 'newline' }
  | { kind: 'anchor'; name: string };

/**
 * Wrapped lines plus, per line, the anchor names reached on it
 */
export interface WrappedLines {
  lines: StyledLine[];
  anchors: string[][];
}

/**
 * Turn decoded pieces into wrap tokens, grapheme by grapheme.
 *
 * Whitespace runs collapse into a single space token carrying the style and link of the
 * first whitespace grapheme; explicit line breaks never collapse.
 */
export function tokenizePieces(pieces: InlinePiece[]): InlineToken[] {
  const tokens: InlineToken[] = [];
  let segments: Segment[] = [];
  let width = 0;

  const flushWord = (): void => {
    if (segments.length === 0) {
      return;
    }
    tokens.push({ kind: 'word', word: { segments, width } });
    segments = [];
    width = 0;
  };

  for (const piece of pieces) {
    if (piece.kind === 'anchor') {
      flushWord();
      tokens.push({ kind: 'anchor', name: piece.name });
      continue;
    }

    for (const g of graphemes(piece.text)) {
      if (isLineBreak(g)) {
        flushWord();
        tokens.push({ kind: 'newline' });
        continue;
      }

      if (isWhitespace(g)) {
        flushWord();
        const last = tokens[tokens.length - 1];
        if (!last || (last.kind !== 'space' && last.kind !== 'newline')) {
          const space: InlineToken = { kind: 'space', style: { ...piece.style } };
          if (piece.link !== undefined) {
            space.link = piece.link;
          }
          tokens.push(space);
        }
        continue;
      }

      pushGrapheme(segments, g, piece.style, piece.link);
      width++;
    }
  }

  flushWord();
  return tokens;
}

export function tokenizeInline(text: string): InlineToken[] {
  return tokenizePieces(decodeInline(text));
}

/**
 * Force-split a word into chunks of exactly `width` graphemes (the last may be shorter),
 * keeping style and link per grapheme.
 */
export function splitWord(word: InlineWord, width: number): InlineWord[] {
  const parts: InlineWord[] = [];
  let current: Segment[] = [];
  let used = 0;

  for (const segment of word.segments) {
    for (const g of graphemes(segment.text)) {
      pushGrapheme(current, g, segment.style, segment.link);
      used++;
      if (used === width) {
        parts.push({ segments: current, width: used });
        current = [];
        used = 0;
      }
    }
  }

  if (current.length > 0) {
    parts.push({ segments: current, width: used });
  }

  if (parts.length === 0) {
    parts.push({ segments: [], width: 0 });
  }

  return parts;
}

/**
 * Greedy fill of tokens into lines no wider than `width`.
 */
export function wrapTokens(tokens: InlineToken[], width: number): WrappedLines {
  const lines: StyledLine[] = [];
  const anchors: string[][] = [];
  let current: Segment[] = [];
  let currentAnchors: string[] = [];
  let currentWidth = 0;
  let pendingSpace: { style: TextStyle; link?: string } | null = null;

  const pushLine = (segments: Segment[], lineAnchors: string[]): void => {
    lines.push({ segments });
    anchors.push(lineAnchors);
  };

  const flushCurrent = (): void => {
    pushLine(current, currentAnchors);
    current = [];
    currentAnchors = [];
    currentWidth = 0;
  };

  for (const token of tokens) {
    switch (token.kind) {
      case 'space':
        pendingSpace = { style: token.style, link: token.link };
        break;

      case 'anchor':
        currentAnchors.push(token.name);
        break;

      case 'newline':
        pendingSpace = null;
        flushCurrent();
        break;

      case 'word': {
        const word = token.word;
        const spaceWidth = pendingSpace && current.length > 0 ? 1 : 0;

        if (currentWidth + spaceWidth + word.width <= width) {
          if (pendingSpace && current.length > 0) {
            current.push(makeSegment(' ', pendingSpace.style, pendingSpace.link));
            currentWidth += 1;
          }
          current.push(...word.segments);
          currentWidth += word.width;
        } else {
          if (current.length > 0) {
            flushCurrent();
          }

          if (word.width > width) {
            const parts = splitWord(word, width);
            const last = parts.length - 1;
            parts.forEach((part, index) => {
              if (index === last) {
                current = part.segments;
                currentWidth = part.width;
                return;
              }
              pushLine(part.segments, currentAnchors);
              currentAnchors = [];
            });
          } else {
            current = word.segments;
            currentWidth = word.width;
          }
        }

        pendingSpace = null;
        break;
      }
    }
  }

  if (current.length > 0 || lines.length === 0 || currentAnchors.length > 0) {
    flushCurrent();
  }

  return { lines, anchors };
}

/**
 * Decode, tokenize and wrap marker-annotated text. Widths below 1 are treated as 1.
 */
export function wrapStyledText(text: string, width: number): WrappedLines {
  const safeWidth = Math.max(1, Math.floor(width) || 0);
  return wrapTokens(tokenizeInline(text), safeWidth);
}
