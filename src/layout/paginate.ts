import {
  type Highlighter,
  getDefaultHighlighter,
  highlightOrPlain,
} from '../highlight/highlighter.js';
import type { Block, ImageBlock, Page, Pagination, Segment, Size, StyledLine } from '../types.js';
import { defaultTextStyle, plainLine } from '../types.js';
import { hasContent, isChapterSeparator } from './chapters.js';
import { compactSegments, graphemeWidth } from './graphemes.js';
import { hasImageData, imageFallbackText, imageRows } from './images.js';
import { type WrappedLines, wrapStyledText } from './inline.js';
import { justifyLine } from './justify.js';
import { renderTable } from './table.js';
import { clipSegments, prefixSegment, uppercaseAscii } from './text.js';

export interface PaginateOptions {
  justify?: boolean;
  highlighter?: Highlighter;
}

const QUOTE_RULE_MIN_WIDTH = 16;
const CODE_RULE_MIN_WIDTH = 12;
const INDENT_MIN_WIDTH = 4;
const LIST_BULLET = '• ';

/**
 * Accumulator threaded through a single pagination pass
 */
interface PaginationState {
  size: Size;
  pages: Page[];
  current: StyledLine[];
  chapterStarts: number[];
  anchors: Map<string, number>;
  pendingChapter: boolean;
}

function createState(size: Size): PaginationState {
  return {
    size,
    pages: [],
    current: [],
    chapterStarts: [0],
    anchors: new Map(),
    pendingChapter: false,
  };
}

function currentPageIndex(state: PaginationState): number {
  return state.pages.length;
}

function flushPage(state: PaginationState): void {
  state.pages.push({ lines: state.current });
  state.current = [];
}

/**
 * Record first-seen anchors, append the line, and close the page once it is full.
 */
function pushLine(state: PaginationState, line: StyledLine, anchors: readonly string[] = []): void {
  const pageIndex = currentPageIndex(state);
  for (const anchor of anchors) {
    if (!state.anchors.has(anchor)) {
      state.anchors.set(anchor, pageIndex);
    }
  }

  state.current.push(line);
  if (state.current.length >= state.size.height) {
    flushPage(state);
  }
}

function pushBlank(state: PaginationState): void {
  pushLine(state, plainLine(''));
}

/**
 * Start a pending chapter on a fresh page.
 */
function beginChapter(state: PaginationState): void {
  if (state.current.length > 0) {
    flushPage(state);
  }
  state.chapterStarts.push(currentPageIndex(state));
  state.pendingChapter = false;
}

function pushWrapped(
  state: PaginationState,
  wrapped: WrappedLines,
  transform: (line: StyledLine, isLast: boolean) => StyledLine = (line) => line,
): void {
  const last = wrapped.lines.length - 1;
  wrapped.lines.forEach((line, index) => {
    const out = transform(line, index === last);
    pushLine(state, { ...out, segments: compactSegments(out.segments) }, wrapped.anchors[index]);
  });
}

function justified(state: PaginationState, justify: boolean) {
  const width = state.size.width;
  return (line: StyledLine, isLast: boolean): StyledLine =>
    justify && !isLast ? justifyLine(line, width) : line;
}

/**
 * Prefix for quote and code lines: a rule when wide enough, an indent when there is room.
 */
function gutterPrefix(width: number, ruleMinWidth: number): string {
  if (width >= ruleMinWidth) {
    return '│ ';
  }
  if (width >= INDENT_MIN_WIDTH) {
    return '  ';
  }
  return '';
}

function layoutQuote(state: PaginationState, text: string): void {
  const width = state.size.width;
  const prefix = gutterPrefix(width, QUOTE_RULE_MIN_WIDTH);
  const wrapped = wrapStyledText(text, width - graphemeWidth(prefix));
  pushWrapped(state, wrapped, (line) =>
    prefix ? { ...line, segments: [prefixSegment(prefix), ...line.segments] } : line,
  );
}

function layoutCode(
  state: PaginationState,
  highlighter: Highlighter,
  lang: string | undefined,
  text: string,
): void {
  const width = state.size.width;
  const prefix = gutterPrefix(width, CODE_RULE_MIN_WIDTH);

  for (const line of highlightOrPlain(highlighter, lang, text)) {
    const segments: Segment[] = prefix ? [prefixSegment(prefix)] : [];
    for (const span of line.spans) {
      const segment: Segment = { text: span.text, style: defaultTextStyle() };
      if (span.fg) {
        segment.fg = { ...span.fg };
      }
      if (span.bg) {
        segment.bg = { ...span.bg };
      }
      segments.push(segment);
    }
    const clipped = clipSegments(segments, width);
    pushLine(state, { ...clipped, segments: compactSegments(clipped.segments) });
  }
}

function layoutImage(state: PaginationState, image: ImageBlock): void {
  const { width, height } = state.size;

  if (hasImageData(image)) {
    const rows = imageRows(image.width, image.height, width, height);
    const blank = ' '.repeat(width);
    for (let row = 0; row < rows; row++) {
      const line = plainLine(blank);
      if (row === 0) {
        line.image = { id: image.id, columns: width, rows };
      }
      pushLine(state, line);
    }

    const label = image.caption ?? image.alt;
    if (label?.trim()) {
      pushWrapped(state, wrapStyledText(label, width));
    }
    return;
  }

  pushWrapped(state, wrapStyledText(imageFallbackText(image), width));
  if (image.caption?.trim()) {
    pushWrapped(state, wrapStyledText(image.caption, width));
  }
}

function layoutBlock(
  state: PaginationState,
  block: Block,
  justify: boolean,
  highlighter: Highlighter,
): void {
  const width = state.size.width;

  switch (block.kind) {
    case 'paragraph':
      pushWrapped(state, wrapStyledText(block.text, width), justified(state, justify));
      break;

    case 'heading':
      pushWrapped(state, wrapStyledText(block.text, width), (line) => ({
        ...line,
        segments: uppercaseAscii(line.segments),
      }));
      break;

    case 'list':
      for (const item of block.items) {
        pushWrapped(state, wrapStyledText(`${LIST_BULLET}${item}`, width), justified(state, justify));
      }
      break;

    case 'quote':
      layoutQuote(state, block.text);
      break;

    case 'code':
      layoutCode(state, highlighter, block.lang, block.text);
      break;

    case 'table':
      for (const { line, anchors } of renderTable(block.rows, width)) {
        pushLine(state, line, anchors);
      }
      break;

    case 'image':
      layoutImage(state, block);
      break;
  }
}

function clampSize(size: Size): Size {
  return {
    width: Math.max(1, Math.floor(size.width) || 0),
    height: Math.max(1, Math.floor(size.height) || 0),
  };
}

/**
 * Lay out blocks into pages of at most `size.height` lines, each at most `size.width`
 * cells wide, recording chapter starts and the first page of every anchor.
 *
 * Pure and total: any input, including zero sizes and malformed markers, produces a
 * valid pagination.
 */
export function paginateWithOptions(
  blocks: readonly Block[],
  size: Size,
  options: PaginateOptions = {},
): Pagination {
  const state = createState(clampSize(size));
  const justify = options.justify ?? false;
  const highlighter = options.highlighter ?? getDefaultHighlighter();

  blocks.forEach((block, index) => {
    if (isChapterSeparator(blocks, index)) {
      state.pendingChapter = true;
    } else if (state.pendingChapter && hasContent(block)) {
      beginChapter(state);
    }

    layoutBlock(state, block, justify, highlighter);

    if (!isChapterSeparator(blocks, index + 1)) {
      pushBlank(state);
    }
  });

  if (state.current.length > 0) {
    flushPage(state);
  }

  return {
    pages: state.pages,
    chapterStarts: state.chapterStarts,
    anchors: state.anchors,
  };
}

export function paginateWithJustify(
  blocks: readonly Block[],
  size: Size,
  justify: boolean,
): Pagination {
  return paginateWithOptions(blocks, size, { justify });
}

export function paginate(blocks: readonly Block[], size: Size): Page[] {
  return paginateWithOptions(blocks, size).pages;
}
