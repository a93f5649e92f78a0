/**
 * Core TypeScript interfaces for the termpage layout engine
 */

/**
 * A single cell of a table block
 */
export interface TableCell {
  text: string;
  isHeader: boolean;
}

/**
 * Image block payload. `data` holds already-decoded bytes from the image resolver;
 * only `width`/`height` (pixels) are used for sizing.
 */
export interface ImageBlock {
  kind: 'image';
  id: string;
  data?: Uint8Array;
  alt?: string;
  caption?: string;
  width?: number;
  height?: number;
}

/**
 * One semantic unit of document content. Text fields may embed inline markers.
 */
export type Block =
  | { kind: 'paragraph'; text: string }
  | { kind: 'heading'; text: string; level: number }
  | { kind: 'list'; items: string[] }
  | { kind: 'quote'; text: string }
  | { kind: 'code'; lang?: string; text: string }
  | { kind: 'table'; rows: TableCell[][] }
  | ImageBlock;

export type BlockKind = Block['kind'];

/**
 * Style flags for a run of text
 */
export interface TextStyle {
  bold: boolean;
  italic: boolean;
  underline: boolean;
  dim: boolean;
  reverse: boolean;
  strikethrough: boolean;
  smallCaps: boolean;
}

export interface RgbColor {
  r: number;
  g: number;
  b: number;
}

/**
 * A run of grapheme clusters sharing style, colors and link target
 */
export interface Segment {
  text: string;
  fg?: RgbColor;
  bg?: RgbColor;
  style: TextStyle;
  link?: string;
}

/**
 * Where a raster image is painted, relative to the line that anchors its top row
 */
export interface ImagePlacement {
  id: string;
  columns: number;
  rows: number;
}

export interface StyledLine {
  segments: Segment[];
  image?: ImagePlacement;
}

export interface Page {
  lines: StyledLine[];
}

/**
 * Target page size in character cells
 */
export interface Size {
  width: number;
  height: number;
}

/**
 * Result of a pagination pass
 */
export interface Pagination {
  pages: Page[];
  chapterStarts: number[]; // page indices where a chapter begins, strictly increasing
  anchors: Map<string, number>; // anchor name -> page index of first occurrence
}

/**
 * Word emitted for word-at-a-time playback
 */
export interface WordToken {
  text: string;
  isSentenceEnd: boolean;
  isComma: boolean;
  chapterIndex: number;
}

/**
 * Named viewport configuration
 */
export interface ViewportProfile {
  name: string;
  columns: number;
  rows: number;
  margins: {
    top: number;
    right: number;
    bottom: number;
    left: number;
  };
  justify: boolean;
}

/**
 * Bundle metadata
 */
export interface BundleMeta {
  bundleVersion: string;
  bundleId: string;
  profile: string;
  title: string;
  width: number;
  height: number;
  justify: boolean;
  pages: number;
  chapters: number;
  anchors: number;
  words: number;
}

/**
 * Table of contents entry (for chapter navigation)
 */
export interface TocEntry {
  title: string;
  pageIndex: number; // Global page index where this chapter starts
}

/**
 * Segment as stored in a bundle page file (style replaced by a style table index)
 */
export interface SerializedSegment {
  text: string;
  styleId: number;
  fg?: RgbColor;
  bg?: RgbColor;
  link?: string;
}

export interface SerializedLine {
  segments: SerializedSegment[];
  image?: ImagePlacement;
}

export interface SerializedPage {
  pageIndex: number;
  lines: SerializedLine[];
}

/**
 * Everything the bundle writer needs
 */
export interface PaginationBundle {
  meta: BundleMeta;
  pagination: Pagination;
  toc: TocEntry[];
  words: WordToken[];
}

/**
 * Result of validating pagination output
 */
export interface ValidationResult {
  valid: boolean;
  errors: string[]; // Fatal issues
  warnings: string[]; // Non-fatal issues
}

export function defaultTextStyle(): TextStyle {
  return {
    bold: false,
    italic: false,
    underline: false,
    dim: false,
    reverse: false,
    strikethrough: false,
    smallCaps: false,
  };
}

export function plainLine(text: string): StyledLine {
  return {
    segments: [{ text, style: defaultTextStyle() }],
  };
}
