export {
  ANCHOR_END,
  ANCHOR_START,
  LINK_END,
  LINK_START,
  STYLE_END,
  STYLE_START,
  anchorMarker,
  decodeInline,
  hasMarkers,
  linkClose,
  linkOpen,
  stripMarkers,
  styleClose,
  styleOpen,
  wrapStyle,
  type InlinePiece,
  type StyleCode,
} from './markers.js';
export {
  splitWord,
  tokenizeInline,
  tokenizePieces,
  wrapStyledText,
  wrapTokens,
  type InlineToken,
  type InlineWord,
  type WrappedLines,
} from './inline.js';
export { compactSegments, graphemeWidth, graphemes, lineText, lineWidth } from './graphemes.js';
export { justifyLine } from './justify.js';
export { computeColumnWidths, renderTable, tableSeparator, type TableLine } from './table.js';
export { CHAPTER_SEPARATOR, isChapterSeparator, joinChapters } from './chapters.js';
export { imageFallbackText, imageRows } from './images.js';
export {
  paginate,
  paginateWithJustify,
  paginateWithOptions,
  type PaginateOptions,
} from './paginate.js';
export { extractWords, isCommaPause, isSentenceEnd } from './words.js';
export {
  getDefaultHighlighter,
  plainTextHighlighter,
  type HighlightLine,
  type HighlightSpan,
  type Highlighter,
} from '../highlight/highlighter.js';
export type * from '../types.js';
export { defaultTextStyle, plainLine } from '../types.js';
