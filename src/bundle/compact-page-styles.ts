import type { Page, SerializedLine, SerializedPage, SerializedSegment, TextStyle } from '../types.js';

export interface CompactPageStylesResult {
  pages: SerializedPage[];
  styles: TextStyle[];
}

/**
 * Deduplicate repeated text styles across all pages and replace per-segment style objects
 * with compact numeric style IDs.
 */
export function compactPageStyles(pages: Page[]): CompactPageStylesResult {
  const styles: TextStyle[] = [];
  const styleIdByKey = new Map<string, number>();

  const getStyleId = (style: TextStyle): number => {
    const key = JSON.stringify(style);
    const existing = styleIdByKey.get(key);
    if (existing !== undefined) {
      return existing;
    }

    const styleId = styles.length;
    styles.push(style);
    styleIdByKey.set(key, styleId);
    return styleId;
  };

  const compactedPages: SerializedPage[] = pages.map((page, pageIndex) => {
    const lines: SerializedLine[] = page.lines.map((line) => {
      const segments: SerializedSegment[] = line.segments.map((segment) => ({
        text: segment.text,
        styleId: getStyleId(segment.style),
        ...(segment.fg ? { fg: segment.fg } : {}),
        ...(segment.bg ? { bg: segment.bg } : {}),
        ...(segment.link !== undefined ? { link: segment.link } : {}),
      }));
      return line.image ? { segments, image: line.image } : { segments };
    });

    return { pageIndex, lines };
  });

  return {
    pages: compactedPages,
    styles,
  };
}

/**
 * Inverse of `compactPageStyles` for a single page
 */
export function expandPageStyles(page: SerializedPage, styles: TextStyle[]): Page {
  return {
    lines: page.lines.map((line) => {
      const segments = line.segments.map((segment) => {
        const style = styles[segment.styleId];
        if (!style) {
          throw new Error(`Page ${page.pageIndex} references missing style ${segment.styleId}`);
        }
        return {
          text: segment.text,
          style,
          ...(segment.fg ? { fg: segment.fg } : {}),
          ...(segment.bg ? { bg: segment.bg } : {}),
          ...(segment.link !== undefined ? { link: segment.link } : {}),
        };
      });
      return line.image ? { segments, image: line.image } : { segments };
    }),
  };
}
