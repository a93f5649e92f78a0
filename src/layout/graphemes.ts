import type { Segment, StyledLine, TextStyle } from '../types.js';

let segmenter: Intl.Segmenter | null = null;

function getSegmenter(): Intl.Segmenter {
  if (!segmenter) {
    segmenter = new Intl.Segmenter(undefined, { granularity: 'grapheme' });
  }
  return segmenter;
}

/**
 * Split text into extended grapheme clusters. Every cluster occupies one cell.
 */
export function graphemes(text: string): string[] {
  if (!text) {
    return [];
  }

  const out: string[] = [];
  for (const part of getSegmenter().segment(text)) {
    out.push(part.segment);
  }
  return out;
}

export function graphemeWidth(text: string): number {
  if (!text) {
    return 0;
  }

  let count = 0;
  for (const _part of getSegmenter().segment(text)) {
    count++;
  }
  return count;
}

export function isLineBreak(grapheme: string): boolean {
  return grapheme === '\n' || grapheme === '\r\n';
}

export function isWhitespace(grapheme: string): boolean {
  return /^\s+$/u.test(grapheme);
}

export function lineWidth(line: StyledLine): number {
  return line.segments.reduce((sum, segment) => sum + graphemeWidth(segment.text), 0);
}

export function lineText(line: StyledLine): string {
  return line.segments.map((segment) => segment.text).join('');
}

export function sameStyle(a: TextStyle, b: TextStyle): boolean {
  return (
    a.bold === b.bold &&
    a.italic === b.italic &&
    a.underline === b.underline &&
    a.dim === b.dim &&
    a.reverse === b.reverse &&
    a.strikethrough === b.strikethrough &&
    a.smallCaps === b.smallCaps
  );
}

/**
 * Whether `text` with `style`/`link` can be appended to `segment` without changing
 * how either renders.
 */
export function canExtendSegment(
  segment: Segment,
  style: TextStyle,
  link: string | undefined,
): boolean {
  return (
    segment.fg === undefined &&
    segment.bg === undefined &&
    segment.link === link &&
    sameStyle(segment.style, style)
  );
}

/**
 * Append one grapheme to a segment list, extending the last segment when compatible.
 */
export function pushGrapheme(
  segments: Segment[],
  grapheme: string,
  style: TextStyle,
  link: string | undefined,
): void {
  const last = segments[segments.length - 1];
  if (last && canExtendSegment(last, style, link)) {
    last.text += grapheme;
    return;
  }

  segments.push(makeSegment(grapheme, style, link));
}

export function makeSegment(text: string, style: TextStyle, link: string | undefined): Segment {
  const segment: Segment = { text, style: { ...style } };
  if (link !== undefined) {
    segment.link = link;
  }
  return segment;
}

/**
 * Merge adjacent uncolored segments that share style and link.
 */
export function compactSegments(segments: Segment[]): Segment[] {
  const out: Segment[] = [];
  for (const segment of segments) {
    if (!segment.text) {
      continue;
    }

    const last = out[out.length - 1];
    if (
      last &&
      segment.fg === undefined &&
      segment.bg === undefined &&
      canExtendSegment(last, segment.style, segment.link)
    ) {
      last.text += segment.text;
      continue;
    }

    out.push({ ...segment, style: { ...segment.style } });
  }
  return out;
}
