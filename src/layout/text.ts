import type { Segment, StyledLine } from '../types.js';
import { defaultTextStyle } from '../types.js';
import { graphemes } from './graphemes.js';

const ELLIPSIS = '…';

/**
 * Clip a line to `width` cells. Longer lines keep `width - 1` graphemes and end in an
 * ellipsis carrying the style of the last kept grapheme.
 */
export function clipSegments(segments: Segment[], width: number): StyledLine {
  const limit = Math.max(1, width);
  let total = 0;
  for (const segment of segments) {
    total += graphemes(segment.text).length;
  }
  if (total <= limit) {
    return { segments: segments.filter((segment) => segment.text.length > 0) };
  }

  const keep = limit - 1;
  const out: Segment[] = [];
  let used = 0;
  let lastKept: Segment | undefined = segments[0];

  for (const segment of segments) {
    if (used >= keep) {
      break;
    }
    let text = '';
    for (const g of graphemes(segment.text)) {
      if (used >= keep) {
        break;
      }
      text += g;
      used++;
    }
    if (text) {
      out.push({ ...segment, text });
      lastKept = segment;
    }
  }

  out.push({ ...(lastKept ?? { style: defaultTextStyle() }), text: ELLIPSIS });
  return { segments: out };
}

/**
 * Upper-case ASCII letters, leaving every other character as it is.
 */
export function uppercaseAscii(segments: Segment[]): Segment[] {
  return segments.map((segment) => ({
    ...segment,
    text: segment.text.replace(/[a-z]+/g, (run) => run.toUpperCase()),
  }));
}

export function prefixSegment(text: string): Segment {
  return { text, style: defaultTextStyle() };
}
