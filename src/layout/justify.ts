import type { Segment, StyledLine } from '../types.js';
import { lineWidth } from './graphemes.js';

const MIN_FILL_NUMERATOR = 7;
const MIN_FILL_DENOMINATOR = 10;
const MIN_GAPS = 3;

function isGapSegment(segment: Segment): boolean {
  return segment.text.length > 0 && /^ +$/.test(segment.text);
}

/**
 * Widen the inter-word gaps of a wrapped line so it fills `width` exactly.
 *
 * Lines that are already full, less than 70% full, or have fewer than three gaps come
 * back unchanged. Earlier gaps receive the remainder, one extra space each.
 */
export function justifyLine(line: StyledLine, width: number): StyledLine {
  const current = lineWidth(line);
  if (current >= width) {
    return line;
  }
  if (current * MIN_FILL_DENOMINATOR < width * MIN_FILL_NUMERATOR) {
    return line;
  }

  const gaps: number[] = [];
  line.segments.forEach((segment, index) => {
    if (isGapSegment(segment)) {
      gaps.push(index);
    }
  });
  if (gaps.length < MIN_GAPS) {
    return line;
  }

  const extra = width - current;
  const base = Math.floor(extra / gaps.length);
  let remainder = extra % gaps.length;

  const segments = line.segments.map((segment) => ({ ...segment }));
  for (const index of gaps) {
    let add = base;
    if (remainder > 0) {
      add++;
      remainder--;
    }
    if (add > 0) {
      segments[index].text += ' '.repeat(add);
    }
  }

  return { ...line, segments };
}
