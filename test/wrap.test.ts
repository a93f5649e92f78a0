import { describe, expect, it } from 'vitest';
import { lineText, lineWidth } from '../src/layout/graphemes.js';
import { wrapStyledText } from '../src/layout/inline.js';
import { justifyLine } from '../src/layout/justify.js';
import { anchorMarker, linkClose, linkOpen, wrapStyle } from '../src/layout/markers.js';

function wrappedText(text: string, width: number): string[] {
  return wrapStyledText(text, width).lines.map(lineText);
}

describe('wrapStyledText', () => {
  it('fills lines greedily', () => {
    expect(wrappedText('The quick brown fox jumps.', 10)).toEqual(['The quick', 'brown fox', 'jumps.']);
  });

  it('force-splits words wider than the line', () => {
    expect(wrappedText('abcdefgh', 3)).toEqual(['abc', 'def', 'gh']);
  });

  it('treats a zero width as one cell', () => {
    expect(wrappedText('abc', 0)).toEqual(['a', 'b', 'c']);
  });

  it('collapses whitespace runs and honours explicit line breaks', () => {
    expect(wrappedText('a   b\nc', 20)).toEqual(['a b', 'c']);
  });

  it('returns one empty line for empty text', () => {
    const wrapped = wrapStyledText('', 10);
    expect(wrapped.lines).toEqual([{ segments: [] }]);
    expect(wrapped.anchors).toEqual([[]]);
  });

  it('measures grapheme clusters, not code units', () => {
    expect(wrappedText('e\u0301e\u0301e\u0301 ab', 4)).toEqual(['e\u0301e\u0301e\u0301', 'ab']);
  });

  it('reports anchors on the line where they occur', () => {
    const wrapped = wrapStyledText(`${anchorMarker('start')}Hello world`, 5);
    expect(wrapped.lines.map(lineText)).toEqual(['Hello', 'world']);
    expect(wrapped.anchors).toEqual([['start'], []]);
  });

  it('keeps per-word styling', () => {
    const [line] = wrapStyledText(`${wrapStyle('bold', 'b')} text`, 20).lines;
    expect(line.segments.map((segment) => [segment.text, segment.style.bold])).toEqual([
      ['bold', true],
      [' ', false],
      ['text', false],
    ]);
  });
});

describe('wrapStyledText links and styles', () => {
  const text = `${linkOpen('x')}${wrapStyle('abcdef', 'b')} ${wrapStyle('gh', 'b')}${linkClose()}`;

  function segmentsOf(width: number): [string, string | undefined, boolean][][] {
    return wrapStyledText(text, width).lines.map((line) =>
      line.segments.map((segment) => [segment.text, segment.link, segment.style.bold]),
    );
  }

  it('keeps link and style on every chunk of a split word', () => {
    expect(segmentsOf(3)).toEqual([[['abc', 'x', true]], [['def', 'x', true]], [['gh', 'x', true]]]);
  });

  it('gives the space between words the link and style around it', () => {
    expect(segmentsOf(9)).toEqual([
      [
        ['abcdef', 'x', true],
        [' ', 'x', false],
        ['gh', 'x', true],
      ],
    ]);
  });
});

describe('justifyLine', () => {
  const [line] = wrapStyledText('aa bb cc dd', 11).lines;

  it('widens the earliest gaps first', () => {
    const justified = justifyLine(line, 13);
    expect(lineText(justified)).toBe('aa  bb  cc dd');
    expect(lineWidth(justified)).toBe(13);
  });

  it('leaves lines under 70% full unchanged', () => {
    expect(justifyLine(line, 20)).toBe(line);
  });

  it('leaves full lines unchanged', () => {
    expect(justifyLine(line, 11)).toBe(line);
  });

  it('needs at least three gaps', () => {
    const [twoGaps] = wrapStyledText('aaaa bbbb cccc', 14).lines;
    expect(justifyLine(twoGaps, 15)).toBe(twoGaps);
  });
});
