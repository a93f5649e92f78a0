import { describe, expect, it, vi } from 'vitest';
import {
  getDefaultHighlighter,
  highlightOrPlain,
  plainTextHighlighter,
  splitCodeLines,
} from '../src/highlight/highlighter.js';

describe('plain text highlighter', () => {
  it('drops one trailing empty line', () => {
    expect(splitCodeLines('a\nb\n')).toEqual(['a', 'b']);
    expect(splitCodeLines('a\r\n\n')).toEqual(['a', '']);
  });

  it('returns one empty line for empty code', () => {
    expect(plainTextHighlighter.highlight(undefined, '')).toEqual([{ spans: [] }]);
  });

  it('is shared and immutable', () => {
    expect(getDefaultHighlighter()).toBe(getDefaultHighlighter());
    expect(Object.isFrozen(getDefaultHighlighter())).toBe(true);
  });
});

describe('highlightOrPlain', () => {
  it('falls back when a highlighter returns no lines', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    expect(highlightOrPlain({ highlight: () => [] }, 'js', 'x')).toEqual([{ spans: [{ text: 'x' }] }]);
    expect(warn).toHaveBeenCalledWith('  Warning: Highlighter returned no lines for js code block');

    warn.mockRestore();
  });
});
