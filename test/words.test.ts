import { describe, expect, it } from 'vitest';
import { wrapStyle } from '../src/layout/markers.js';
import { extractWords, isCommaPause, isSentenceEnd } from '../src/layout/words.js';
import type { Block } from '../src/types.js';

describe('word classification', () => {
  it('detects sentence ends behind closing quotes and brackets', () => {
    expect(isSentenceEnd('done.')).toBe(true);
    expect(isSentenceEnd('"really?"')).toBe(true);
    expect(isSentenceEnd('(aside.)')).toBe(true);
    expect(isSentenceEnd('middle')).toBe(false);
  });

  it('detects comma pauses', () => {
    expect(isCommaPause('first,')).toBe(true);
    expect(isCommaPause('well-')).toBe(true);
    expect(isCommaPause('word')).toBe(false);
  });
});

describe('extractWords', () => {
  const blocks: Block[] = [
    { kind: 'heading', text: 'Intro', level: 1 },
    { kind: 'paragraph', text: `Hello, ${wrapStyle('world', 'b')}. Bye!` },
    { kind: 'code', text: 'skip me' },
    { kind: 'paragraph', text: '[image]' },
    { kind: 'paragraph', text: '' },
    { kind: 'paragraph', text: '───' },
    { kind: 'paragraph', text: '' },
    { kind: 'table', rows: [[{ text: 'Cell one', isHeader: false }]] },
    { kind: 'image', id: 'i1', alt: 'Alt text', caption: 'Caption' },
  ];

  it('emits words in order without markers', () => {
    expect(extractWords(blocks).map((word) => word.text)).toEqual([
      'Intro',
      'Hello,',
      'world.',
      'Bye!',
      'Cell',
      'one',
      'Caption',
    ]);
  });

  it('counts chapters the way pagination does', () => {
    expect(extractWords(blocks).map((word) => word.chapterIndex)).toEqual([0, 0, 0, 0, 1, 1, 1]);
  });

  it('flags sentence ends and commas', () => {
    const [, hello, world] = extractWords(blocks);
    expect(hello).toEqual({ text: 'Hello,', isSentenceEnd: false, isComma: true, chapterIndex: 0 });
    expect(world).toEqual({ text: 'world.', isSentenceEnd: true, isComma: false, chapterIndex: 0 });
  });
});
