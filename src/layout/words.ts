import type { Block, WordToken } from '../types.js';
import { CHAPTER_SEPARATOR, hasContent, isChapterSeparator } from './chapters.js';
import { stripMarkers } from './markers.js';

const IMAGE_PLACEHOLDER = '[image]';
const TRAILING_CLOSERS = /[)\]"']+$/;

export function isSentenceEnd(word: string): boolean {
  return /[.!?:;]$/.test(word.replace(TRAILING_CLOSERS, ''));
}

export function isCommaPause(word: string): boolean {
  return /[,\-)]$/.test(word.replace(TRAILING_CLOSERS, ''));
}

function toWordToken(text: string, chapterIndex: number): WordToken {
  return {
    text,
    isSentenceEnd: isSentenceEnd(text),
    isComma: isCommaPause(text),
    chapterIndex,
  };
}

function splitWords(text: string): string[] {
  return stripMarkers(text)
    .split(/\s+/)
    .filter((word) => word.length > 0);
}

function blockTexts(block: Block): string[] {
  switch (block.kind) {
    case 'code':
      return [];
    case 'paragraph': {
      const plain = stripMarkers(block.text).trim();
      return plain === IMAGE_PLACEHOLDER || plain === CHAPTER_SEPARATOR ? [] : [block.text];
    }
    case 'heading':
    case 'quote':
      return [block.text];
    case 'list':
      return block.items;
    case 'table':
      return block.rows.flatMap((row) => row.map((cell) => cell.text));
    case 'image': {
      const label = block.caption ?? block.alt;
      return label ? [label] : [];
    }
  }
}

/**
 * Flatten blocks into words for word-at-a-time playback.
 *
 * Chapters are counted the same way pagination counts them, so `chapterIndex` indexes
 * `Pagination.chapterStarts`.
 */
export function extractWords(blocks: readonly Block[]): WordToken[] {
  const words: WordToken[] = [];
  let chapterIndex = 0;
  let pendingChapter = false;

  blocks.forEach((block, index) => {
    if (isChapterSeparator(blocks, index)) {
      pendingChapter = true;
      return;
    }
    if (pendingChapter && hasContent(block)) {
      chapterIndex++;
      pendingChapter = false;
    }

    for (const text of blockTexts(block)) {
      for (const word of splitWords(text)) {
        words.push(toWordToken(word, chapterIndex));
      }
    }
  });

  return words;
}
