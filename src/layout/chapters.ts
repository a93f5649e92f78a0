import type { Block } from '../types.js';
import { decodeInline, stripMarkers } from './markers.js';

export const CHAPTER_SEPARATOR = '───';

function paragraphText(block: Block | undefined): string | null {
  if (!block || block.kind !== 'paragraph') {
    return null;
  }
  return stripMarkers(block.text).trim();
}

/**
 * Whether the paragraph at `index` is a chapter separator: the text "───" with an empty
 * paragraph on each side.
 */
export function isChapterSeparator(blocks: readonly Block[], index: number): boolean {
  if (paragraphText(blocks[index]) !== CHAPTER_SEPARATOR) {
    return false;
  }
  if (index === 0) {
    return false;
  }
  return paragraphText(blocks[index - 1]) === '' && paragraphText(blocks[index + 1]) === '';
}

/**
 * An empty paragraph carries no content; anything else, including a paragraph holding only
 * anchors, starts a chapter when one is pending.
 */
export function hasContent(block: Block): boolean {
  if (block.kind !== 'paragraph') {
    return true;
  }
  if (stripMarkers(block.text).trim() !== '') {
    return true;
  }
  return decodeInline(block.text).some((piece) => piece.kind === 'anchor');
}

/**
 * Concatenate per-chapter block lists with a separator between consecutive chapters.
 */
export function joinChapters(chapters: readonly Block[][]): Block[] {
  const blocks: Block[] = [];
  chapters.forEach((chapter, index) => {
    if (index > 0) {
      blocks.push(
        { kind: 'paragraph', text: '' },
        { kind: 'paragraph', text: CHAPTER_SEPARATOR },
        { kind: 'paragraph', text: '' },
      );
    }
    blocks.push(...chapter);
  });
  return blocks;
}
