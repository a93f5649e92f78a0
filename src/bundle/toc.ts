import { hasContent, isChapterSeparator } from '../layout/chapters.js';
import { stripMarkers } from '../layout/markers.js';
import type { Block, Pagination, TocEntry } from '../types.js';

/**
 * Title of each chapter, in chapter order: its first heading, when it has one.
 * Chapters are counted the way the paginator counts them.
 */
function chapterHeadings(blocks: readonly Block[]): Array<string | undefined> {
  const headings: Array<string | undefined> = [undefined];
  let pendingChapter = false;

  blocks.forEach((block, index) => {
    if (isChapterSeparator(blocks, index)) {
      pendingChapter = true;
      return;
    }
    if (pendingChapter && hasContent(block)) {
      headings.push(undefined);
      pendingChapter = false;
    }

    const current = headings.length - 1;
    if (block.kind === 'heading' && headings[current] === undefined) {
      const title = stripMarkers(block.text).replace(/\s+/g, ' ').trim();
      if (title) {
        headings[current] = title;
      }
    }
  });

  return headings;
}

/**
 * Build ToC entries, one per chapter start
 */
export function buildToc(blocks: readonly Block[], pagination: Pagination): TocEntry[] {
  if (pagination.pages.length === 0) {
    return [];
  }

  const headings = chapterHeadings(blocks);
  return pagination.chapterStarts.map((pageIndex, index) => ({
    title: headings[index] ?? `Chapter ${index + 1}`,
    pageIndex,
  }));
}
