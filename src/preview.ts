/**
 * Preview renderer - prints pages of an uncompressed pagination bundle as text
 */

import { readFile, readdir } from 'node:fs/promises';
import { join } from 'node:path';
import { expandPageStyles } from './bundle/compact-page-styles.js';
import { graphemeWidth, lineText } from './layout/graphemes.js';
import type { BundleMeta, Page, SerializedPage, TextStyle, TocEntry, WordToken } from './types.js';

export interface BundleData {
  meta: BundleMeta;
  styles: TextStyle[];
  pages: Page[]; // Ordered by pageIndex
  toc: TocEntry[];
  anchors: Map<string, number>;
  words: WordToken[];
}

/**
 * Load an uncompressed bundle from disk
 */
export async function loadBundle(bundlePath: string): Promise<BundleData> {
  // Load metadata
  const metaJson = await readFile(join(bundlePath, 'meta.json'), 'utf-8');
  const meta: BundleMeta = JSON.parse(metaJson);

  const styles: TextStyle[] = JSON.parse(await readFile(join(bundlePath, 'styles.json'), 'utf-8'));
  const toc: TocEntry[] = JSON.parse(await readFile(join(bundlePath, 'toc.json'), 'utf-8'));
  const anchorsJson: Record<string, number> = JSON.parse(
    await readFile(join(bundlePath, 'anchors.json'), 'utf-8'),
  );

  // Load words
  const wordsJsonl = await readFile(join(bundlePath, 'words.jsonl'), 'utf-8');
  const words: WordToken[] = wordsJsonl
    .split('\n')
    .filter((line) => line.trim().length > 0)
    .map((line) => JSON.parse(line));

  // Load all pages
  const pagesDir = join(bundlePath, 'pages');
  const pageFiles = await readdir(pagesDir);
  const serialized: SerializedPage[] = [];

  for (const file of pageFiles) {
    if (file.endsWith('.json')) {
      const pageJson = await readFile(join(pagesDir, file), 'utf-8');
      const page: SerializedPage = JSON.parse(pageJson);
      serialized.push(page);
    }
  }

  // Sort by pageIndex
  serialized.sort((a, b) => a.pageIndex - b.pageIndex);

  return {
    meta,
    styles,
    pages: serialized.map((page) => expandPageStyles(page, styles)),
    toc,
    anchors: new Map(Object.entries(anchorsJson)),
    words,
  };
}

/**
 * Plain text of each line. The top row of a placed image names the image.
 */
export function renderPageText(page: Page): string[] {
  return page.lines.map((line) => {
    const text = lineText(line);
    if (!line.image) {
      return text.trimEnd();
    }
    const label = `[image ${line.image.id}]`;
    return label.length <= line.image.columns ? label : `[${line.image.id}]`;
  });
}

/**
 * Chapter title for a page: the last ToC entry starting at or before it
 */
export function chapterTitleAt(toc: TocEntry[], pageIndex: number): string | null {
  let title: string | null = null;
  for (const entry of toc) {
    if (entry.pageIndex <= pageIndex) {
      title = entry.title;
    }
  }
  return title;
}

/**
 * Frame one page at the bundle's page size, with a footer naming the page and chapter
 */
export function formatPreview(bundle: BundleData, pageIndex: number): string {
  const page = bundle.pages[pageIndex];
  if (!page) {
    throw new Error(`Page ${pageIndex} not found in bundle (${bundle.pages.length} pages)`);
  }

  const { width, height } = bundle.meta;
  const border = `+${'-'.repeat(width)}+`;
  const text = renderPageText(page);
  const rows: string[] = [border];

  for (let row = 0; row < height; row++) {
    const line = text[row] ?? '';
    rows.push(`|${line}${' '.repeat(Math.max(0, width - graphemeWidth(line)))}|`);
  }
  rows.push(border);

  const title = chapterTitleAt(bundle.toc, pageIndex);
  const footer = `Page ${pageIndex + 1}/${bundle.pages.length}`;
  rows.push(title ? `${footer} - ${title}` : footer);

  return rows.join('\n');
}
