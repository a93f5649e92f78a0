import type { Highlighter } from '../highlight/highlighter.js';
import { paginateWithOptions } from '../layout/paginate.js';
import { extractWords } from '../layout/words.js';
import type { Block, BundleMeta, PaginationBundle, Size } from '../types.js';
import { buildToc } from './toc.js';
import { BUNDLE_VERSION } from './writer.js';

export interface BuildBundleOptions {
  bundleId: string;
  title: string;
  profile: string;
  size: Size;
  justify: boolean;
  highlighter?: Highlighter;
}

/**
 * Paginate blocks and collect everything a bundle stores
 */
export function buildPaginationBundle(
  blocks: readonly Block[],
  options: BuildBundleOptions,
): PaginationBundle {
  const pagination = paginateWithOptions(blocks, options.size, {
    justify: options.justify,
    ...(options.highlighter ? { highlighter: options.highlighter } : {}),
  });
  const words = extractWords(blocks);
  const toc = buildToc(blocks, pagination);

  const meta: BundleMeta = {
    bundleVersion: BUNDLE_VERSION,
    bundleId: options.bundleId,
    profile: options.profile,
    title: options.title,
    width: options.size.width,
    height: options.size.height,
    justify: options.justify,
    pages: pagination.pages.length,
    chapters: pagination.chapterStarts.length,
    anchors: pagination.anchors.size,
    words: words.length,
  };

  return { meta, pagination, toc, words };
}
