import { createWriteStream, existsSync, mkdirSync, rmSync } from 'node:fs';
import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import archiver from 'archiver';
import { compactPageStyles } from './compact-page-styles.js';
import type {
  BundleMeta,
  Page,
  PaginationBundle,
  SerializedPage,
  TextStyle,
  TocEntry,
  WordToken,
} from '../types.js';

export const BUNDLE_VERSION = '1.0.0';

/**
 * File name of a page inside the bundle's `pages/` directory
 */
export function pageFileName(pageIndex: number): string {
  return `page-${String(pageIndex).padStart(5, '0')}.json`;
}

/**
 * Write the pagination bundle to a ZIP file
 */
export async function writeBundle(outputPath: string, bundle: PaginationBundle): Promise<void> {
  // Create a temporary directory for bundle contents
  const tempDir = outputPath.endsWith('.zip')
    ? outputPath.replace(/\.zip$/, '_temp')
    : `${outputPath}_temp`;

  try {
    // Clean up any existing temp directory
    if (existsSync(tempDir)) {
      rmSync(tempDir, { recursive: true });
    }
    mkdirSync(tempDir, { recursive: true });

    await writeBundleFiles(tempDir, bundle);

    // Create ZIP archive
    await createZipArchive(tempDir, outputPath);

    console.log(`Bundle written to: ${outputPath}`);
  } finally {
    // Clean up temp directory
    if (existsSync(tempDir)) {
      rmSync(tempDir, { recursive: true });
    }
  }
}

/**
 * Write bundle without zipping (readable by `loadBundle`)
 */
export async function writeBundleUncompressed(
  outputDir: string,
  bundle: PaginationBundle,
): Promise<void> {
  // Clean up any existing directory
  if (existsSync(outputDir)) {
    rmSync(outputDir, { recursive: true });
  }
  mkdirSync(outputDir, { recursive: true });

  await writeBundleFiles(outputDir, bundle);

  console.log(`Bundle written to: ${outputDir}`);
}

async function writeBundleFiles(dir: string, bundle: PaginationBundle): Promise<void> {
  await writeMetaJson(dir, bundle.meta);
  await writeTocJson(dir, bundle.toc);
  await writeAnchorsJson(dir, bundle.pagination.anchors);
  await writeWordsJsonl(dir, bundle.words);
  await writeStylesAndPages(dir, bundle.pagination.pages);
}

/**
 * Write meta.json file
 */
async function writeMetaJson(dir: string, meta: BundleMeta): Promise<void> {
  await writeFile(join(dir, 'meta.json'), JSON.stringify(meta));
}

/**
 * Write toc.json file
 */
async function writeTocJson(dir: string, toc: TocEntry[]): Promise<void> {
  await writeFile(join(dir, 'toc.json'), JSON.stringify(toc));
}

/**
 * Write anchors.json file (anchor name -> page index)
 */
async function writeAnchorsJson(dir: string, anchors: Map<string, number>): Promise<void> {
  await writeFile(join(dir, 'anchors.json'), JSON.stringify(Object.fromEntries(anchors)));
}

/**
 * Write words.jsonl file (one JSON object per line)
 */
async function writeWordsJsonl(dir: string, words: WordToken[]): Promise<void> {
  const lines = words.map((word) => JSON.stringify(word));
  await writeFile(join(dir, 'words.jsonl'), lines.join('\n'));
}

/**
 * Write styles.json file (shared text style table)
 */
async function writeStylesJson(dir: string, styles: TextStyle[]): Promise<void> {
  await writeFile(join(dir, 'styles.json'), JSON.stringify(styles));
}

/**
 * Write page JSON files (serialized with styleId references)
 */
async function writePages(dir: string, pages: SerializedPage[]): Promise<void> {
  const pagesDir = join(dir, 'pages');
  await mkdir(pagesDir, { recursive: true });

  for (const page of pages) {
    await writeFile(join(pagesDir, pageFileName(page.pageIndex)), JSON.stringify(page));
  }
}

/**
 * Write styles table and compact pages
 */
async function writeStylesAndPages(dir: string, pages: Page[]): Promise<void> {
  const compacted = compactPageStyles(pages);
  await writeStylesJson(dir, compacted.styles);
  await writePages(dir, compacted.pages);
}

/**
 * Create a ZIP archive from a directory using archiver
 */
async function createZipArchive(sourceDir: string, outputPath: string): Promise<void> {
  // Remove existing output file if present
  if (existsSync(outputPath)) {
    rmSync(outputPath);
  }

  return new Promise((resolve, reject) => {
    const output = createWriteStream(outputPath);
    const archive = archiver('zip', {
      zlib: { level: 9 }, // Maximum compression
    });

    output.on('close', () => {
      resolve();
    });
    output.on('error', reject);
    archive.on('error', reject);

    archive.pipe(output);

    // Add all files from the source directory
    archive.directory(sourceDir, false);

    archive.finalize().catch(reject);
  });
}
