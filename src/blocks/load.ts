import { readFileSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { basename, dirname, extname, resolve } from 'node:path';
import { joinChapters } from '../layout/chapters.js';
import type { Block } from '../types.js';
import { parseBlockDocumentJson } from './schema.js';
import { type NormalizeXhtmlOptions, normalizeXhtml } from './xhtml.js';

export interface LoadedChapter {
  path: string;
  title?: string;
  blocks: Block[];
}

export interface LoadedInputs {
  title?: string;
  chapters: LoadedChapter[];
  blocks: Block[];
}

const XHTML_EXTENSIONS = new Set(['.xhtml', '.html', '.htm']);

/**
 * Options that resolve links and images of an XHTML chapter relative to its file.
 * Anchors are named `<file name>#<id>` so ids stay unique across chapters.
 */
export function chapterNormalizeOptions(path: string): NormalizeXhtmlOptions {
  const chapterName = basename(path);
  const baseDir = dirname(path);

  return {
    anchorPrefix: chapterName,
    resolveLink: (href) => {
      const hashIndex = href.indexOf('#');
      if (hashIndex < 0) {
        return null;
      }
      const fragment = href.slice(hashIndex + 1).trim();
      if (!fragment) {
        return null;
      }
      const target = href.slice(0, hashIndex);
      return `${target ? basename(target) : chapterName}#${fragment}`;
    },
    resolveImage: (src) => {
      if (/^[a-z][a-z0-9+.-]*:/i.test(src)) {
        return null;
      }
      try {
        const imagePath = resolve(baseDir, decodeURIComponent(src));
        return { id: src, data: readFileSync(imagePath) };
      } catch {
        // Malformed escapes, missing files and directories keep the text fallback
        return null;
      }
    },
  };
}

export async function loadChapter(path: string): Promise<LoadedChapter> {
  const ext = extname(path).toLowerCase();
  const content = await readFile(path, 'utf-8');

  if (ext === '.json') {
    const document = parseBlockDocumentJson(content, path);
    return document.title === undefined
      ? { path, blocks: document.blocks }
      : { path, title: document.title, blocks: document.blocks };
  }

  if (XHTML_EXTENSIONS.has(ext)) {
    return { path, blocks: normalizeXhtml(content, chapterNormalizeOptions(path)) };
  }

  throw new Error(`Unsupported input: ${path} (expected .json, .xhtml, .html or .htm)`);
}

/**
 * Load every input in order, one chapter each, and join them into one block list
 */
export async function loadInputs(paths: string[]): Promise<LoadedInputs> {
  if (paths.length === 0) {
    throw new Error('No input files given');
  }

  const chapters: LoadedChapter[] = [];
  for (const path of paths) {
    chapters.push(await loadChapter(path));
  }

  const blocks = joinChapters(chapters.map((chapter) => chapter.blocks));
  const title = chapters.find((chapter) => chapter.title !== undefined)?.title;
  return title === undefined ? { chapters, blocks } : { title, chapters, blocks };
}
