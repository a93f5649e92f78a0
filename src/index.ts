#!/usr/bin/env node

import { createHash } from 'node:crypto';
import { realpathSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { basename, extname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { Command, InvalidArgumentError } from 'commander';
import { loadInputs } from './blocks/load.js';
import { buildPaginationBundle } from './bundle/build.js';
import { writeBundle, writeBundleUncompressed } from './bundle/writer.js';
import { lineText } from './layout/graphemes.js';
import { formatPreview, loadBundle } from './preview.js';
import type { Size, ViewportProfile } from './types.js';
import { logValidationResult, validatePagination } from './validation.js';
import { getContentArea, getProfile, profiles } from './viewport-profiles/profiles.js';

interface PaginateCommandOptions {
  input: string[];
  output?: string;
  profile?: string;
  width?: number;
  height?: number;
  justify?: boolean;
  zip: boolean;
  title?: string;
}

interface PreviewCommandOptions {
  bundle: string;
  page: number;
}

interface InspectCommandOptions {
  bundle: string;
}

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

const program = new Command();

program
  .name('termpage')
  .description('Paginate documents into pages of styled character-cell lines')
  .version('0.1.0');

program
  .command('paginate')
  .description('Paginate block documents or XHTML chapters into a bundle')
  .requiredOption('-i, --input <paths...>', 'Input files (.json block documents, .xhtml/.html chapters)')
  .option('-o, --output <path>', 'Output bundle path (default: <first input>.pages.zip)')
  .option('-p, --profile <name>', `Viewport profile (${Object.keys(profiles).join(', ')})`)
  .option('-w, --width <cols>', 'Override the content width in cells', parsePositiveInt)
  .option('--height <rows>', 'Override the content height in lines', parsePositiveInt)
  .option('--justify', 'Justify paragraphs and list items')
  .option('--no-justify', 'Never justify')
  .option('--no-zip', 'Output uncompressed bundle directory instead of ZIP')
  .option('--title <title>', 'Bundle title (default: document title or first input name)')
  .action(async (options: PaginateCommandOptions) => {
    try {
      const profile = getProfile(options.profile);
      await paginateFiles(options, profile);
    } catch (err) {
      console.error('Pagination failed:', err);
      process.exit(1);
    }
  });

program
  .command('preview')
  .description('Print one page of an uncompressed bundle')
  .requiredOption('-b, --bundle <path>', 'Input bundle directory path')
  .option('-n, --page <number>', 'Page number, starting at 1', parsePositiveInt, 1)
  .action(async (options: PreviewCommandOptions) => {
    try {
      const bundle = await loadBundle(resolve(options.bundle));
      console.log(formatPreview(bundle, options.page - 1));
    } catch (err) {
      console.error('Preview failed:', err);
      process.exit(1);
    }
  });

program
  .command('inspect')
  .description('Inspect an uncompressed bundle and print page stats')
  .requiredOption('-b, --bundle <path>', 'Input bundle directory path')
  .action(async (options: InspectCommandOptions) => {
    try {
      await inspectBundle(resolve(options.bundle));
    } catch (err) {
      console.error('Inspection failed:', err);
      process.exit(1);
    }
  });

export function isCliEntrypoint(
  argv: string[] = process.argv,
  moduleUrl: string = import.meta.url,
): boolean {
  const entrypointArg = argv[1];
  if (!entrypointArg) {
    return false;
  }

  // npm bin wrappers are symlinks to the real module
  const toRealPath = (path: string): string => {
    try {
      return realpathSync(path);
    } catch {
      return resolve(path);
    }
  };

  return toRealPath(entrypointArg) === toRealPath(fileURLToPath(moduleUrl));
}

/**
 * Content size for a run: the profile's content area, with per-run overrides
 */
export function resolveSize(profile: ViewportProfile, width?: number, height?: number): Size {
  const area = getContentArea(profile);
  return {
    width: width ?? area.width,
    height: height ?? area.height,
  };
}

export function defaultOutputPath(firstInput: string, createZip: boolean): string {
  const stem = firstInput.slice(0, firstInput.length - extname(firstInput).length);
  return createZip ? `${stem}.pages.zip` : `${stem}.pages`;
}

async function computeBundleId(paths: string[], settings: string): Promise<string> {
  const hash = createHash('sha256');
  for (const path of paths) {
    hash.update(await readFile(path));
  }
  hash.update(settings);
  return hash.digest('hex').slice(0, 16);
}

async function paginateFiles(options: PaginateCommandOptions, profile: ViewportProfile): Promise<void> {
  const inputs = options.input.map((path) => resolve(path));
  const firstInput = inputs[0];
  if (!firstInput) {
    throw new Error('No input files given');
  }
  const resolvedOutput = options.output
    ? resolve(options.output)
    : defaultOutputPath(firstInput, options.zip);
  const size = resolveSize(profile, options.width, options.height);
  const justify = options.justify ?? profile.justify;

  console.log('termpage v0.1.0');
  console.log('===============');
  console.log(`Inputs: ${inputs.length}`);
  console.log(`Output: ${resolvedOutput}`);
  console.log(`Profile: ${profile.name}`);
  console.log(`Page size: ${size.width}x${size.height}`);
  console.log(`Justify: ${justify ? 'yes' : 'no'}`);
  console.log('');

  // Step 1: Load inputs
  console.log('Step 1: Loading inputs...');
  const loaded = await loadInputs(inputs);
  for (const chapter of loaded.chapters) {
    console.log(`  ${basename(chapter.path)}: ${chapter.blocks.length} blocks`);
  }
  const title = options.title ?? loaded.title ?? basename(firstInput, extname(firstInput));
  console.log(`  Title: ${title}`);

  // Step 2: Paginate
  console.log('Step 2: Paginating...');
  const bundleId = await computeBundleId(inputs, `${size.width}x${size.height}|${justify}`);
  const bundle = buildPaginationBundle(loaded.blocks, {
    bundleId,
    title,
    profile: profile.name,
    size,
    justify,
  });
  console.log(`  Total pages: ${bundle.meta.pages}`);
  console.log(`  Chapters: ${bundle.meta.chapters}`);
  console.log(`  Anchors: ${bundle.meta.anchors}`);
  console.log(`  Words: ${bundle.meta.words}`);

  // Step 3: Validate
  console.log('Step 3: Validating...');
  const validation = validatePagination(bundle.pagination, size);
  logValidationResult(validation);
  if (!validation.valid) {
    throw new Error(`Validation failed with ${validation.errors.length} error(s)`);
  }

  // Step 4: Write bundle
  console.log('Step 4: Writing bundle...');
  if (options.zip) {
    await writeBundle(resolvedOutput, bundle);
  } else {
    await writeBundleUncompressed(resolvedOutput, bundle);
  }

  console.log('');
  console.log('Pagination complete!');
}

async function inspectBundle(bundlePath: string): Promise<void> {
  const { meta, pages, toc, anchors, words } = await loadBundle(bundlePath);

  const imagePlacements = pages.reduce(
    (count, page) => count + page.lines.filter((line) => line.image).length,
    0,
  );
  const blankPages = pages.filter((page) =>
    page.lines.every((line) => !line.image && lineText(line).trim() === ''),
  );
  const sentenceEnds = words.filter((word) => word.isSentenceEnd).length;
  const linkedSegments = pages.reduce(
    (count, page) =>
      count +
      page.lines.reduce(
        (sum, line) => sum + line.segments.filter((segment) => segment.link !== undefined).length,
        0,
      ),
    0,
  );

  console.log('Bundle inspection');
  console.log('=================');
  console.log(`Path: ${bundlePath}`);
  console.log(`Title: ${meta.title}`);
  console.log(`Profile: ${meta.profile}`);
  console.log(`Page size: ${meta.width}x${meta.height}`);
  console.log(`Pages: ${pages.length}`);
  console.log(`Chapters: ${toc.length}`);
  console.log(`Anchors: ${anchors.size}`);
  console.log(`Words: ${words.length}`);
  console.log(`Sentences: ${sentenceEnds}`);

  console.log('');
  console.log('Page stats');
  console.log('----------');
  console.log(`Image placements: ${imagePlacements}`);
  console.log(`Linked segments: ${linkedSegments}`);
  console.log(`Blank pages: ${blankPages.length}`);

  if (toc.length > 0) {
    console.log('');
    console.log('Contents');
    console.log('--------');
    for (const entry of toc) {
      console.log(`  ${entry.title} -> page ${entry.pageIndex + 1}`);
    }
  }
}

if (isCliEntrypoint()) {
  await program.parseAsync();
}
