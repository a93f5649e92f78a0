import * as parse5 from 'parse5';
import { CHAPTER_SEPARATOR } from '../layout/chapters.js';
import { imageFallbackText } from '../layout/images.js';
import {
  type StyleCode,
  anchorMarker,
  decodeInline,
  linkClose,
  linkOpen,
  stripMarkers,
  wrapStyle,
} from '../layout/markers.js';
import type { Block, ImageBlock, TableCell } from '../types.js';

type Node = parse5.DefaultTreeAdapterMap['node'];
type Element = parse5.DefaultTreeAdapterMap['element'];
type TextNode = parse5.DefaultTreeAdapterMap['textNode'];

/**
 * Line break placeholder used while collapsing whitespace; becomes "\n" afterwards.
 */
const BR_MARKER = '\u001a';

const INLINE_TAGS = new Set([
  'a',
  'abbr',
  'b',
  'br',
  'cite',
  'code',
  'del',
  'em',
  'i',
  'img',
  'kbd',
  'mark',
  'q',
  's',
  'samp',
  'small',
  'span',
  'strike',
  'strong',
  'sub',
  'sup',
  'u',
]);

const NON_CONTENT_TAGS = new Set([
  'head',
  'script',
  'style',
  'title',
  'meta',
  'link',
  'noscript',
  'template',
]);

const STYLE_TAGS: Record<string, StyleCode> = {
  em: 'i',
  i: 'i',
  cite: 'i',
  strong: 'b',
  b: 'b',
  code: 'c',
  kbd: 'c',
  samp: 'c',
  del: 'x',
  s: 'x',
  strike: 'x',
  u: 'u',
};

const CLOSING_PUNCTUATION = new Set([',', '.', ';', ':', '!', '?', ')', ']', '”']);

export interface ResolvedImage {
  id: string;
  data: Uint8Array;
}

export interface NormalizeXhtmlOptions {
  /** Prefix for anchor names, e.g. the chapter path, so ids stay unique across chapters. */
  anchorPrefix?: string;
  /** Map an internal href to the anchor name it targets; null leaves the label unlinked. */
  resolveLink?: (href: string) => string | null;
  /** Load image bytes for a `src`; null keeps the image as a text fallback. */
  resolveImage?: (src: string) => ResolvedImage | null;
}

interface NormalizeContext {
  options: NormalizeXhtmlOptions;
  pendingAnchors: string[];
}

/**
 * Normalize an XHTML chapter into marker-encoded blocks
 */
export function normalizeXhtml(html: string, options: NormalizeXhtmlOptions = {}): Block[] {
  const document = parse5.parse(html);
  const root: Node = findBody(document) ?? document;
  const ctx: NormalizeContext = { options, pendingAnchors: [] };
  const blocks: Block[] = [];

  collectBlocks(root, blocks, ctx);

  if (blocks.length === 0) {
    const text = normalizeLine(textContent(root));
    if (text) {
      blocks.push({ kind: 'paragraph', text });
    }
  }

  const trailing = takeAnchors(ctx);
  if (trailing) {
    blocks.push({ kind: 'paragraph', text: trailing });
  }

  return blocks;
}

/**
 * Collapse whitespace inside inline text, turning line break placeholders into "\n".
 */
export function normalizeInlineText(input: string): string {
  const cleaned = input
    .replace(/\u00a0/g, ' ')
    .replace(/\r/g, '')
    .replace(/[\u200b-\u200f\ufeff]/g, '')
    .replace(/[\u2028\u2029\n]/g, ' ')
    .replaceAll(BR_MARKER, '\n');

  return cleaned
    .split('\n')
    .map((line) => normalizeLine(line))
    .join('\n')
    .trim();
}

export function normalizeLine(input: string): string {
  let collapsed = '';
  let lastSpace = false;
  for (const ch of input.replace(/\u00ad/g, '')) {
    if (/\s/.test(ch)) {
      if (!lastSpace) {
        collapsed += ' ';
      }
      lastSpace = true;
      continue;
    }
    if (CLOSING_PUNCTUATION.has(ch) && lastSpace) {
      collapsed = collapsed.slice(0, -1);
    }
    collapsed += ch;
    lastSpace = false;
  }
  return dehyphenate(collapsed).trim();
}

/**
 * Join words split across a line break: "exam- ple" becomes "example".
 */
export function dehyphenate(input: string): string {
  const tokens = input.split(' ');
  if (tokens.length < 2) {
    return input;
  }

  const out: string[] = [];
  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];
    const next = tokens[i + 1];
    if (token.length > 1 && token.endsWith('-') && next !== undefined && /^\p{Ll}/u.test(next)) {
      out.push(token.slice(0, -1) + next);
      i++;
      continue;
    }
    out.push(token);
  }
  return out.join(' ');
}

function collectBlocks(node: Node, out: Block[], ctx: NormalizeContext): void {
  let pending = '';

  const flushPending = (): void => {
    const text = normalizeInlineText(pending);
    pending = '';
    if (!text) {
      return;
    }
    // Loose anchors with no text wait for the next block, like container ids
    if (!stripMarkers(text).trim()) {
      for (const piece of decodeInline(text)) {
        if (piece.kind === 'anchor') {
          ctx.pendingAnchors.push(piece.name);
        }
      }
      return;
    }
    out.push({ kind: 'paragraph', text: takeAnchors(ctx) + text });
  };

  for (const child of childNodes(node)) {
    if (isElement(child)) {
      const tag = child.tagName.toLowerCase();
      if (NON_CONTENT_TAGS.has(tag)) {
        continue;
      }

      // Loose images become image blocks; other inline elements join the pending text
      if (INLINE_TAGS.has(tag) && tag !== 'img') {
        pending += inlineText(child, ctx);
        continue;
      }

      flushPending();
      const block = extractBlock(child, tag, ctx);
      if (block) {
        // Code, images and rules carry no anchors of their own
        const anchors = takeAnchors(ctx);
        if (anchors) {
          out.push({ kind: 'paragraph', text: anchors });
        }
        out.push(block);
        continue;
      }

      const id = anchorId(child);
      if (id) {
        ctx.pendingAnchors.push(anchorName(id, ctx));
      }
      collectBlocks(child, out, ctx);
      continue;
    }

    if (isTextNode(child)) {
      pending += child.value;
    }
  }

  flushPending();
}

/**
 * Anchors from container elements ride on the next block's text
 */
function takeAnchors(ctx: NormalizeContext): string {
  const markers = ctx.pendingAnchors.map((name) => anchorMarker(name)).join('');
  ctx.pendingAnchors = [];
  return markers;
}

function headingLevel(tag: string): number | null {
  const match = /^h([1-6])$/.exec(tag);
  return match ? Number(match[1]) : null;
}

function extractBlock(el: Element, tag: string, ctx: NormalizeContext): Block | null {
  const level = headingLevel(tag);
  if (level !== null) {
    const text = normalizedInline(el, ctx);
    return text ? { kind: 'heading', text: takeAnchors(ctx) + text, level } : null;
  }

  switch (tag) {
    case 'p': {
      const text = normalizedInline(el, ctx);
      return text ? { kind: 'paragraph', text: takeAnchors(ctx) + text } : null;
    }
    case 'blockquote':
    case 'aside': {
      const text = normalizedInline(el, ctx);
      return text ? { kind: 'quote', text: takeAnchors(ctx) + text } : null;
    }
    case 'ul':
    case 'ol':
      return listBlock(el, ctx);
    case 'dl':
      return definitionListBlock(el, ctx);
    case 'pre':
      return codeBlock(el);
    case 'img':
      return imageBlock(el, ctx, undefined);
    case 'figure':
      return figureBlock(el, ctx);
    case 'table':
      return tableBlock(el, ctx);
    case 'hr':
      return { kind: 'paragraph', text: CHAPTER_SEPARATOR };
    case 'math':
      return { kind: 'paragraph', text: '[math]' };
    case 'svg':
      return { kind: 'paragraph', text: '[svg]' };
    default:
      return null;
  }
}

function listBlock(el: Element, ctx: NormalizeContext): Block | null {
  const items: string[] = [];
  for (const child of childElements(el)) {
    if (child.tagName.toLowerCase() !== 'li') {
      continue;
    }
    const text = normalizeInlineText(inlineChildren(child, ctx, true));
    const id = anchorId(child);
    if (text) {
      items.push((id ? anchorMarker(anchorName(id, ctx)) : '') + text);
    }
  }
  if (items.length === 0) {
    return null;
  }
  items[0] = takeAnchors(ctx) + items[0];
  return { kind: 'list', items };
}

function definitionListBlock(el: Element, ctx: NormalizeContext): Block | null {
  const items: string[] = [];
  let term: string | null = null;

  for (const child of childElements(el)) {
    const tag = child.tagName.toLowerCase();
    if (tag === 'dt') {
      const text = normalizedInline(child, ctx);
      if (text) {
        term = text;
      }
    } else if (tag === 'dd') {
      const definition = normalizedInline(child, ctx);
      if (definition) {
        items.push(term ? `${term}: ${definition}` : definition);
        term = null;
      }
    }
  }

  if (items.length === 0) {
    return null;
  }
  items[0] = takeAnchors(ctx) + items[0];
  return { kind: 'list', items };
}

function codeBlock(el: Element): Block {
  const code = findDescendant(el, 'code');
  const text = textContent(code ?? el).replace(/\r\n/g, '\n');
  const lang = code ? codeLanguage(getAttribute(code, 'class')) : undefined;
  return lang ? { kind: 'code', lang, text } : { kind: 'code', text };
}

function codeLanguage(classAttr: string | null): string | undefined {
  if (!classAttr) {
    return undefined;
  }
  const classes = classAttr.split(/\s+/).filter(Boolean);
  const tagged = classes.find((name) => /^(language|lang)-/.test(name));
  const name = tagged ? tagged.replace(/^(language|lang)-/, '') : classes[0];
  return name || undefined;
}

function imageBlock(el: Element, ctx: NormalizeContext, caption: string | undefined): Block | null {
  const src = getAttribute(el, 'src') ?? getAttribute(el, 'xlink:href') ?? getAttribute(el, 'href');
  const alt = imageLabel(el);
  const width = parseDimension(getAttribute(el, 'width'));
  const height = parseDimension(getAttribute(el, 'height'));

  if (!src) {
    const text = caption ?? imageFallbackText({ alt, width, height });
    return { kind: 'paragraph', text: takeAnchors(ctx) + text };
  }

  const resolved = ctx.options.resolveImage?.(src) ?? null;
  const image: ImageBlock = { kind: 'image', id: resolved?.id ?? src };
  if (resolved) {
    image.data = resolved.data;
  }
  if (alt) {
    image.alt = alt;
  }
  if (caption) {
    image.caption = caption;
  }
  if (width !== undefined) {
    image.width = width;
  }
  if (height !== undefined) {
    image.height = height;
  }
  return image;
}

function figureBlock(el: Element, ctx: NormalizeContext): Block | null {
  const img = findDescendant(el, 'img') ?? findDescendant(el, 'image');
  if (!img) {
    return null;
  }
  const figcaption = findDescendant(el, 'figcaption');
  const caption = figcaption ? normalizedInline(figcaption, ctx) : '';
  return imageBlock(img, ctx, caption || undefined);
}

function tableBlock(el: Element, ctx: NormalizeContext): Block | null {
  const rows: TableCell[][] = [];

  for (const tr of findAllDescendants(el, 'tr')) {
    const cells: TableCell[] = [];
    let hasText = false;
    for (const child of childElements(tr)) {
      const tag = child.tagName.toLowerCase();
      if (tag !== 'td' && tag !== 'th') {
        continue;
      }
      const text = normalizedInline(child, ctx);
      if (stripMarkers(text).trim()) {
        hasText = true;
      }
      cells.push({ text, isHeader: tag === 'th' });
    }
    if (cells.length > 0 && hasText) {
      rows.push(cells);
    }
  }

  if (rows.length === 0) {
    const fallback = normalizedInline(el, ctx);
    return fallback ? { kind: 'paragraph', text: takeAnchors(ctx) + fallback } : null;
  }

  const anchors = takeAnchors(ctx);
  if (anchors) {
    rows[0][0] = { ...rows[0][0], text: anchors + rows[0][0].text };
  }
  return { kind: 'table', rows };
}

function normalizedInline(el: Element, ctx: NormalizeContext): string {
  return normalizeInlineText(inlineText(el, ctx));
}

/**
 * Marker-encoded inline text of a node, including its own anchor
 */
function inlineText(node: Node, ctx: NormalizeContext): string {
  if (isTextNode(node)) {
    return node.value;
  }
  if (!isElement(node)) {
    return inlineChildren(node, ctx, false);
  }

  const tag = node.tagName.toLowerCase();
  if (NON_CONTENT_TAGS.has(tag)) {
    return '';
  }

  const id = anchorId(node);
  const anchor = id ? anchorMarker(anchorName(id, ctx)) : '';
  return anchor + elementInlineText(node, tag, ctx);
}

function elementInlineText(el: Element, tag: string, ctx: NormalizeContext): string {
  const styleCode = STYLE_TAGS[tag];
  if (styleCode) {
    const label = inlineChildren(el, ctx, false);
    return label ? wrapStyle(label, styleCode) : '';
  }

  switch (tag) {
    case 'br':
      return BR_MARKER;
    case 'a':
      return linkText(el, ctx);
    case 'img':
      return imageInlineText(el);
    case 'span': {
      let label = inlineChildren(el, ctx, false);
      for (const code of spanStyleCodes(el)) {
        label = label ? wrapStyle(label, code) : label;
      }
      return label;
    }
    case 'sup':
    case 'sub': {
      const label = inlineChildren(el, ctx, false);
      if (!label) {
        return '';
      }
      return tag === 'sup' ? `^{${label}}` : `_{${label}}`;
    }
    case 'abbr': {
      const label = inlineChildren(el, ctx, false);
      const title = normalizeInlineText(getAttribute(el, 'title') ?? '');
      if (label && title && !label.includes(title)) {
        return `${label} (${title})`;
      }
      return label;
    }
    case 'math':
    case 'svg': {
      const label = inlineChildren(el, ctx, false);
      return label.trim() ? label : `[${tag}]`;
    }
    default:
      return inlineChildren(el, ctx, false);
  }
}

function inlineChildren(node: Node, ctx: NormalizeContext, skipLists: boolean): string {
  let out = '';
  for (const child of childNodes(node)) {
    if (skipLists && isElement(child) && ['ul', 'ol'].includes(child.tagName.toLowerCase())) {
      continue;
    }
    out += inlineText(child, ctx);
  }
  return out;
}

function linkText(el: Element, ctx: NormalizeContext): string {
  const label = inlineChildren(el, ctx, false);
  const href = getAttribute(el, 'href')?.trim();

  if (!stripMarkers(label).trim()) {
    return href && isExternalHref(href) ? label + href : label;
  }
  if (!href) {
    return label;
  }

  if (isExternalHref(href)) {
    return label.includes(href) ? label : `${label} (${href})`;
  }

  const target = ctx.options.resolveLink?.(href) ?? null;
  if (target) {
    const open = linkOpen(target);
    return open ? open + label + linkClose() : label;
  }
  return label;
}

function isExternalHref(href: string): boolean {
  return /^(https?:|mailto:|tel:)/i.test(href.trim());
}

function imageInlineText(el: Element): string {
  const label = imageLabel(el);
  if (label) {
    return label;
  }
  const width = parseDimension(getAttribute(el, 'width'));
  const height = parseDimension(getAttribute(el, 'height'));
  return imageFallbackText({ width, height });
}

function imageLabel(el: Element): string | undefined {
  const raw = getAttribute(el, 'alt') ?? getAttribute(el, 'title') ?? getAttribute(el, 'aria-label');
  const label = raw ? normalizeInlineText(raw) : '';
  return label || undefined;
}

function spanStyleCodes(el: Element): StyleCode[] {
  const codes = new Set<StyleCode>();
  const style = (getAttribute(el, 'style') ?? '').toLowerCase().replace(/\s+/g, ' ');

  if (/font-style:\s?italic/.test(style)) {
    codes.add('i');
  }
  if (/font-weight:\s?(bold|[6-9]00)/.test(style)) {
    codes.add('b');
  }
  if (/text-decoration(-line)?:[^;]*underline/.test(style)) {
    codes.add('u');
  }
  if (/text-decoration(-line)?:[^;]*line-through/.test(style)) {
    codes.add('x');
  }
  if (/font-variant(-caps)?:\s?small-caps/.test(style)) {
    codes.add('s');
  }

  const classes = (getAttribute(el, 'class') ?? '').toLowerCase();
  if (/small-caps|smallcaps|small_caps|smcap/.test(classes)) {
    codes.add('s');
  }

  return [...codes];
}

function anchorId(el: Element): string | null {
  const id = getAttribute(el, 'id') ?? getAttribute(el, 'name') ?? getAttribute(el, 'xml:id');
  const trimmed = id?.trim();
  return trimmed ? trimmed : null;
}

function anchorName(id: string, ctx: NormalizeContext): string {
  const bare = id.replace(/^#/, '').trim();
  return `${ctx.options.anchorPrefix ?? ''}#${bare}`;
}

function parseDimension(value: string | null): number | undefined {
  const digits = /^\s*(\d+)/.exec(value ?? '');
  return digits ? Number(digits[1]) : undefined;
}

function textContent(node: Node): string {
  if (isTextNode(node)) {
    return node.value;
  }
  if (isElement(node) && NON_CONTENT_TAGS.has(node.tagName.toLowerCase())) {
    return '';
  }
  let out = '';
  for (const child of childNodes(node)) {
    out += textContent(child);
  }
  return out;
}

function findBody(document: parse5.DefaultTreeAdapterMap['document']): Element | null {
  for (const node of document.childNodes) {
    if (!isElement(node) || node.tagName !== 'html') {
      continue;
    }
    for (const child of node.childNodes) {
      if (isElement(child) && child.tagName === 'body') {
        return child;
      }
    }
  }
  return null;
}

function findDescendant(node: Node, tagName: string): Element | null {
  for (const child of childNodes(node)) {
    if (isElement(child)) {
      if (child.tagName.toLowerCase() === tagName) {
        return child;
      }
      const found = findDescendant(child, tagName);
      if (found) {
        return found;
      }
    }
  }
  return null;
}

function findAllDescendants(node: Node, tagName: string): Element[] {
  const found: Element[] = [];
  for (const child of childNodes(node)) {
    if (!isElement(child)) {
      continue;
    }
    if (child.tagName.toLowerCase() === tagName) {
      found.push(child);
    }
    found.push(...findAllDescendants(child, tagName));
  }
  return found;
}

function childNodes(node: Node): Node[] {
  return 'childNodes' in node ? node.childNodes : [];
}

function childElements(node: Node): Element[] {
  return childNodes(node).filter(isElement);
}

/**
 * Type guard for Element nodes
 */
function isElement(node: Node): node is Element {
  return 'tagName' in node;
}

/**
 * Type guard for TextNode
 */
function isTextNode(node: Node): node is TextNode {
  return node.nodeName === '#text';
}

function getAttribute(element: Element, name: string): string | null {
  const attr = element.attrs.find((a) => a.name === name);
  return attr ? attr.value : null;
}
