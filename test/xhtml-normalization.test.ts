import { describe, expect, it } from 'vitest';
import { dehyphenate, normalizeInlineText, normalizeXhtml } from '../src/blocks/xhtml.js';
import { anchorMarker, linkClose, linkOpen, wrapStyle } from '../src/layout/markers.js';

function xhtml(body: string): string {
  return `<?xml version="1.0" encoding="UTF-8"?><html xmlns="http://www.w3.org/1999/xhtml"><head><title>t</title></head><body>${body}</body></html>`;
}

describe('XHTML normalization', () => {
  it('maps headings and paragraphs with inline styles and anchors', () => {
    const blocks = normalizeXhtml(xhtml('<h1 id="top">Title</h1><p>Hello <em>world</em>!</p>'), {
      anchorPrefix: 'ch1.xhtml',
    });

    expect(blocks).toEqual([
      { kind: 'heading', text: `${anchorMarker('ch1.xhtml#top')}Title`, level: 1 },
      { kind: 'paragraph', text: `Hello ${wrapStyle('world', 'i')}!` },
    ]);
  });

  it('collapses whitespace and removes space before punctuation', () => {
    expect(normalizeXhtml(xhtml('<p>  Some   text ,\n  here .</p>'))).toEqual([
      { kind: 'paragraph', text: 'Some text, here.' },
    ]);
  });

  it('turns br into a line break', () => {
    expect(normalizeXhtml(xhtml('<p>line one<br/>line two</p>'))).toEqual([
      { kind: 'paragraph', text: 'line one\nline two' },
    ]);
  });

  it('links internal references and spells out external ones', () => {
    const blocks = normalizeXhtml(
      xhtml('<p>See <a href="ch2.xhtml#n1">note</a> and <a href="https://example.com">site</a>.</p>'),
      { resolveLink: (href) => href },
    );

    expect(blocks).toEqual([
      {
        kind: 'paragraph',
        text: `See ${linkOpen('ch2.xhtml#n1')}note${linkClose()} and site (https://example.com).`,
      },
    ]);
  });

  it('leaves internal links unlinked without a resolver', () => {
    expect(normalizeXhtml(xhtml('<p><a href="#n1">note</a></p>'))).toEqual([{ kind: 'paragraph', text: 'note' }]);
  });

  it('maps lists without their nested lists', () => {
    expect(normalizeXhtml(xhtml('<ul><li>One</li><li>Two <ul><li>nested</li></ul></li></ul>'))).toEqual([
      { kind: 'list', items: ['One', 'Two'] },
    ]);
  });

  it('maps definition lists to term: definition items', () => {
    expect(normalizeXhtml(xhtml('<dl><dt>Term</dt><dd>Meaning</dd></dl>'))).toEqual([
      { kind: 'list', items: ['Term: Meaning'] },
    ]);
  });

  it('maps tables with header cells', () => {
    const blocks = normalizeXhtml(
      xhtml('<table><tr><th>Name</th><th>Qty</th></tr><tr><td>Apple</td><td>3</td></tr></table>'),
    );

    expect(blocks).toEqual([
      {
        kind: 'table',
        rows: [
          [
            { text: 'Name', isHeader: true },
            { text: 'Qty', isHeader: true },
          ],
          [
            { text: 'Apple', isHeader: false },
            { text: '3', isHeader: false },
          ],
        ],
      },
    ]);
  });

  it('keeps preformatted code and its language', () => {
    const blocks = normalizeXhtml(xhtml('<pre><code class="language-js">let x = 1;\n  x++;\n</code></pre>'));
    expect(blocks).toEqual([{ kind: 'code', lang: 'js', text: 'let x = 1;\n  x++;\n' }]);
  });

  it('maps figures to images with captions', () => {
    const data = new Uint8Array([9]);
    const blocks = normalizeXhtml(
      xhtml('<figure><img src="pic.png" alt="A cat" width="200" height="100"/><figcaption>Our cat</figcaption></figure>'),
      { resolveImage: (src) => (src === 'pic.png' ? { id: 'img1', data } : null) },
    );

    expect(blocks).toEqual([
      { kind: 'image', id: 'img1', data, alt: 'A cat', caption: 'Our cat', width: 200, height: 100 },
    ]);
  });

  it('uses image alt text inline', () => {
    expect(normalizeXhtml(xhtml('<p><img alt="logo"/> Brand</p>'))).toEqual([
      { kind: 'paragraph', text: 'logo Brand' },
    ]);
  });

  it('skips scripts and turns rules into separators', () => {
    expect(normalizeXhtml(xhtml('<p>a</p><script>var x;</script><hr/><p>b</p>'))).toEqual([
      { kind: 'paragraph', text: 'a' },
      { kind: 'paragraph', text: '───' },
      { kind: 'paragraph', text: 'b' },
    ]);
  });

  it('carries container anchors onto the next block', () => {
    const blocks = normalizeXhtml(xhtml('<section id="s1"><p>Body</p></section>'), { anchorPrefix: 'c.xhtml' });
    expect(blocks).toEqual([{ kind: 'paragraph', text: `${anchorMarker('c.xhtml#s1')}Body` }]);
  });

  it('wraps loose text in a paragraph', () => {
    expect(normalizeXhtml(xhtml('just <b>text</b>'))).toEqual([
      { kind: 'paragraph', text: `just ${wrapStyle('text', 'b')}` },
    ]);
  });

  it('encodes superscripts and small caps', () => {
    expect(
      normalizeXhtml(xhtml('<p>x<sup>2</sup> <span style="font-variant: small-caps">Rome</span></p>')),
    ).toEqual([{ kind: 'paragraph', text: `x^{2} ${wrapStyle('Rome', 's')}` }]);
  });
});

describe('inline text cleanup', () => {
  it('joins words hyphenated across a space', () => {
    expect(dehyphenate('exam- ple of Word- Play')).toBe('example of Word- Play');
  });

  it('drops soft hyphens and zero-width characters', () => {
    expect(normalizeInlineText('hy\u00adphen\u200bated word')).toBe('hyphenated word');
  });

  it('moves a loose anchor onto the heading that follows it', () => {
    expect(normalizeXhtml(xhtml('<a id="top"></a><h1>Two</h1>'), { anchorPrefix: 'c2.xhtml' })).toEqual([
      { kind: 'heading', text: `${anchorMarker('c2.xhtml#top')}Two`, level: 1 },
    ]);
  });

  it('keeps container anchors in front of code blocks and at the end of a chapter', () => {
    const blocks = normalizeXhtml(
      xhtml('<section id="s1"><pre>code</pre></section><p>next</p><div id="end"></div>'),
      { anchorPrefix: 'c' },
    );

    expect(blocks).toEqual([
      { kind: 'paragraph', text: anchorMarker('c#s1') },
      { kind: 'code', text: 'code' },
      { kind: 'paragraph', text: 'next' },
      { kind: 'paragraph', text: anchorMarker('c#end') },
    ]);
  });

  it('attaches container anchors to definition lists', () => {
    expect(normalizeXhtml(xhtml('<div id="d"><dl><dt>Term</dt><dd>Meaning</dd></dl></div>'))).toEqual([
      { kind: 'list', items: [`${anchorMarker('#d')}Term: Meaning`] },
    ]);
  });
});
