import { describe, expect, it } from 'vitest';
import { parseBlockDocument, parseBlockDocumentJson } from '../src/blocks/schema.js';

describe('block documents', () => {
  it('accepts a bare block array and fills defaults', () => {
    const document = parseBlockDocument([
      { kind: 'heading', text: 'Title' },
      { kind: 'table', rows: [[{ text: 'a' }, { text: 'b', isHeader: true }]] },
    ]);

    expect(document).toEqual({
      blocks: [
        { kind: 'heading', text: 'Title', level: 1 },
        {
          kind: 'table',
          rows: [
            [
              { text: 'a', isHeader: false },
              { text: 'b', isHeader: true },
            ],
          ],
        },
      ],
    });
  });

  it('decodes base64 image data', () => {
    const document = parseBlockDocumentJson(
      JSON.stringify({ title: 'Book', blocks: [{ kind: 'image', id: 'i1', data: 'AQID', alt: 'dots' }] }),
    );
    const [block] = document.blocks;
    if (block?.kind !== 'image' || !block.data) {
      throw new Error('expected an image block with data');
    }

    expect(document.title).toBe('Book');
    expect(block.alt).toBe('dots');
    expect(Array.from(block.data)).toEqual([1, 2, 3]);
  });

  it('lists failing paths for invalid documents', () => {
    expect(() => parseBlockDocument([{ kind: 'paragraph' }], 'doc.json')).toThrow(/^Invalid doc\.json:\n {2}\//);
  });

  it('rejects malformed JSON', () => {
    expect(() => parseBlockDocumentJson('{', 'broken.json')).toThrow(/^Invalid broken\.json: /);
  });
});
