import { type Static, Type } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import type { Block } from '../types.js';

const TableCellSchema = Type.Object({
  text: Type.String(),
  isHeader: Type.Optional(Type.Boolean()),
});

export const BlockJsonSchema = Type.Union([
  Type.Object({ kind: Type.Literal('paragraph'), text: Type.String() }),
  Type.Object({
    kind: Type.Literal('heading'),
    text: Type.String(),
    level: Type.Optional(Type.Integer({ minimum: 1, maximum: 6 })),
  }),
  Type.Object({ kind: Type.Literal('list'), items: Type.Array(Type.String()) }),
  Type.Object({ kind: Type.Literal('quote'), text: Type.String() }),
  Type.Object({
    kind: Type.Literal('code'),
    lang: Type.Optional(Type.String()),
    text: Type.String(),
  }),
  Type.Object({ kind: Type.Literal('table'), rows: Type.Array(Type.Array(TableCellSchema)) }),
  Type.Object({
    kind: Type.Literal('image'),
    id: Type.String(),
    data: Type.Optional(Type.String({ description: 'base64-encoded image bytes' })),
    alt: Type.Optional(Type.String()),
    caption: Type.Optional(Type.String()),
    width: Type.Optional(Type.Integer({ minimum: 0 })),
    height: Type.Optional(Type.Integer({ minimum: 0 })),
  }),
]);

export const BlockDocumentSchema = Type.Union([
  Type.Object({
    title: Type.Optional(Type.String()),
    blocks: Type.Array(BlockJsonSchema),
  }),
  Type.Array(BlockJsonSchema),
]);

export type BlockJson = Static<typeof BlockJsonSchema>;

export interface BlockDocument {
  title?: string;
  blocks: Block[];
}

/**
 * Convert a validated JSON block into an engine block
 */
export function blockFromJson(json: BlockJson): Block {
  switch (json.kind) {
    case 'heading':
      return { kind: 'heading', text: json.text, level: json.level ?? 1 };
    case 'table':
      return {
        kind: 'table',
        rows: json.rows.map((row) =>
          row.map((cell) => ({ text: cell.text, isHeader: cell.isHeader ?? false })),
        ),
      };
    case 'image': {
      const { data, ...rest } = json;
      return data === undefined ? rest : { ...rest, data: Buffer.from(data, 'base64') };
    }
    default:
      return json;
  }
}

/**
 * Validate and convert a parsed JSON document. Throws listing every failing path.
 */
export function parseBlockDocument(value: unknown, source = 'block document'): BlockDocument {
  if (!Value.Check(BlockDocumentSchema, value)) {
    const issues = [...Value.Errors(BlockDocumentSchema, value)]
      .slice(0, 10)
      .map((error) => `  ${error.path || '/'}: ${error.message}`);
    throw new Error(`Invalid ${source}:\n${issues.join('\n')}`);
  }

  if (Array.isArray(value)) {
    return { blocks: value.map(blockFromJson) };
  }

  const document: BlockDocument = { blocks: value.blocks.map(blockFromJson) };
  if (value.title !== undefined) {
    document.title = value.title;
  }
  return document;
}

export function parseBlockDocumentJson(json: string, source = 'block document'): BlockDocument {
  let value: unknown;
  try {
    value = JSON.parse(json);
  } catch (err) {
    throw new Error(`Invalid ${source}: ${err instanceof Error ? err.message : String(err)}`);
  }
  return parseBlockDocument(value, source);
}
