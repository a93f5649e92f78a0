import { describe, expect, it } from 'vitest';
import { lineText, lineWidth } from '../src/layout/graphemes.js';
import { anchorMarker } from '../src/layout/markers.js';
import { computeColumnWidths, renderTable, tableSeparator } from '../src/layout/table.js';
import type { TableCell } from '../src/types.js';

function cell(text: string, isHeader = false): TableCell {
  return { text, isHeader };
}

const fruitRows: TableCell[][] = [
  [cell('Name', true), cell('Value', true)],
  [cell('a'), cell('1')],
  [cell('bb'), cell('22')],
];

describe('tableSeparator', () => {
  it('picks the widest separator that fits', () => {
    expect(tableSeparator(20, 2)).toBe(' | ');
    expect(tableSeparator(3, 2)).toBe(' ');
    expect(tableSeparator(2, 2)).toBe('');
    expect(tableSeparator(40, 1)).toBe('');
  });
});

describe('computeColumnWidths', () => {
  it('grows the wide column to its content and gives the rest to the narrow one', () => {
    expect(computeColumnWidths([4, 20], 30)).toEqual([10, 20]);
  });

  it('falls back to one cell per column when three do not fit', () => {
    expect(computeColumnWidths([5, 5, 5], 4)).toEqual([2, 1, 1]);
  });

  it('returns nothing for zero columns', () => {
    expect(computeColumnWidths([], 10)).toEqual([]);
  });
});

describe('renderTable', () => {
  it('pads cells, separates columns and rules off the header', () => {
    const lines = renderTable(fruitRows, 20).map(({ line }) => lineText(line));
    expect(lines).toEqual([
      `Name${' '.repeat(8)} | Value`,
      `${'-'.repeat(12)}-+-${'-'.repeat(5)}`,
      `a${' '.repeat(11)} | 1${' '.repeat(4)}`,
      `bb${' '.repeat(10)} | 22${' '.repeat(3)}`,
    ]);
  });

  it('bolds header cells only', () => {
    const [header] = renderTable(fruitRows, 20);
    expect(header.line.segments.map((segment) => [segment.text, segment.style.bold])).toEqual([
      ['Name', true],
      [`${' '.repeat(8)} | `, false],
      ['Value', true],
    ]);
  });

  it('keeps every line within the width', () => {
    for (const width of [5, 8, 13, 20, 31]) {
      for (const { line } of renderTable(fruitRows, width)) {
        expect(lineWidth(line)).toBeLessThanOrEqual(width);
      }
    }
  });

  it('adds no rule when the header row is not first', () => {
    const lines = renderTable([[cell('a')], [cell('b', true)]], 10);
    expect(lines.map(({ line }) => lineText(line))).toEqual([`a${' '.repeat(9)}`, `b${' '.repeat(9)}`]);
  });

  it('stacks cells when there is no room for every column', () => {
    const lines = renderTable([[cell('ab', true), cell('c')]], 1);
    expect(lines.map(({ line }) => lineText(line))).toEqual(['a', 'b', 'c']);
    expect(lines[0].line.segments[0].style.bold).toBe(true);
    expect(lines[2].line.segments[0].style.bold).toBe(false);
  });

  it('reports anchors found in cells', () => {
    const [first] = renderTable([[cell(`${anchorMarker('t1')}x`)]], 10);
    expect(first.anchors).toEqual(['t1']);
  });

  it('produces no lines for an empty table', () => {
    expect(renderTable([], 10)).toEqual([]);
    expect(renderTable([[]], 10)).toEqual([]);
  });
});
