import type { Segment, StyledLine, TableCell } from '../types.js';
import { defaultTextStyle, plainLine } from '../types.js';
import { compactSegments, graphemeWidth, lineWidth } from './graphemes.js';
import { type WrappedLines, wrapStyledText } from './inline.js';
import { stripMarkers } from './markers.js';

export interface TableLine {
  line: StyledLine;
  anchors: string[];
}

/**
 * Pick the column separator the width can afford.
 */
export function tableSeparator(width: number, columns: number): string {
  if (columns <= 1) {
    return '';
  }
  if (width >= columns + (columns - 1) * 3) {
    return ' | ';
  }
  if (width >= columns + (columns - 1)) {
    return ' ';
  }
  return '';
}

/**
 * Widest line of any cell per column, measured without markers.
 */
export function tableMaxWidths(rows: TableCell[][], columns: number): number[] {
  const widths = new Array<number>(columns).fill(0);
  for (const row of rows) {
    row.forEach((cell, index) => {
      if (index >= columns) {
        return;
      }
      const plain = stripMarkers(cell.text);
      for (const line of plain.split('\n')) {
        widths[index] = Math.max(widths[index], graphemeWidth(line));
      }
    });
  }
  return widths;
}

/**
 * Allocate `available` cells across columns: a minimum each (3 when it fits, else 1),
 * then one unit at a time to the column with the most remaining content width. Once every
 * column holds its content, the leftover goes to the first column.
 */
export function computeColumnWidths(maxWidths: number[], available: number): number[] {
  const columns = maxWidths.length;
  if (columns === 0) {
    return [];
  }

  const minWidth = available >= columns * 3 ? 3 : 1;
  const widths = new Array<number>(columns).fill(minWidth);
  const capacity = maxWidths.map((width) => Math.max(0, width - minWidth));
  let remaining = Math.max(0, available - minWidth * columns);

  while (remaining > 0) {
    let best = 0;
    for (let index = 1; index < columns; index++) {
      if (capacity[index] > capacity[best]) {
        best = index;
      }
    }
    widths[best]++;
    capacity[best] = Math.max(0, capacity[best] - 1);
    remaining--;
  }

  return widths;
}

function headerRunEnd(rows: TableCell[][]): number | null {
  let last: number | null = null;
  for (let index = 0; index < rows.length; index++) {
    if (!rows[index].some((cell) => cell.isHeader)) {
      break;
    }
    last = index;
  }
  return last;
}

function ruleLine(widths: number[], separator: string): StyledLine {
  const ruleSeparator = separator === ' | ' ? '-+-' : separator;
  return plainLine(widths.map((width) => '-'.repeat(Math.max(1, width))).join(ruleSeparator));
}

function emboldened(segments: Segment[]): Segment[] {
  return segments.map((segment) => ({ ...segment, style: { ...segment.style, bold: true } }));
}

/**
 * Tables too narrow for one cell per column: every non-empty cell on its own lines.
 */
function renderStacked(rows: TableCell[][], width: number): TableLine[] {
  const out: TableLine[] = [];
  for (const row of rows) {
    for (const cell of row) {
      const text = cell.text.trim();
      if (!text) {
        continue;
      }
      const wrapped = wrapStyledText(text, width);
      wrapped.lines.forEach((line, index) => {
        const segments = cell.isHeader ? emboldened(line.segments) : line.segments;
        out.push({ line: { segments: compactSegments(segments) }, anchors: wrapped.anchors[index] });
      });
    }
  }
  return out;
}

/**
 * Lay out a table block as lines no wider than `width`.
 */
export function renderTable(rows: TableCell[][], width: number): TableLine[] {
  const safeWidth = Math.max(1, width);
  if (rows.length === 0) {
    return [];
  }

  const columns = rows.reduce((max, row) => Math.max(max, row.length), 0);
  if (columns === 0) {
    return [];
  }

  const separator = tableSeparator(safeWidth, columns);
  const separatorWidth = graphemeWidth(separator);
  const available = safeWidth - separatorWidth * (columns - 1);
  if (available < columns) {
    return renderStacked(rows, safeWidth);
  }

  const columnWidths = computeColumnWidths(tableMaxWidths(rows, columns), available);
  const headerEnd = headerRunEnd(rows);
  const out: TableLine[] = [];

  rows.forEach((row, rowIndex) => {
    const isHeaderRow = row.some((cell) => cell.isHeader);
    const wrappedCells: WrappedLines[] = columnWidths.map((columnWidth, column) =>
      wrapStyledText(row[column]?.text.trim() ?? '', columnWidth),
    );
    const rowHeight = wrappedCells.reduce((max, wrapped) => Math.max(max, wrapped.lines.length), 1);

    for (let lineIndex = 0; lineIndex < rowHeight; lineIndex++) {
      const segments: Segment[] = [];
      const anchors: string[] = [];

      wrappedCells.forEach((wrapped, column) => {
        const cellLine = wrapped.lines[lineIndex] ?? { segments: [] };
        const cellSegments = isHeaderRow ? emboldened(cellLine.segments) : cellLine.segments;
        segments.push(...cellSegments);

        const pad = columnWidths[column] - lineWidth({ segments: cellSegments });
        if (pad > 0) {
          segments.push({ text: ' '.repeat(pad), style: defaultTextStyle() });
        }
        if (column + 1 < columns && separator) {
          segments.push({ text: separator, style: defaultTextStyle() });
        }

        anchors.push(...(wrapped.anchors[lineIndex] ?? []));
      });

      out.push({ line: { segments: compactSegments(segments) }, anchors });
    }

    if (headerEnd === rowIndex) {
      out.push({ line: ruleLine(columnWidths, separator), anchors: [] });
    }
  });

  return out;
}
