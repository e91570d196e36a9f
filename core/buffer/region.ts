/**
 * Cut of the region between two ordered positions.
 */

import type { TextBuffer } from './text-buffer';
import type { Region } from '../cursor/selection';

function isWholeDocument(buffer: TextBuffer, region: Region): boolean {
  const { start, end } = region;
  const last = buffer.getRow(buffer.lastRowIndex);
  return (
    start.row === 0 &&
    start.col === 0 &&
    last !== null &&
    end.row === buffer.lastRowIndex &&
    end.col === last.length
  );
}

/**
 * Remove the text of `region` from the buffer and return it, rows joined
 * by '\n'. The caller places the cursor at `region.start`.
 *
 * A multi-row region whose start column is 0 removes the start row
 * outright; otherwise the start row keeps its prefix and receives the
 * remainder of the end row.
 */
export function extractRegion(buffer: TextBuffer, region: Region): string {
  const { start, end } = region;

  if (isWholeDocument(buffer, region)) {
    const parts: string[] = [];
    const numRows = buffer.numRows;
    for (let i = 0; i < numRows; i++) parts.push(buffer.deleteRow(0));
    return parts.join('\n');
  }

  if (start.row === end.row) {
    return buffer.rowDeleteRange(start.row, start.col, end.col - start.col);
  }

  const startRow = buffer.getRow(start.row);
  if (!startRow) return '';

  let payload: string;
  const startDeleted = start.col === 0;
  if (startDeleted) {
    payload = buffer.deleteRow(start.row);
  } else {
    payload = buffer.rowDeleteRange(start.row, start.col, startRow.length - start.col);
  }

  // Interior rows always sit right after the start position once their
  // predecessors are gone.
  const interiorAt = startDeleted ? start.row : start.row + 1;
  for (let i = start.row + 1; i < end.row; i++) {
    payload += '\n' + buffer.deleteRow(interiorAt);
  }

  payload += '\n';
  if (startDeleted) {
    payload += buffer.rowDeleteRange(interiorAt, 0, end.col);
  } else {
    const endRow = buffer.getRow(interiorAt);
    const endLen = endRow ? endRow.length : 0;
    const tail = buffer.rowDeleteRange(interiorAt, end.col, endLen - end.col);
    buffer.rowAppend(start.row, tail);
    payload += buffer.deleteRow(interiorAt);
  }

  return payload;
}
