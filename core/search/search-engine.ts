/**
 * Directional literal search over rendered row text.
 *
 * Matching runs on the rendered form of each row, so match columns are
 * screen columns; `cx` converts the start back to a logical column.
 */

import type { TextBuffer } from '../buffer/text-buffer';
import { toLogical } from '../buffer/coordinates';

export interface SearchMatch {
  /** Zero-based row of the match. */
  row: number;
  /** Rendered column of the match start. */
  start: number;
  /** Rendered column one past the match end. */
  end: number;
  /** Logical column of the match start. */
  cx: number;
}

/** Where a search starts from: the cursor. */
export interface SearchOrigin {
  cx: number;
  cy: number;
  rx: number;
}

export interface SearchOptions {
  /** Case-sensitive matching. */
  caseSensitive: boolean;
}

const DEFAULT_OPTIONS: SearchOptions = {
  caseSensitive: true,
};

function prepare(text: string, opts: SearchOptions): string {
  return opts.caseSensitive ? text : text.toLowerCase();
}

function toMatch(buffer: TextBuffer, row: number, start: number, length: number): SearchMatch {
  return { row, start, end: start + length, cx: toLogical(buffer.getRow(row), start) };
}

/**
 * Find the first match at or below the cursor row. On the cursor row only
 * matches starting strictly after the cursor's rendered column count.
 */
export function searchForward(
  buffer: TextBuffer,
  query: string,
  from: SearchOrigin,
  options: Partial<SearchOptions> = {},
): SearchMatch | null {
  if (query.length === 0) return null;
  const opts = { ...DEFAULT_OPTIONS, ...options };
  const needle = prepare(query, opts);

  for (let i = Math.max(from.cy, 0); i < buffer.numRows; i++) {
    const row = buffer.getRow(i);
    if (!row) continue;
    const idx = prepare(row.rendered, opts).indexOf(needle, i === from.cy ? from.rx + 1 : 0);
    if (idx !== -1) return toMatch(buffer, i, idx, query.length);
  }
  return null;
}

/**
 * Find the nearest match at or above the cursor row. On the cursor row only
 * matches starting before the cursor count, and a cursor at column 0 skips
 * its row entirely.
 */
export function searchBackward(
  buffer: TextBuffer,
  query: string,
  from: SearchOrigin,
  options: Partial<SearchOptions> = {},
): SearchMatch | null {
  if (query.length === 0) return null;
  const opts = { ...DEFAULT_OPTIONS, ...options };
  const needle = prepare(query, opts);

  for (let i = Math.min(from.cy, buffer.lastRowIndex); i >= 0; i--) {
    if (i === from.cy && from.cx === 0) continue;
    const row = buffer.getRow(i);
    if (!row) continue;
    const text = prepare(row.rendered, opts);
    const idx = i === from.cy ? text.lastIndexOf(needle, from.rx - 1) : text.lastIndexOf(needle);
    if (idx !== -1) return toMatch(buffer, i, idx, query.length);
  }
  return null;
}
