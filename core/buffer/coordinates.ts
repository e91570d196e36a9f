/**
 * Conversion between logical columns (offsets into a row's raw text) and
 * rendered columns (screen columns after tab expansion).
 *
 * Both functions are total: an absent row maps every column to 0.
 */

import type { Row } from './row';

function advance(rx: number, ch: string, tabStop: number): number {
  if (ch === '\t') return rx + (tabStop - (rx % tabStop));
  return rx + 1;
}

export function toRendered(row: Row | null | undefined, cx: number): number {
  if (!row) return 0;
  const end = Math.min(cx, row.length);
  let rx = 0;
  for (let i = 0; i < end; i++) {
    rx = advance(rx, row.raw[i], row.tabStop);
  }
  return rx;
}

/**
 * Map a rendered column back to the logical column whose character covers
 * it. Columns past the rendered end map to the row length.
 */
export function toLogical(row: Row | null | undefined, rx: number): number {
  if (!row) return 0;
  let cur = 0;
  for (let cx = 0; cx < row.length; cx++) {
    cur = advance(cur, row.raw[cx], row.tabStop);
    if (cur > rx) return cx;
  }
  return row.length;
}
