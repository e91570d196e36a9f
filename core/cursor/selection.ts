/**
 * Positions and the cursor/mark region.
 *
 * A region is defined by the mark and the cursor. Its "start" is
 * min(mark, cursor), its "end" is max(mark, cursor), end exclusive.
 */

export interface Position {
  row: number;
  col: number;
}

export interface Region {
  start: Position;
  end: Position;
}

/**
 * Compare two positions. Returns negative if a < b, 0 if equal, positive if a > b.
 */
export function comparePositions(a: Position, b: Position): number {
  if (a.row !== b.row) return a.row - b.row;
  return a.col - b.col;
}

/** Order two endpoints into a region. Coinciding endpoints give null. */
export function orderRegion(a: Position, b: Position): Region | null {
  const cmp = comparePositions(a, b);
  if (cmp === 0) return null;
  return cmp < 0
    ? { start: { ...a }, end: { ...b } }
    : { start: { ...b }, end: { ...a } };
}
