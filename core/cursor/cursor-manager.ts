/**
 * Cursor and mark management.
 *
 * The cursor lives in logical coordinates (cx, cy). Vertical motions keep a
 * target rendered column `tx` so moving through rows with different tab
 * layouts stays visually straight; horizontal motions reset it.
 */

import type { TextBuffer } from '../buffer/text-buffer';
import { toLogical, toRendered } from '../buffer/coordinates';
import type { Position } from './selection';
import { isWordChar } from './word-boundary';

export type CursorDirection =
  | 'left' | 'right' | 'up' | 'down'
  | 'lineStart' | 'lineEnd'
  | 'wordForward' | 'wordBackward'
  | 'paragraphPrev' | 'paragraphNext'
  | 'documentStart' | 'documentEnd'
  | 'pageUp' | 'pageDown';

/** What page motions need to know about the screen. */
export interface PageGeometry {
  readonly rowOffset: number;
  readonly screenRows: number;
}

export interface CursorState {
  cx: number;
  cy: number;
  tx: number;
}

export class CursorManager {
  private _cx = 0;
  private _cy = 0;
  private _tx = 0;
  private _mark: Position = { row: 0, col: 0 };
  private buffer: TextBuffer;
  private page: PageGeometry;

  constructor(buffer: TextBuffer, page: PageGeometry) {
    this.buffer = buffer;
    this.page = page;
  }

  get cx(): number { return this._cx; }
  get cy(): number { return this._cy; }
  get tx(): number { return this._tx; }

  /** Rendered column of the cursor, derived on every read. */
  get rx(): number {
    return toRendered(this.buffer.getRow(this._cy), this._cx);
  }

  get state(): CursorState {
    return { cx: this._cx, cy: this._cy, tx: this._tx };
  }

  get mark(): Position {
    return { ...this._mark };
  }

  /** Place the cursor and make its rendered column the new target. */
  setPosition(cx: number, cy: number): void {
    this._cx = cx;
    this._cy = cy;
    this._tx = toRendered(this.buffer.getRow(cy), cx);
  }

  setMark(): void {
    this._mark = { row: this._cy, col: this._cx };
  }

  setMarkAt(mark: Position): void {
    this._mark = { ...mark };
  }

  /**
   * Bring the cursor back inside the document: cy onto an existing row (0
   * for an empty document), cx into [0, row length]. The target column is
   * left alone.
   */
  clamp(): void {
    const last = this.buffer.lastRowIndex;
    if (this._cy > last) this._cy = Math.max(last, 0);
    if (this._cy < 0) this._cy = 0;
    const row = this.buffer.getRow(this._cy);
    const len = row ? row.length : 0;
    if (this._cx > len) this._cx = len;
    if (this._cx < 0) this._cx = 0;
  }

  /** Mark position clamped into the current document. */
  clampedMark(): Position {
    const last = Math.max(this.buffer.lastRowIndex, 0);
    const row = Math.min(Math.max(this._mark.row, 0), last);
    const line = this.buffer.getRow(row);
    const col = Math.min(Math.max(this._mark.col, 0), line ? line.length : 0);
    return { row, col };
  }

  move(direction: CursorDirection): void {
    switch (direction) {
      case 'left': this.moveLeft(); break;
      case 'right': this.moveRight(); break;
      case 'up':
        if (this._cy !== 0) this.moveToRow(this._cy - 1);
        break;
      case 'down':
        if (this._cy < this.buffer.lastRowIndex) this.moveToRow(this._cy + 1);
        break;
      case 'lineStart': this.setPosition(0, this._cy); break;
      case 'lineEnd': {
        const row = this.buffer.getRow(this._cy);
        if (row) this.setPosition(row.length, this._cy);
        break;
      }
      case 'wordForward': this.moveWordForward(); break;
      case 'wordBackward': this.moveWordBackward(); break;
      case 'paragraphPrev': this.moveParagraph(-1); break;
      case 'paragraphNext': this.moveParagraph(1); break;
      case 'documentStart': this.moveToRow(0); break;
      case 'documentEnd':
        if (this.buffer.numRows > 0) this.moveToRow(this.buffer.lastRowIndex);
        break;
      case 'pageUp': this.movePage(false); break;
      case 'pageDown': this.movePage(true); break;
    }
  }

  /** Character under the cursor: '\n' at a row end, '\0' past the document. */
  charAtCursor(): string {
    return this.charAt(this._cx, this._cy);
  }

  /** Character just before the cursor, crossing row boundaries. */
  charBeforeCursor(): string {
    let x = this._cx;
    let y = this._cy;
    if (x === 0 && y === 0) return '\0';
    if (x === 0) {
      y--;
      const row = this.buffer.getRow(y);
      x = row ? row.length : 0;
    } else {
      x--;
    }
    return this.charAt(x, y);
  }

  isAtDocumentEnd(): boolean {
    const row = this.buffer.getRow(this._cy);
    if (!row) return true;
    return this._cy >= this.buffer.lastRowIndex && this._cx >= row.length;
  }

  private charAt(x: number, y: number): string {
    const row = this.buffer.getRow(y);
    if (!row) return '\0';
    if (x === row.length) return '\n';
    return row.charAt(x);
  }

  private moveLeft(): void {
    if (this._cx !== 0) {
      this.setPosition(this._cx - 1, this._cy);
    } else if (this._cy > 0) {
      const prev = this.buffer.getRow(this._cy - 1);
      this.setPosition(prev ? prev.length : 0, this._cy - 1);
    }
  }

  private moveRight(): void {
    const row = this.buffer.getRow(this._cy);
    if (!row) return;
    if (this._cx < row.length) {
      this.setPosition(this._cx + 1, this._cy);
    } else if (this._cy !== this.buffer.lastRowIndex) {
      this.setPosition(0, this._cy + 1);
    }
  }

  /**
   * Change rows keeping the target column: cx becomes the logical column
   * under max(tx, rx).
   */
  private moveToRow(cy: number): void {
    const rx = this.rx;
    this._cy = cy;
    if (this.buffer.numRows === 0) return;
    this._cx = toLogical(this.buffer.getRow(cy), Math.max(this._tx, rx));
  }

  private moveWordForward(): void {
    while (!isWordChar(this.charAtCursor()) && !this.isAtDocumentEnd()) {
      this.moveRight();
    }
    if (!this.isAtDocumentEnd()) {
      while (isWordChar(this.charAtCursor())) this.moveRight();
    }
  }

  private moveWordBackward(): void {
    if (this._cx === 0 && this._cy === 0) return;
    while (!(isWordChar(this.charBeforeCursor()) || this.charBeforeCursor() === '\0')) {
      this.moveLeft();
    }
    while (isWordChar(this.charBeforeCursor())) this.moveLeft();
  }

  /** Skip blank rows, then non-blank rows, stopping at the document edge. */
  private moveParagraph(step: 1 | -1): void {
    const last = this.buffer.lastRowIndex;
    const edge = step > 0 ? last : 0;
    if (last < 0) return;
    if (step > 0 ? this._cy >= last : this._cy <= 0) return;

    let cy = this._cy + step;
    while (cy !== edge && this.isBlankRow(cy)) cy += step;
    while (cy !== edge && !this.isBlankRow(cy)) cy += step;
    this.moveToRow(cy);
  }

  private isBlankRow(cy: number): boolean {
    const row = this.buffer.getRow(cy);
    return row ? row.isBlank() : true;
  }

  /**
   * Jump to the top (or bottom) screen row, then move one full screen
   * further in the same direction.
   */
  private movePage(down: boolean): void {
    const last = this.buffer.lastRowIndex;
    if (last < 0) return;
    const target = down
      ? Math.min(this.page.rowOffset + this.page.screenRows - 1, last)
      : Math.min(this.page.rowOffset, last);
    this.moveToRow(target);

    for (let times = this.page.screenRows; times > 0; times--) {
      this.move(down ? 'down' : 'up');
    }
  }
}
