/**
 * Viewport: the window of rows and rendered columns shown on screen.
 *
 * Offsets follow the cursor lazily. A point is considered visible while it
 * stays `margin` rows/columns away from the bottom and right edges.
 */

export interface VisibleRange {
  /** First row to render (inclusive). */
  startLine: number;
  /** Last row to render (exclusive). */
  endLine: number;
}

export class ViewportManager {
  private _screenRows: number;
  private _screenCols: number;
  private _rowOffset = 0;
  private _colOffset = 0;
  private readonly margin: number;

  constructor(screenRows: number, screenCols: number, margin: number = 5) {
    this._screenRows = screenRows;
    this._screenCols = screenCols;
    this.margin = margin;
  }

  /** Update the text area dimensions (call on resize). */
  update(screenRows: number, screenCols: number): void {
    this._screenRows = screenRows;
    this._screenCols = screenCols;
  }

  get screenRows(): number { return this._screenRows; }
  get screenCols(): number { return this._screenCols; }
  get rowOffset(): number { return this._rowOffset; }
  get colOffset(): number { return this._colOffset; }

  /**
   * Scroll the minimum amount that brings rendered column `x` of row `y`
   * inside the margin-reduced window.
   */
  scrollTo(x: number, y: number): void {
    const rows = Math.max(1, this._screenRows - this.margin);
    const cols = Math.max(1, this._screenCols - this.margin);

    if (y < this._rowOffset) this._rowOffset = y;
    if (y >= this._rowOffset + rows) this._rowOffset = y - rows + 1;
    if (x < this._colOffset) this._colOffset = x;
    if (x >= this._colOffset + cols) this._colOffset = x - cols + 1;
  }

  /** Rows of a document with `totalRows` rows that fall on screen. */
  getVisibleRange(totalRows: number): VisibleRange {
    const startLine = Math.min(this._rowOffset, totalRows);
    const endLine = Math.min(totalRows, this._rowOffset + this._screenRows);
    return { startLine, endLine };
  }
}
