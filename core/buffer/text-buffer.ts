/**
 * Row-based TextBuffer.
 *
 * This is the public interface for all text mutation. Rows are addressed by
 * index; each mutation replaces the affected Row (re-rendering and
 * re-highlighting it) and marks the buffer dirty.
 */

import { Row } from './row';
import type { SyntaxRuleset } from '../tokenizer/languages';

export interface TextBufferOptions {
  tabStop?: number;
  syntax?: SyntaxRuleset | null;
}

export class TextBuffer {
  private rows: Row[] = [];
  private syntax: SyntaxRuleset | null;
  private tabStop: number;
  private _dirty = false;

  constructor(lines: readonly string[] = [], options: TextBufferOptions = {}) {
    this.tabStop = options.tabStop ?? 4;
    this.syntax = options.syntax ?? null;
    this.load(lines);
  }

  /** Replace the whole content. The buffer is clean afterwards. */
  load(lines: readonly string[]): void {
    this.rows = lines.map(line => this.makeRow(line));
    this._dirty = false;
  }

  get numRows(): number {
    return this.rows.length;
  }

  /** Index of the last row; -1 for an empty document. */
  get lastRowIndex(): number {
    return this.rows.length - 1;
  }

  get dirty(): boolean {
    return this._dirty;
  }

  markDirty(): void {
    this._dirty = true;
  }

  markClean(): void {
    this._dirty = false;
  }

  getRow(at: number): Row | null {
    if (at < 0 || at >= this.rows.length) return null;
    return this.rows[at];
  }

  /** Raw text of every row, in document order. */
  lines(): string[] {
    return this.rows.map(row => row.raw);
  }

  getSyntax(): SyntaxRuleset | null {
    return this.syntax;
  }

  getTabStop(): number {
    return this.tabStop;
  }

  /** Switch the language ruleset and re-highlight every row. */
  setSyntax(syntax: SyntaxRuleset | null): void {
    this.syntax = syntax;
    this.rows = this.rows.map(row => row.withText(row.raw, syntax));
  }

  /** Change the tab stop and re-render every row. */
  setTabStop(tabStop: number): void {
    this.tabStop = tabStop;
    this.rows = this.rows.map(row => this.makeRow(row.raw));
  }

  /**
   * Insert a new row before index `at`.
   * @returns The inserted row, or null when `at` is outside [0, numRows].
   */
  insertRow(at: number, text: string): Row | null {
    if (at < 0 || at > this.rows.length) return null;
    const row = this.makeRow(text);
    this.rows.splice(at, 0, row);
    this._dirty = true;
    return row;
  }

  /**
   * Remove the row at `at`.
   * @returns The removed raw text, or '' when out of range.
   */
  deleteRow(at: number): string {
    if (at < 0 || at >= this.rows.length) return '';
    const [removed] = this.rows.splice(at, 1);
    this._dirty = true;
    return removed.raw;
  }

  /** Replace the raw text of a row. */
  replaceRow(at: number, text: string): Row | null {
    const row = this.getRow(at);
    if (!row) return null;
    const next = row.withText(text, this.syntax);
    this.rows[at] = next;
    this._dirty = true;
    return next;
  }

  rowInsertChar(at: number, col: number, ch: string): Row | null {
    return this.rowInsertText(at, col, ch);
  }

  /** Splice text into a row; a column outside the row inserts at its end. */
  rowInsertText(at: number, col: number, text: string): Row | null {
    const row = this.getRow(at);
    if (!row) return null;
    const pos = col < 0 || col > row.length ? row.length : col;
    return this.replaceRow(at, row.raw.slice(0, pos) + text + row.raw.slice(pos));
  }

  /**
   * Delete `len` characters starting at `col`.
   * @returns The deleted text; '' with no change for an invalid or empty range.
   */
  rowDeleteRange(at: number, col: number, len: number): string {
    const row = this.getRow(at);
    if (!row) return '';
    if (col < 0 || len <= 0 || col + len > row.length) return '';
    const deleted = row.raw.slice(col, col + len);
    this.replaceRow(at, row.raw.slice(0, col) + row.raw.slice(col + len));
    return deleted;
  }

  rowAppend(at: number, text: string): Row | null {
    const row = this.getRow(at);
    if (!row) return null;
    return this.replaceRow(at, row.raw + text);
  }

  /** Add the placeholder row editing needs in an empty document. */
  insertEmptyRowIfDocumentEmpty(): void {
    if (this.rows.length === 0) this.insertRow(0, '');
  }

  /** Drop the placeholder row once it is the sole, empty row. */
  deleteEmptyRowIfDocumentEmpty(): void {
    if (this.rows.length === 1 && this.rows[0].length === 0) this.deleteRow(0);
  }

  private makeRow(text: string): Row {
    return new Row(text, this.tabStop, this.syntax);
  }
}
