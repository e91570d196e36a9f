/**
 * Command-line input state for command and search mode: the text being
 * typed, the input cursor, and the horizontal scroll offset.
 */

export class CommandLineEditor {
  private _text = '';
  private _cursor = 0;
  private _offset = 0;

  get text(): string { return this._text; }
  get cursor(): number { return this._cursor; }
  get offset(): number { return this._offset; }
  get isEmpty(): boolean { return this._text.length === 0; }

  clear(): void {
    this._text = '';
    this._cursor = 0;
    this._offset = 0;
  }

  insert(ch: string): void {
    this._text = this._text.slice(0, this._cursor) + ch + this._text.slice(this._cursor);
    this._cursor += ch.length;
  }

  /**
   * Delete the character left of the input cursor.
   * @returns false when there was nothing to delete.
   */
  backspace(): boolean {
    if (this._cursor === 0) return false;
    this._text = this._text.slice(0, this._cursor - 1) + this._text.slice(this._cursor);
    this._cursor--;
    return true;
  }

  moveLeft(): void {
    if (this._cursor > 0) this._cursor--;
  }

  moveRight(): void {
    if (this._cursor < this._text.length) this._cursor++;
  }

  moveHome(): void {
    this._cursor = 0;
  }

  moveEnd(): void {
    this._cursor = this._text.length;
  }

  /** Keep the input cursor visible in `width` columns (one goes to the prompt). */
  scroll(width: number): void {
    const visible = Math.max(1, width - 1);
    if (this._cursor < this._offset) this._offset = this._cursor;
    if (this._cursor >= this._offset + visible) this._offset = this._cursor - visible + 1;
  }

  /** Visible slice of the input for a command line `width` columns wide. */
  visibleText(width: number): string {
    return this._text.slice(this._offset, this._offset + Math.max(1, width - 1));
  }
}
