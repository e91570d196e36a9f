/**
 * EditorDocument: path, buffer, language ruleset, dirty state.
 *
 * Wraps a TextBuffer with the file metadata the status bar and save
 * command need.
 */

import { TextBuffer } from '../buffer/text-buffer';
import type { LanguageRegistry, SyntaxRuleset } from '../tokenizer/languages';

const TRAILING_WHITESPACE = /[ \t\n\r\f\v]+$/;

/**
 * Split file content into rows. Line endings are normalized to \n and a
 * final newline does not produce an extra empty row.
 */
export function splitLines(content: string): string[] {
  const normalized = content.replace(/\r\n/g, '\n').replace(/\r/g, '\n');
  if (normalized.length === 0) return [];
  const lines = normalized.split('\n');
  if (lines[lines.length - 1] === '') lines.pop();
  return lines;
}

export class EditorDocument {
  readonly buffer: TextBuffer;
  private _path: string | null = null;
  private languages: LanguageRegistry;

  constructor(buffer: TextBuffer, languages: LanguageRegistry, path: string | null = null) {
    this.buffer = buffer;
    this.languages = languages;
    if (path !== null) this.setPath(path);
  }

  get path(): string | null {
    return this._path;
  }

  get syntax(): SyntaxRuleset | null {
    return this.buffer.getSyntax();
  }

  /** Language name for the status bar, or null without a ruleset. */
  get languageName(): string | null {
    return this.syntax?.name ?? null;
  }

  get isDirty(): boolean {
    return this.buffer.dirty;
  }

  /** Change the path and re-highlight everything with its language. */
  setPath(path: string): void {
    this._path = path;
    this.buffer.setSyntax(this.languages.findByPath(path));
  }

  /**
   * Text written on save: each row with trailing whitespace removed,
   * terminated by a newline.
   */
  toText(): string {
    return this.buffer.lines().map(line => line.replace(TRAILING_WHITESPACE, '') + '\n').join('');
  }

  markSaved(): void {
    this.buffer.markClean();
  }
}
