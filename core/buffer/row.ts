/**
 * A single document line with its derived display forms.
 *
 * Rows are immutable: every edit produces a new Row, so the rendered text
 * and highlight tags are always consistent with `raw`.
 */

import { highlightLine, type Highlight } from '../tokenizer/highlighter';
import type { SyntaxRuleset } from '../tokenizer/languages';

/** Expand tabs to spaces up to the next multiple of `tabStop`. */
export function renderRaw(raw: string, tabStop: number): string {
  let out = '';
  for (const ch of raw) {
    if (ch === '\t') {
      out += ' ';
      while (out.length % tabStop !== 0) out += ' ';
    } else {
      out += ch;
    }
  }
  return out;
}

export class Row {
  readonly raw: string;
  readonly rendered: string;
  readonly highlight: readonly Highlight[];
  readonly tabStop: number;

  constructor(raw: string, tabStop: number, syntax: SyntaxRuleset | null = null) {
    this.raw = raw;
    this.tabStop = tabStop;
    this.rendered = renderRaw(raw, tabStop);
    this.highlight = highlightLine(this.rendered, syntax);
  }

  /** Logical length (bytes of raw text). */
  get length(): number {
    return this.raw.length;
  }

  /** Rendered width in screen columns. */
  get renderedLength(): number {
    return this.rendered.length;
  }

  /** Character at logical column `cx`, or '' past the end. */
  charAt(cx: number): string {
    return this.raw.charAt(cx);
  }

  withText(raw: string, syntax: SyntaxRuleset | null): Row {
    return new Row(raw, this.tabStop, syntax);
  }

  /** Rendered column where leading indentation ends (tabs count a full stop). */
  indentWidth(): number {
    let indent = 0;
    for (const ch of this.raw) {
      if (ch === '\t') indent += this.tabStop;
      else if (ch === ' ') indent++;
      else break;
    }
    return indent;
  }

  /** True for an empty row or one holding only spaces and tabs. */
  isBlank(): boolean {
    for (const ch of this.raw) {
      if (ch !== ' ' && ch !== '\t') return false;
    }
    return true;
  }
}
