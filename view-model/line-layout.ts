/**
 * Compute rendered lines: colored tokens and decorations for visible rows.
 */

import type { TextBuffer } from '../core/buffer/text-buffer';
import type { Highlight } from '../core/tokenizer/highlighter';
import type { HighlightSpan } from '../core/search/incremental';
import { highlightToTag, resolveTagColor, resolveTagStyle, type FontStyle } from '../core/tokenizer/token-theme';
import type { EditorTheme } from './theme';

export interface LineToken {
  startColumn: number;
  endColumn: number;
  highlight: Highlight;
  color: string;
  fontStyle: FontStyle;
}

export interface LineDecoration {
  startColumn: number;
  endColumn: number;
  type: 'search' | 'control';
  color: string;
}

export interface RenderedLine {
  lineNumber: number;
  /** Tab-expanded row text. */
  content: string;
  highlight: readonly Highlight[];
  tokens: LineToken[];
  decorations: LineDecoration[];
}

/** Group a row's highlight tags into runs with theme colors. */
export function computeTokens(highlight: readonly Highlight[], theme: EditorTheme): LineToken[] {
  const tokens: LineToken[] = [];
  let start = 0;
  for (let i = 1; i <= highlight.length; i++) {
    if (i < highlight.length && highlight[i] === highlight[start]) continue;
    const tag = highlightToTag(highlight[start]);
    tokens.push({
      startColumn: start,
      endColumn: i,
      highlight: highlight[start],
      color: resolveTagColor(tag, theme.tokens),
      fontStyle: resolveTagStyle(tag),
    });
    start = i;
  }
  return tokens;
}

function isControl(ch: string): boolean {
  const code = ch.charCodeAt(0);
  return code < 32 || code === 127;
}

/**
 * Decorations for one line: the part of the search span on it, and every
 * control character (drawn inverted as ^X).
 */
export function computeDecorations(
  content: string,
  lineNumber: number,
  span: HighlightSpan | null,
  theme: EditorTheme,
): LineDecoration[] {
  const decorations: LineDecoration[] = [];
  if (span && lineNumber >= span.startRow && lineNumber <= span.endRow) {
    const startColumn = lineNumber === span.startRow ? span.startCol : 0;
    const endColumn = lineNumber === span.endRow ? span.endCol : content.length;
    decorations.push({ startColumn, endColumn, type: 'search', color: theme.searchHighlightBackground });
  }
  for (let i = 0; i < content.length; i++) {
    if (isControl(content[i])) {
      decorations.push({ startColumn: i, endColumn: i + 1, type: 'control', color: theme.controlCharForeground });
    }
  }
  return decorations;
}

/**
 * Compute rendered lines for a range of rows [startLine, endLine).
 */
export function computeRenderedLines(
  buffer: TextBuffer,
  startLine: number,
  endLine: number,
  theme: EditorTheme,
  span: HighlightSpan | null = null,
): RenderedLine[] {
  const lines: RenderedLine[] = [];
  for (let lineNumber = startLine; lineNumber < endLine; lineNumber++) {
    const row = buffer.getRow(lineNumber);
    if (!row) break;
    lines.push({
      lineNumber,
      content: row.rendered,
      highlight: row.highlight,
      tokens: computeTokens(row.highlight, theme),
      decorations: computeDecorations(row.rendered, lineNumber, span, theme),
    });
  }
  return lines;
}
