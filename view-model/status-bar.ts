/**
 * Status bar text: dirty flag, mode and path on the left, language and
 * cursor row on the right.
 */

import type { EditorMode } from '../core/commands/command';

export interface StatusFields {
  dirty: boolean;
  mode: EditorMode;
  path: string | null;
  language: string | null;
  /** Zero-based cursor row. */
  row: number;
  numRows: number;
}

export function formatStatusLeft(fields: StatusFields): string {
  const dirty = fields.dirty ? '*' : '-';
  const mode = fields.mode === 'insert' ? 'I' : 'N';
  const path = fields.path !== null && fields.path !== '' ? fields.path : '[No name]';
  return `[${dirty}${mode}] ${path}`;
}

export function formatStatusRight(fields: StatusFields): string {
  return `${fields.language ?? 'none'} ${fields.row + 1}/${fields.numRows} `;
}

/**
 * Lay out the status bar in exactly `width` columns. The right part is
 * dropped when it does not fit beside the left part.
 */
export function formatStatusBar(fields: StatusFields, width: number): string {
  const left = formatStatusLeft(fields).slice(0, width);
  const right = formatStatusRight(fields);
  const gap = width - left.length - right.length;
  if (gap < 0) return left.padEnd(width, ' ');
  return left + ' '.repeat(gap) + right;
}
