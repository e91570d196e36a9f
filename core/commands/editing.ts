/**
 * Editing primitives: insert, newline, indent, delete left/current,
 * open line below.
 *
 * Each primitive takes a `record` flag. Commands record; replays from the
 * undo journal and composite actions (paste, auto-indent) do not.
 */

import type { TextBuffer } from '../buffer/text-buffer';
import type { CursorManager } from '../cursor/cursor-manager';
import type { UndoManager } from '../history/undo-manager';
import type { EditorOptions } from '../config/options';
import type { DebugLog } from '../debug';

export interface EditContext {
  readonly buffer: TextBuffer;
  readonly cursor: CursorManager;
  readonly history: UndoManager;
  readonly options: Pick<EditorOptions, 'indentWithSpaces'>;
  readonly log: DebugLog;
}

export function insertChar(ctx: EditContext, ch: string, record: boolean): void {
  if (ch === '\n') {
    insertNewline(ctx, record, false);
    return;
  }
  const { buffer, cursor } = ctx;
  if (record) {
    ctx.history.push({ kind: 'insertChar', payload: ch, originX: cursor.cx, originY: cursor.cy });
  }
  buffer.insertEmptyRowIfDocumentEmpty();
  buffer.rowInsertChar(cursor.cy, cursor.cx, ch);
  cursor.setPosition(cursor.cx + 1, cursor.cy);
}

/**
 * Split the cursor row at the cursor (a cursor at column 0 inserts an
 * empty row above instead) and move to the start of the new row.
 */
export function insertNewline(ctx: EditContext, record: boolean, autoindent: boolean): void {
  const { buffer, cursor } = ctx;
  const originX = cursor.cx;
  const originY = cursor.cy;

  buffer.insertEmptyRowIfDocumentEmpty();
  if (cursor.cx === 0) {
    buffer.insertRow(cursor.cy, '');
  } else {
    const row = buffer.getRow(cursor.cy);
    const raw = row ? row.raw : '';
    buffer.insertRow(cursor.cy + 1, raw.slice(cursor.cx));
    buffer.replaceRow(cursor.cy, raw.slice(0, cursor.cx));
  }
  cursor.setPosition(0, cursor.cy + 1);

  const indent = autoindent ? autoIndent(ctx) : '';
  if (record) {
    ctx.history.push({ kind: 'insertNewline', payload: '\n' + indent, originX, originY });
  }
}

/**
 * Indentation to give a fresh row: the indent of the nearest non-empty row
 * above, as whole tab stops (tabs or spaces) plus leftover spaces.
 */
export function computeAutoIndent(ctx: EditContext): string {
  const { buffer, cursor } = ctx;
  for (let i = cursor.cy - 1; i >= 0; i--) {
    const row = buffer.getRow(i);
    if (!row || row.length === 0) continue;

    const width = row.indentWidth();
    const tabStop = buffer.getTabStop();
    const stop = ctx.options.indentWithSpaces ? ' '.repeat(tabStop) : '\t';
    return stop.repeat(Math.floor(width / tabStop)) + ' '.repeat(width % tabStop);
  }
  return '';
}

/** Insert the auto-indent at the start of the cursor row, unrecorded. */
function autoIndent(ctx: EditContext): string {
  if (ctx.cursor.cx !== 0) return '';
  const indent = computeAutoIndent(ctx);
  for (const ch of indent) insertChar(ctx, ch, false);
  return indent;
}

/** Tab key: spaces up to the next tab stop, or a literal tab. */
export function insertIndent(ctx: EditContext, record: boolean): void {
  if (!ctx.options.indentWithSpaces) {
    insertChar(ctx, '\t', record);
    return;
  }
  const tabStop = ctx.buffer.getTabStop();
  const spaces = tabStop - (ctx.cursor.rx % tabStop);
  for (let i = 0; i < spaces; i++) insertChar(ctx, ' ', record);
}

/**
 * Backspace. At column 0 the row joins the previous one.
 * @returns false when there is nothing to the left of the cursor.
 */
export function deleteLeft(ctx: EditContext, record: boolean): boolean {
  const { buffer, cursor } = ctx;
  if (cursor.cx === 0 && cursor.cy === 0) return false;
  const row = buffer.getRow(cursor.cy);
  if (!row) return false;

  if (cursor.cx > 0) {
    const ch = row.charAt(cursor.cx - 1);
    buffer.rowDeleteRange(cursor.cy, cursor.cx - 1, 1);
    cursor.setPosition(cursor.cx - 1, cursor.cy);
    if (record) {
      ctx.history.push({ kind: 'deleteLeftChar', payload: ch, originX: cursor.cx, originY: cursor.cy });
    }
  } else {
    const prev = buffer.getRow(cursor.cy - 1);
    cursor.setPosition(prev ? prev.length : 0, cursor.cy - 1);
    if (record) {
      ctx.history.push({ kind: 'deleteLeftChar', payload: '\n', originX: cursor.cx, originY: cursor.cy });
    }
    buffer.rowAppend(cursor.cy, row.raw);
    buffer.deleteRow(cursor.cy + 1);
  }

  buffer.deleteEmptyRowIfDocumentEmpty();
  return true;
}

/**
 * Delete under the cursor. At a row end the next row joins this one.
 * @returns false when the cursor is at the end of the document.
 */
export function deleteCurrent(ctx: EditContext, record: boolean): boolean {
  const { buffer, cursor } = ctx;
  const row = buffer.getRow(cursor.cy);
  if (!row) return false;

  let deleted = false;
  if (cursor.cx >= row.length) {
    const next = buffer.getRow(cursor.cy + 1);
    if (next) {
      if (record) {
        ctx.history.push({ kind: 'deleteCurrentChar', payload: '\n', originX: cursor.cx, originY: cursor.cy });
      }
      buffer.rowAppend(cursor.cy, next.raw);
      buffer.deleteRow(cursor.cy + 1);
      deleted = true;
    }
  } else {
    if (record) {
      ctx.history.push({
        kind: 'deleteCurrentChar',
        payload: row.charAt(cursor.cx),
        originX: cursor.cx,
        originY: cursor.cy,
      });
    }
    buffer.rowDeleteRange(cursor.cy, cursor.cx, 1);
    deleted = true;
  }

  if (deleted) buffer.deleteEmptyRowIfDocumentEmpty();
  return deleted;
}

/** Insert an auto-indented empty row below the cursor row and move onto it. */
export function openLineBelow(ctx: EditContext, record: boolean): void {
  const { buffer, cursor } = ctx;
  if (record) {
    ctx.history.push({ kind: 'openLineBelow', payload: '', originX: cursor.cx, originY: cursor.cy });
  }
  buffer.insertEmptyRowIfDocumentEmpty();
  buffer.insertRow(cursor.cy + 1, '');
  cursor.setPosition(0, cursor.cy + 1);
  autoIndent(ctx);
}
