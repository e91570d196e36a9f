/**
 * Undo entry types and the primitives their inversion rules need.
 */

export type UndoKind =
  | 'insertChar'
  | 'insertNewline'
  | 'deleteLeftChar'
  | 'deleteCurrentChar'
  | 'cutRegion'
  | 'paste'
  | 'openLineBelow';

export interface UndoEntry {
  readonly kind: UndoKind;
  /** Data needed to invert the action (inserted or removed text). */
  readonly payload: string;
  /** Cursor column the action started from. */
  readonly originX: number;
  /** Cursor row the action started from. */
  readonly originY: number;
}

/**
 * The editing surface an UndoManager replays entries against. None of
 * these calls may record history.
 */
export interface UndoTarget {
  setCursor(cx: number, cy: number): void;
  /** Insert at the cursor and advance it; '\n' splits the row. */
  insertChar(ch: string): void;
  /** Delete the character under the cursor, joining rows at a row end. */
  deleteCurrentChar(): void;
  /** Remove a row; a lone empty row left behind is the placeholder and goes too. */
  deleteRow(at: number): void;
  /** Insert an auto-indented empty row below the cursor and move onto it. */
  openLineBelow(): void;
}

function insertText(target: UndoTarget, text: string): void {
  for (const ch of text) target.insertChar(ch);
}

function deleteChars(target: UndoTarget, count: number): void {
  for (let i = 0; i < count; i++) target.deleteCurrentChar();
}

/** Apply the inverse of an entry. */
export function revertEntry(entry: UndoEntry, target: UndoTarget): void {
  const { originX: x, originY: y, payload } = entry;
  target.setCursor(x, y);
  switch (entry.kind) {
    case 'insertChar':
    case 'insertNewline':
    case 'paste':
      deleteChars(target, payload.length);
      break;
    case 'deleteLeftChar':
    case 'cutRegion':
      insertText(target, payload);
      break;
    case 'deleteCurrentChar':
      insertText(target, payload);
      target.setCursor(x, y);
      break;
    case 'openLineBelow':
      target.deleteRow(y + 1);
      break;
  }
}

/** Re-apply an entry forward. */
export function replayEntry(entry: UndoEntry, target: UndoTarget): void {
  const { originX: x, originY: y, payload } = entry;
  target.setCursor(x, y);
  switch (entry.kind) {
    case 'insertChar':
    case 'insertNewline':
    case 'paste':
      insertText(target, payload);
      break;
    case 'deleteLeftChar':
    case 'deleteCurrentChar':
    case 'cutRegion':
      deleteChars(target, payload.length);
      break;
    case 'openLineBelow':
      target.openLineBelow();
      break;
  }
}
