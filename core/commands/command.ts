/**
 * The closed set of commands the engine accepts. Key decoding happens in
 * the view model; everything reaching the core is one of these variants.
 */

import type { CursorDirection } from '../cursor/cursor-manager';
import type { SearchDirection } from '../search/incremental';

export type EditorMode = 'normal' | 'insert' | 'command' | 'search';

export type EditorCommand =
  | { type: 'moveCursor'; direction: CursorDirection }
  | { type: 'insertChar'; char: string }
  | { type: 'insertNewline' }
  | { type: 'insertIndent' }
  | { type: 'deleteLeft' }
  | { type: 'deleteCurrent' }
  | { type: 'setMark' }
  | { type: 'cut' }
  | { type: 'paste' }
  | { type: 'openLineBelow' }
  | { type: 'save' }
  | { type: 'undo' }
  | { type: 'redo' }
  | { type: 'changeMode'; mode: EditorMode }
  | { type: 'searchInput'; query: string }
  | { type: 'searchCommit'; query: string }
  | { type: 'searchRepeat'; direction: SearchDirection }
  | { type: 'runCommandLine'; line: string }
  | { type: 'quit' }
  | { type: 'forceQuit' }
  | { type: 'resize'; rows: number; cols: number };

export type EditorCommandType = EditorCommand['type'];

/** Commands after which the search highlight span stays on screen. */
export const SPAN_KEEPING_COMMANDS: ReadonlySet<EditorCommandType> = new Set<EditorCommandType>([
  'searchInput',
  'searchCommit',
  'searchRepeat',
  'resize',
]);

/** Printable single-byte characters accepted in insert mode. */
export function isPrintable(ch: string): boolean {
  if (ch.length !== 1) return false;
  const code = ch.charCodeAt(0);
  return code >= 32 && code <= 126;
}
