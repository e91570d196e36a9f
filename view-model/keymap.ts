/**
 * Modal key bindings: decoded key events to EditorCommands.
 *
 * Normal mode maps single keys to motions and actions ('g' waits for a
 * second 'g'). Insert mode types printable keys. Command and search mode
 * input is handled by the command-line editor, not here.
 */

import type { EditorCommand, EditorMode } from '../core/commands/command';
import type { CursorDirection } from '../core/cursor/cursor-manager';

export interface KeyEvent {
  /** Character for printable keys, otherwise a name such as 'ArrowLeft'. */
  key: string;
  code: string;
  ctrlKey: boolean;
  shiftKey: boolean;
  altKey: boolean;
  metaKey: boolean;
}

export type KeyResolution =
  | { kind: 'command'; command: EditorCommand }
  | { kind: 'pending' }
  | { kind: 'ignored' }
  | { kind: 'invalid'; message: string };

const move = (direction: CursorDirection): EditorCommand => ({ type: 'moveCursor', direction });

const ARROWS: Readonly<Partial<Record<string, CursorDirection>>> = {
  ArrowLeft: 'left',
  ArrowRight: 'right',
  ArrowUp: 'up',
  ArrowDown: 'down',
};

const NORMAL_BINDINGS: Readonly<Partial<Record<string, EditorCommand>>> = {
  'i': { type: 'changeMode', mode: 'insert' },
  'w': { type: 'deleteCurrent' },
  '`': { type: 'quit' },
  'U': move('pageUp'),
  'M': move('pageDown'),
  'a': move('lineStart'),
  ';': move('lineEnd'),
  'h': move('left'),
  'j': move('down'),
  'k': move('up'),
  'l': move('right'),
  'o': move('wordForward'),
  'n': move('wordBackward'),
  'u': move('paragraphPrev'),
  'm': move('paragraphNext'),
  'G': move('documentEnd'),
  ',': { type: 'openLineBelow' },
  'd': { type: 'setMark' },
  'f': { type: 'cut' },
  'c': { type: 'paste' },
  'b': { type: 'searchRepeat', direction: 'forward' },
  'B': { type: 'searchRepeat', direction: 'backward' },
  '/': { type: 'changeMode', mode: 'search' },
  'e': { type: 'undo' },
  'E': { type: 'redo' },
};

const ALT_BINDINGS: Readonly<Partial<Record<string, EditorCommand>>> = {
  'm': { type: 'changeMode', mode: 'command' },
  's': { type: 'save' },
};

/** Keys that do nothing in normal mode rather than being reported. */
const NORMAL_IGNORED = new Set(['Backspace', 'Enter', 'Escape']);

const command = (cmd: EditorCommand): KeyResolution => ({ kind: 'command', command: cmd });

export class ModalKeymap {
  private pendingPrefix: string | null = null;

  get pending(): string | null {
    return this.pendingPrefix;
  }

  resolve(mode: EditorMode, event: KeyEvent): KeyResolution {
    switch (mode) {
      case 'normal':
        return this.resolveNormal(event);
      case 'insert':
        return this.resolveInsert(event);
      case 'command':
      case 'search':
        return { kind: 'ignored' };
    }
  }

  private resolveNormal(event: KeyEvent): KeyResolution {
    if (this.pendingPrefix !== null) {
      const prefix = this.pendingPrefix;
      this.pendingPrefix = null;
      if (event.key === 'g') return command(move('documentStart'));
      if (event.key === 'Escape') return { kind: 'ignored' };
      return { kind: 'invalid', message: `invalid key '${prefix} ${event.key}' in normal mode` };
    }

    if (event.altKey) {
      const bound = ALT_BINDINGS[event.key];
      if (bound) return command(bound);
      return { kind: 'invalid', message: `invalid key 'Alt-${event.key}' in normal mode` };
    }

    const arrow = ARROWS[event.key];
    if (arrow) return command(move(arrow));

    const bound = NORMAL_BINDINGS[event.key];
    if (bound) return command(bound);

    if (event.key === 'g') {
      this.pendingPrefix = 'g';
      return { kind: 'pending' };
    }
    if (NORMAL_IGNORED.has(event.key)) return { kind: 'ignored' };
    return { kind: 'invalid', message: `invalid key '${event.key}' in normal mode` };
  }

  private resolveInsert(event: KeyEvent): KeyResolution {
    switch (event.key) {
      case 'Backspace': return command({ type: 'deleteLeft' });
      case 'Enter': return command({ type: 'insertNewline' });
      case 'Tab': return command({ type: 'insertIndent' });
      case 'Escape': return command({ type: 'changeMode', mode: 'normal' });
    }

    const arrow = ARROWS[event.key];
    if (arrow) return command(move(arrow));

    if (event.key.length === 1 && !event.ctrlKey && !event.altKey && !event.metaKey) {
      return command({ type: 'insertChar', char: event.key });
    }
    return { kind: 'invalid', message: `non-printable key '${event.key}' in insert mode` };
  }
}
