/**
 * Main ViewModel: bridges core state to rendering state.
 *
 * The EditorViewModel routes key events through the modal keymap and the
 * command-line editor into EditorCore, and exposes a read-only snapshot
 * for the terminal renderer. Listeners are notified after every key.
 */

import { EditorCore } from '../core/editor/editor-core';
import type { StatusMessage } from '../core/editor/editor-core';
import type { EditorCommand, EditorMode } from '../core/commands/command';
import type { Position } from '../core/cursor/selection';
import type { HighlightSpan } from '../core/search/incremental';
import { CommandLineEditor } from './command-line';
import { ModalKeymap, type KeyEvent } from './keymap';
import { computeRenderedLines, type RenderedLine } from './line-layout';
import { formatStatusBar, type StatusFields } from './status-bar';
import { DARK_THEME, type EditorTheme } from './theme';

export const HELP_MESSAGE = 'HELP: Alt-s save, ` quit';

export interface EditorSnapshot {
  lines: RenderedLine[];
  /** Cursor position on screen (offsets applied, rendered columns). */
  cursorScreen: { row: number; col: number };
  /** Cursor in document coordinates: logical column cx, row cy. */
  cursor: { cx: number; cy: number; rx: number };
  mark: Position;
  searchSpan: HighlightSpan | null;
  rowOffset: number;
  colOffset: number;
  status: StatusFields;
  statusBar: string;
  /** Command-line row: the prompt and input in command/search mode, else the message. */
  commandLine: string;
  message: StatusMessage | null;
}

type ChangeListener = () => void;

export class EditorViewModel {
  readonly core: EditorCore;
  readonly keymap: ModalKeymap;
  readonly commandLine: CommandLineEditor;

  private _theme: EditorTheme;
  private _listeners: ChangeListener[] = [];

  constructor(core: EditorCore, theme?: EditorTheme) {
    this.core = core;
    this._theme = theme ?? DARK_THEME;
    this.keymap = new ModalKeymap();
    this.commandLine = new CommandLineEditor();
    this.core.setStatus(HELP_MESSAGE, 'info');
  }

  get theme(): EditorTheme {
    return this._theme;
  }

  setTheme(theme: EditorTheme): void {
    this._theme = theme;
    this.notifyChange();
  }

  get mode(): EditorMode {
    return this.core.mode;
  }

  /** Subscribe to state changes. */
  onChange(listener: ChangeListener): () => void {
    this._listeners.push(listener);
    return () => {
      const idx = this._listeners.indexOf(listener);
      if (idx !== -1) this._listeners.splice(idx, 1);
    };
  }

  private notifyChange(): void {
    for (const listener of this._listeners) listener();
  }

  // === Computed State ===

  get visibleLines(): RenderedLine[] {
    const { startLine, endLine } = this.core.viewport.getVisibleRange(this.core.buffer.numRows);
    return computeRenderedLines(this.core.buffer, startLine, endLine, this._theme, this.core.highlightSpan);
  }

  get statusFields(): StatusFields {
    return {
      dirty: this.core.dirty,
      mode: this.core.mode,
      path: this.core.path,
      language: this.core.document.languageName,
      row: this.core.cursor.cy,
      numRows: this.core.buffer.numRows,
    };
  }

  snapshot(): EditorSnapshot {
    const { viewport, cursor } = this.core;
    const status = this.statusFields;
    const rx = cursor.rx;
    return {
      lines: this.visibleLines,
      cursorScreen: { row: cursor.cy - viewport.rowOffset, col: rx - viewport.colOffset },
      cursor: { cx: cursor.cx, cy: cursor.cy, rx },
      mark: this.core.mark,
      searchSpan: this.core.highlightSpan,
      rowOffset: viewport.rowOffset,
      colOffset: viewport.colOffset,
      status,
      statusBar: formatStatusBar(status, viewport.screenCols),
      commandLine: this.commandLineText(),
      message: this.core.status,
    };
  }

  // === Event Handlers ===

  /** Execute a command and notify listeners. */
  executeCommand(command: EditorCommand): void {
    const before = this.core.mode;
    this.core.execute(command);
    if (this.core.mode !== before) this.commandLine.clear();
    this.notifyChange();
  }

  /** Handle keyboard input. */
  onKeyDown(event: KeyEvent): void {
    this.core.log.log(`key ${event.altKey ? 'Alt-' : ''}${event.ctrlKey ? 'Ctrl-' : ''}${event.key}`);
    const mode = this.core.mode;
    if (mode === 'command' || mode === 'search') {
      this.onCommandLineKey(mode, event);
      return;
    }

    const resolution = this.keymap.resolve(mode, event);
    switch (resolution.kind) {
      case 'command':
        this.executeCommand(resolution.command);
        return;
      case 'invalid':
        this.core.setStatus(resolution.message, 'error');
        break;
      case 'pending':
      case 'ignored':
        break;
    }
    this.notifyChange();
  }

  /** Handle resize of the text area. */
  onResize(rows: number, cols: number): void {
    this.executeCommand({ type: 'resize', rows, cols });
  }

  // === Private ===

  private onCommandLineKey(mode: 'command' | 'search', event: KeyEvent): void {
    const line = this.commandLine;
    const key = event.key;

    if (key === 'Enter') {
      const text = line.text;
      line.clear();
      this.executeCommand(mode === 'command'
        ? { type: 'runCommandLine', line: text }
        : { type: 'searchCommit', query: text });
      return;
    }
    if (key === 'Escape') {
      this.executeCommand({ type: 'changeMode', mode: 'normal' });
      return;
    }
    if (key === 'Backspace') {
      if (!line.backspace() && line.isEmpty) {
        this.executeCommand({ type: 'changeMode', mode: 'normal' });
        return;
      }
      this.afterCommandLineEdit(mode);
      return;
    }

    if (event.ctrlKey && key === 'h') line.moveLeft();
    else if (event.ctrlKey && key === 'l') line.moveRight();
    else if (event.altKey && key === 'ArrowLeft') line.moveHome();
    else if (event.altKey && key === 'ArrowRight') line.moveEnd();
    else if (key.length === 1 && !event.ctrlKey && !event.altKey && !event.metaKey) {
      line.insert(key);
      this.afterCommandLineEdit(mode);
      return;
    }

    line.scroll(this.core.viewport.screenCols);
    this.notifyChange();
  }

  /** Search mode re-runs the incremental search on every edit of the query. */
  private afterCommandLineEdit(mode: 'command' | 'search'): void {
    this.commandLine.scroll(this.core.viewport.screenCols);
    if (mode === 'search') {
      this.executeCommand({ type: 'searchInput', query: this.commandLine.text });
      return;
    }
    this.notifyChange();
  }

  private commandLineText(): string {
    const width = this.core.viewport.screenCols;
    const mode = this.core.mode;
    if (mode === 'command' || mode === 'search') {
      const prompt = mode === 'command' ? ':' : '/';
      return prompt + this.commandLine.visibleText(width);
    }
    const message = this.core.status;
    return message ? message.text.slice(0, width) : '';
  }
}
