/**
 * EditorCore: the single owner of all editing state.
 *
 * Holds the document, cursor and mark, undo journal, viewport, search
 * state, mode and status message, and applies EditorCommands to them.
 * `execute` never throws; failures become status messages.
 */

import { TextBuffer } from '../buffer/text-buffer';
import { CursorManager } from '../cursor/cursor-manager';
import type { Position } from '../cursor/selection';
import { UndoManager } from '../history/undo-manager';
import type { UndoTarget } from '../history/operation';
import { ViewportManager } from '../viewport/viewport-manager';
import { IncrementalSearch, type HighlightSpan, type SearchDirection } from '../search/incremental';
import { searchBackward, searchForward } from '../search/search-engine';
import { LanguageRegistry } from '../tokenizer/languages';
import { EditorDocument } from '../document/document';
import { FileSystemPersistence, type Persistence } from '../document/persistence';
import {
  SPAN_KEEPING_COMMANDS,
  isPrintable,
  type EditorCommand,
  type EditorMode,
} from '../commands/command';
import {
  deleteCurrent,
  deleteLeft,
  insertChar,
  insertIndent,
  insertNewline,
  openLineBelow,
  type EditContext,
} from '../commands/editing';
import { cutRegion, paste, InternalClipboard, type Clipboard } from '../commands/clipboard';
import { CommandRegistry, registerBuiltinCommands, type CommandLineHost } from '../commands/registry';
import { resolveOptions, type EditorOptions } from '../config/options';
import { DebugLog } from '../debug';
import { EditorFatalError, getErrorMessage, isNodeError } from '../errors';

export type StatusStyle = 'info' | 'error';

export interface StatusMessage {
  text: string;
  style: StatusStyle;
}

export interface EditorCoreInit {
  /** Initial rows. */
  lines?: readonly string[];
  path?: string | null;
  options?: Partial<EditorOptions>;
  clipboard?: Clipboard;
  persistence?: Persistence;
  languages?: LanguageRegistry;
  commands?: CommandRegistry;
}

export class EditorCore {
  readonly options: EditorOptions;
  readonly document: EditorDocument;
  readonly cursor: CursorManager;
  readonly history: UndoManager;
  readonly viewport: ViewportManager;
  readonly search: IncrementalSearch;
  readonly log: DebugLog;

  private readonly clipboard: Clipboard;
  private readonly persistence: Persistence;
  private readonly commands: CommandRegistry;
  private readonly ctx: EditContext;
  private readonly undoTarget: UndoTarget;
  private readonly commandLineHost: CommandLineHost;

  private _mode: EditorMode = 'normal';
  private _status: StatusMessage | null = null;
  private quitTimes: number;
  private _quitRequested = false;

  constructor(init: EditorCoreInit = {}) {
    this.options = resolveOptions(init.options);
    this.log = new DebugLog(this.options.debugLogPath);
    this.clipboard = init.clipboard ?? new InternalClipboard();
    this.persistence = init.persistence ?? new FileSystemPersistence();
    this.quitTimes = this.options.quitConfirmations;

    if (init.commands) {
      this.commands = init.commands;
    } else {
      this.commands = new CommandRegistry();
      registerBuiltinCommands(this.commands);
    }

    const buffer = new TextBuffer(init.lines ?? [], { tabStop: this.options.tabStop });
    this.document = new EditorDocument(buffer, init.languages ?? new LanguageRegistry(), init.path ?? null);
    // Loading and syntax assignment are not edits.
    buffer.markClean();

    this.viewport = new ViewportManager(
      this.options.screenRows,
      this.options.screenCols,
      this.options.scrollMargin,
    );
    this.cursor = new CursorManager(buffer, this.viewport);
    this.history = new UndoManager();
    this.search = new IncrementalSearch();

    this.ctx = {
      buffer,
      cursor: this.cursor,
      history: this.history,
      options: this.options,
      log: this.log,
    };

    this.undoTarget = {
      setCursor: (cx, cy) => this.cursor.setPosition(cx, cy),
      insertChar: ch => insertChar(this.ctx, ch, false),
      deleteCurrentChar: () => { deleteCurrent(this.ctx, false); },
      deleteRow: at => {
        buffer.deleteRow(at);
        buffer.deleteEmptyRowIfDocumentEmpty();
      },
      openLineBelow: () => openLineBelow(this.ctx, false),
    };

    this.commandLineHost = {
      quit: () => this.quit(),
      forceQuit: () => { this._quitRequested = true; },
      setTabStop: tabStop => {
        this.options.tabStop = tabStop;
        buffer.setTabStop(tabStop);
      },
      setIndentWithSpaces: enabled => { this.options.indentWithSpaces = enabled; },
      info: message => this.setStatus(message, 'info'),
      error: message => this.setStatus(message, 'error'),
    };
  }

  /**
   * Open a file as the initial document.
   * @throws EditorFatalError when the file cannot be read.
   */
  static open(path: string, init: Omit<EditorCoreInit, 'lines' | 'path'> = {}): EditorCore {
    const persistence = init.persistence ?? new FileSystemPersistence();
    let lines: string[];
    try {
      lines = persistence.load(path);
    } catch (error) {
      if (isNodeError(error) && error.code === 'ENOENT') {
        throw new EditorFatalError('file not found');
      }
      throw new EditorFatalError(`cannot open ${path}: ${getErrorMessage(error)}`);
    }
    return new EditorCore({ ...init, persistence, lines, path });
  }

  get buffer(): TextBuffer {
    return this.document.buffer;
  }

  get mode(): EditorMode {
    return this._mode;
  }

  get status(): StatusMessage | null {
    return this._status;
  }

  get dirty(): boolean {
    return this.document.isDirty;
  }

  get path(): string | null {
    return this.document.path;
  }

  get mark(): Position {
    return this.cursor.mark;
  }

  get highlightSpan(): HighlightSpan | null {
    return this.search.span;
  }

  /** True once a quit went through; the host should exit. */
  get quitRequested(): boolean {
    return this._quitRequested;
  }

  /**
   * Post a status message. Ignored while the command line is taken by
   * command or search input.
   */
  setStatus(text: string, style: StatusStyle = 'info'): void {
    if (this._mode === 'command' || this._mode === 'search') return;
    this._status = { text, style };
  }

  clearStatus(): void {
    this._status = null;
  }

  setPath(path: string): void {
    this.document.setPath(path);
  }

  execute(command: EditorCommand): void {
    this.log.log(`command ${command.type}`);
    this._status = null;

    try {
      this.dispatch(command);
    } catch (error) {
      this.log.log(`command ${command.type} failed: ${getErrorMessage(error)}`);
      this.setStatus(`internal error: ${getErrorMessage(error)}`, 'error');
    }

    this.cursor.clamp();
    if (command.type !== 'quit' && command.type !== 'forceQuit' && command.type !== 'resize') {
      this.quitTimes = this.options.quitConfirmations;
    }
    if (!SPAN_KEEPING_COMMANDS.has(command.type)) this.search.clearSpan();
    if (this._mode !== 'command' && this._mode !== 'search') {
      this.viewport.scrollTo(this.cursor.rx, this.cursor.cy);
    }
  }

  private dispatch(command: EditorCommand): void {
    switch (command.type) {
      case 'moveCursor':
        this.cursor.move(command.direction);
        break;
      case 'insertChar':
        this.insertTypedChar(command.char);
        break;
      case 'insertNewline':
        insertNewline(this.ctx, true, true);
        break;
      case 'insertIndent':
        insertIndent(this.ctx, true);
        break;
      case 'deleteLeft':
        if (!deleteLeft(this.ctx, true)) this.setStatus('beginning of file', 'error');
        break;
      case 'deleteCurrent':
        if (!deleteCurrent(this.ctx, true)) this.setStatus('end of file', 'error');
        break;
      case 'setMark':
        this.cursor.setMark();
        break;
      case 'cut':
        if (cutRegion(this.ctx, this.clipboard, true) === null) {
          this.setStatus('nothing to cut', 'error');
        }
        break;
      case 'paste':
        if (!paste(this.ctx, this.clipboard, true)) this.setStatus('nothing to paste', 'error');
        break;
      case 'openLineBelow':
        openLineBelow(this.ctx, true);
        this.changeMode('insert');
        break;
      case 'save':
        this.save();
        break;
      case 'undo':
        this.undoOrRedo(true);
        break;
      case 'redo':
        this.undoOrRedo(false);
        break;
      case 'changeMode':
        this.changeMode(command.mode);
        break;
      case 'searchInput':
        this.runSearch('forward', command.query, false);
        break;
      case 'searchCommit':
        this.changeMode('normal');
        this.search.commit(command.query);
        this.runSearch('forward', command.query, true);
        break;
      case 'searchRepeat':
        if (this.search.lastQuery === '') {
          this.setStatus('empty prev search', 'error');
        } else {
          this.runSearch(command.direction, this.search.lastQuery, true);
        }
        break;
      case 'runCommandLine':
        this.changeMode('normal');
        this.commands.execute(command.line, this.commandLineHost);
        break;
      case 'quit':
        this.quit();
        break;
      case 'forceQuit':
        this._quitRequested = true;
        break;
      case 'resize':
        this.resize(command.rows, command.cols);
        break;
      default: {
        const unknown: never = command;
        throw new Error(`unhandled command: ${JSON.stringify(unknown)}`);
      }
    }
  }

  private changeMode(mode: EditorMode): void {
    this._mode = mode;
    this._status = null;
  }

  private insertTypedChar(ch: string): void {
    if (ch === '\n') {
      insertNewline(this.ctx, true, true);
    } else if (ch === '\t' || isPrintable(ch)) {
      insertChar(this.ctx, ch, true);
    } else if (ch.length === 1) {
      this.setStatus(`non-printable key '${ch.charCodeAt(0)}' in insert mode`, 'error');
    } else {
      this.setStatus(`invalid character '${ch}'`, 'error');
    }
  }

  private undoOrRedo(undo: boolean): void {
    const result = undo ? this.history.undo(this.undoTarget) : this.history.redo(this.undoTarget);
    if (!result.ok) {
      this.setStatus(result.message, 'error');
      return;
    }
    if (result.atSavedState) this.document.markSaved();
  }

  private save(): void {
    const path = this.document.path;
    if (path === null || path === '') {
      this.setStatus('no filename', 'error');
      return;
    }

    let bytes: number;
    try {
      bytes = this.persistence.save(path, this.document.toText());
    } catch (error) {
      this.log.log(`save ${path} failed: ${getErrorMessage(error)}`);
      this.setStatus(`cannot write file: ${getErrorMessage(error)}`, 'error');
      return;
    }

    this.document.markSaved();
    this.history.markSaved();
    this.setStatus(`${bytes} bytes written`, 'info');
  }

  private quit(): void {
    if (this.document.isDirty && this.quitTimes > 0) {
      this.setStatus(`File has unsaved changes: quit ${this.quitTimes} more times to discard them`, 'error');
      this.quitTimes--;
    } else {
      this._quitRequested = true;
    }
  }

  private resize(rows: number, cols: number): void {
    if (!Number.isInteger(rows) || rows < 1 || !Number.isInteger(cols) || cols < 1) {
      this.setStatus(`invalid terminal geometry: ${rows}x${cols}`, 'error');
      return;
    }
    this.options.screenRows = rows;
    this.options.screenCols = cols;
    this.viewport.update(rows, cols);
  }

  private runSearch(direction: SearchDirection, query: string, moveCursor: boolean): void {
    if (query === '') {
      this.search.clearSpan();
      return;
    }

    const from = { cx: this.cursor.cx, cy: this.cursor.cy, rx: this.cursor.rx };
    const match = direction === 'forward'
      ? searchForward(this.buffer, query, from)
      : searchBackward(this.buffer, query, from);

    if (!match) {
      this.setStatus(direction === 'forward' ? 'search reached EOF' : 'search reached BOF', 'error');
      this.search.clearSpan();
      return;
    }

    if (moveCursor) this.cursor.setPosition(match.cx, match.row);
    this.search.showMatch(match);
    this.viewport.scrollTo(match.end, match.row);
  }
}
