/**
 * Core barrel export: re-exports all public APIs from core/.
 */

// Buffer
export { Row, renderRaw } from './buffer/row';
export { toRendered, toLogical } from './buffer/coordinates';
export { TextBuffer, type TextBufferOptions } from './buffer/text-buffer';
export { extractRegion } from './buffer/region';

// Document
export { EditorDocument, splitLines } from './document/document';
export { FileSystemPersistence, type Persistence } from './document/persistence';

// Cursor
export {
  CursorManager,
  type CursorState,
  type CursorDirection,
  type PageGeometry,
} from './cursor/cursor-manager';
export { type Position, type Region, comparePositions, orderRegion } from './cursor/selection';
export { isWordChar } from './cursor/word-boundary';

// Commands
export {
  type EditorCommand,
  type EditorCommandType,
  type EditorMode,
  isPrintable,
} from './commands/command';
export {
  type EditContext,
  insertChar,
  insertNewline,
  insertIndent,
  deleteLeft,
  deleteCurrent,
  openLineBelow,
  computeAutoIndent,
} from './commands/editing';
export { type Clipboard, InternalClipboard, cutRegion, paste } from './commands/clipboard';
export {
  CommandRegistry,
  registerBuiltinCommands,
  type CommandLineHandler,
  type CommandLineHost,
} from './commands/registry';

// History
export { UndoManager, type UndoResult } from './history/undo-manager';
export {
  type UndoEntry,
  type UndoKind,
  type UndoTarget,
  revertEntry,
  replayEntry,
} from './history/operation';

// Viewport
export { ViewportManager, type VisibleRange } from './viewport/viewport-manager';

// Tokenizer / Syntax
export { highlightLine, isSeparator, type Highlight } from './tokenizer/highlighter';
export { LanguageRegistry, extensionOf, type SyntaxRuleset } from './tokenizer/languages';
export {
  HIGHLIGHT_TAGS,
  highlightToTag,
  resolveTagColor,
  resolveTagStyle,
  type FontStyle,
} from './tokenizer/token-theme';

// Search
export {
  searchForward,
  searchBackward,
  type SearchMatch,
  type SearchOptions,
  type SearchOrigin,
} from './search/search-engine';
export { IncrementalSearch, type HighlightSpan, type SearchDirection } from './search/incremental';

// Editor
export {
  EditorCore,
  type EditorCoreInit,
  type StatusMessage,
  type StatusStyle,
} from './editor/editor-core';

// Configuration, errors, logging
export { DEFAULT_OPTIONS, resolveOptions, type EditorOptions } from './config/options';
export { EditorFatalError, isNodeError, getErrorMessage } from './errors';
export { DebugLog } from './debug';
