/**
 * Editor options: tab layout, indentation, quit confirmation, geometry.
 */

import { EditorFatalError } from '../errors';

export interface EditorOptions {
  /** Width of a tab stop in rendered columns. */
  tabStop: number;
  /** Insert spaces up to the next tab stop instead of a literal tab. */
  indentWithSpaces: boolean;
  /** Extra quit attempts required while the document has unsaved changes. */
  quitConfirmations: number;
  /** Rows/columns kept between the cursor and the edge of the text area. */
  scrollMargin: number;
  /** Rows available for document text (status bar and command line excluded). */
  screenRows: number;
  screenCols: number;
  /** Append debug lines to this file. null disables debug logging. */
  debugLogPath: string | null;
}

export const DEFAULT_OPTIONS: EditorOptions = {
  tabStop: 4,
  indentWithSpaces: true,
  quitConfirmations: 2,
  scrollMargin: 5,
  screenRows: 24,
  screenCols: 80,
  debugLogPath: null,
};

/**
 * Merge overrides onto the defaults and validate the result.
 */
export function resolveOptions(overrides: Partial<EditorOptions> = {}): EditorOptions {
  const opts: EditorOptions = { ...DEFAULT_OPTIONS, ...overrides };

  if (!Number.isInteger(opts.tabStop) || opts.tabStop < 1) {
    throw new EditorFatalError(`invalid tab stop: ${opts.tabStop}`);
  }
  if (!Number.isInteger(opts.screenRows) || opts.screenRows < 1 ||
      !Number.isInteger(opts.screenCols) || opts.screenCols < 1) {
    throw new EditorFatalError(`invalid terminal geometry: ${opts.screenRows}x${opts.screenCols}`);
  }
  if (opts.quitConfirmations < 0) opts.quitConfirmations = 0;
  if (opts.scrollMargin < 0) opts.scrollMargin = 0;

  return opts;
}
