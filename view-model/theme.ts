/**
 * Theme system: color tokens for highlights and editor chrome.
 */

export interface TokenThemeMapping {
  keyword: string;
  string: string;
  comment: string;
  variableName: string;
  typeName: string;
  number: string;
  atom: string;
}

export interface EditorTheme {
  // Editor chrome
  background: string;
  foreground: string;
  searchHighlightBackground: string;
  controlCharForeground: string;

  // Status bar, colored by mode
  statusNormalBackground: string;
  statusInsertBackground: string;
  statusForeground: string;

  // Command line
  errorBackground: string;
  errorForeground: string;

  // Syntax token colors
  tokens: TokenThemeMapping;
}

/** Dark theme (default). */
export const DARK_THEME: EditorTheme = {
  background: '#1e1e1e',
  foreground: '#c0c0c0',
  searchHighlightBackground: '#0000aa',
  controlCharForeground: '#1e1e1e',

  statusNormalBackground: '#0000aa',
  statusInsertBackground: '#c0c0c0',
  statusForeground: '#000000',

  errorBackground: '#aa0000',
  errorForeground: '#c0c0c0',

  tokens: {
    keyword: '#5f5fff',
    string: '#aa00aa',
    comment: '#a8a8a8',
    variableName: '#c0c0c0',
    typeName: '#5f5fff',
    number: '#aa00aa',
    atom: '#aa00aa',
  },
};

/** Light theme. */
export const LIGHT_THEME: EditorTheme = {
  background: '#ffffff',
  foreground: '#000000',
  searchHighlightBackground: '#add6ff',
  controlCharForeground: '#ffffff',

  statusNormalBackground: '#005fd7',
  statusInsertBackground: '#d0d0d0',
  statusForeground: '#000000',

  errorBackground: '#d70000',
  errorForeground: '#ffffff',

  tokens: {
    keyword: '#0000ff',
    string: '#a31515',
    comment: '#008000',
    variableName: '#000000',
    typeName: '#267f99',
    number: '#098658',
    atom: '#0000ff',
  },
};
