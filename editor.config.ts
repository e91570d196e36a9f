/**
 * Project defaults for the editor engine.
 *
 * Hosts pass this object as `options` when constructing an EditorCore;
 * anything left out falls back to DEFAULT_OPTIONS.
 */

import type { EditorOptions } from './core/config/options';

export default {
  /** Tab stop width in rendered columns. */
  tabStop: 4,

  /** Tab key and auto-indent insert spaces. */
  indentWithSpaces: true,

  /** Extra quit attempts needed while there are unsaved changes. */
  quitConfirmations: 2,

  /** Rows/columns kept between the cursor and the screen edge. */
  scrollMargin: 5,

  /** Debug log file. Set to a path such as 'key.txt' while debugging. */
  debugLogPath: null,
} satisfies Partial<EditorOptions>;
