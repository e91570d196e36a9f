/**
 * Minimal headless example.
 *
 * Creates an editor over a few rows of C, feeds it key events the way a
 * terminal host would, and prints what the renderer would draw.
 *
 * Run with:
 *   npm run example
 */

import config from '../../editor.config';
import { EditorCore } from '../../core/editor/editor-core';
import { EditorViewModel } from '../../view-model/editor-view-model';
import type { KeyEvent } from '../../view-model/keymap';

function key(name: string, modifiers: Partial<KeyEvent> = {}): KeyEvent {
  return { key: name, code: name, ctrlKey: false, shiftKey: false, altKey: false, metaKey: false, ...modifiers };
}

// --- Setup ---

const core = new EditorCore({
  lines: [
    '#include <stdio.h>',
    '',
    'int main(void) {',
    '\tprintf("hello\\n");',
    '\treturn 0;',
    '}',
  ],
  path: 'example.c',
  options: { ...config, screenRows: 10, screenCols: 40 },
});
const viewModel = new EditorViewModel(core);

viewModel.onChange(() => {
  const { cursor } = viewModel.snapshot();
  console.log(`mode=${viewModel.mode} cursor=(${cursor.cx},${cursor.cy})`);
});

// --- Simulate interaction ---

// Jump to "return 0;", open a line below and type a call.
for (const name of ['j', 'j', 'j', 'j', ',']) viewModel.onKeyDown(key(name));
for (const ch of 'puts("bye");') viewModel.onKeyDown(key(ch));
viewModel.onKeyDown(key('Escape'));

// Search for "printf".
viewModel.onKeyDown(key('/'));
for (const ch of 'printf') viewModel.onKeyDown(key(ch));
viewModel.onKeyDown(key('Enter'));

// --- Show the state ---

const snapshot = viewModel.snapshot();
for (const line of snapshot.lines) {
  const kinds = line.tokens.map(token => `${token.highlight}:${token.endColumn - token.startColumn}`);
  console.log(`${String(line.lineNumber + 1).padStart(3)} ${line.content}    [${kinds.join(' ')}]`);
}
console.log(snapshot.statusBar);
console.log(snapshot.commandLine);

// Undo the inserted line completely.
while (core.history.canUndo()) core.execute({ type: 'undo' });
console.log(`after undo: ${core.buffer.numRows} rows, dirty=${core.dirty}`);
