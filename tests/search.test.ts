import { describe, expect, test } from 'vitest';
import { TextBuffer } from '../core/buffer/text-buffer';
import { searchBackward, searchForward } from '../core/search/search-engine';
import { IncrementalSearch } from '../core/search/incremental';
import { EditorCore } from '../core/editor/editor-core';

const at = (cx: number, cy: number, rx: number = cx) => ({ cx, cy, rx });

describe('searchForward', () => {
  const buffer = new TextBuffer(['foo bar foo', 'bar', 'xfoo']);

  test('skips a match under the cursor', () => {
    expect(searchForward(buffer, 'foo', at(0, 0))).toEqual({ row: 0, start: 8, end: 11, cx: 8 });
  });

  test('continues on later rows from their start', () => {
    expect(searchForward(buffer, 'foo', at(8, 0))).toEqual({ row: 2, start: 1, end: 4, cx: 1 });
  });

  test('does not wrap past the last row', () => {
    expect(searchForward(buffer, 'foo', at(1, 2))).toBeNull();
  });

  test('match columns are rendered, cx is logical', () => {
    const tabbed = new TextBuffer(['\tfoo']);
    expect(searchForward(tabbed, 'foo', at(0, 0))).toEqual({ row: 0, start: 4, end: 7, cx: 1 });
  });

  test('case-insensitive matching', () => {
    expect(searchForward(buffer, 'FOO', at(8, 0))).toBeNull();
    expect(searchForward(buffer, 'FOO', at(8, 0), { caseSensitive: false })?.row).toBe(2);
  });

  test('empty query finds nothing', () => {
    expect(searchForward(buffer, '', at(0, 0))).toBeNull();
  });
});

describe('searchBackward', () => {
  const buffer = new TextBuffer(['foo bar foo', 'bar', 'xfoo']);

  test('finds an earlier match on the cursor row', () => {
    expect(searchBackward(buffer, 'foo', at(8, 0))).toEqual({ row: 0, start: 0, end: 3, cx: 0 });
  });

  test('cursor at column 0 skips its own row', () => {
    expect(searchBackward(buffer, 'foo', at(0, 2))).toEqual({ row: 0, start: 8, end: 11, cx: 8 });
  });

  test('earlier rows search from their end', () => {
    expect(searchBackward(buffer, 'bar', at(2, 2))).toEqual({ row: 1, start: 0, end: 3, cx: 0 });
  });

  test('does not wrap past the first row', () => {
    expect(searchBackward(buffer, 'foo', at(0, 0))).toBeNull();
  });
});

describe('IncrementalSearch', () => {
  test('tracks the shown match and the committed query', () => {
    const search = new IncrementalSearch();
    expect(search.lastQuery).toBe('');
    search.commit('abc');
    search.showMatch({ row: 3, start: 2, end: 5, cx: 2 });
    expect(search.lastQuery).toBe('abc');
    expect(search.span).toEqual({ startRow: 3, startCol: 2, endRow: 3, endCol: 5 });
    search.clearSpan();
    expect(search.span).toBeNull();
  });
});

describe('Search commands', () => {
  test('forward search for text only before the cursor reports EOF', () => {
    const core = new EditorCore({ lines: ['foo', 'bar'] });
    core.execute({ type: 'moveCursor', direction: 'down' });
    core.execute({ type: 'changeMode', mode: 'search' });
    core.execute({ type: 'searchCommit', query: 'foo' });

    expect(core.mode).toBe('normal');
    expect(core.status).toEqual({ text: 'search reached EOF', style: 'error' });
    expect([core.cursor.cx, core.cursor.cy]).toEqual([0, 1]);
    expect(core.highlightSpan).toBeNull();
  });

  test('repeat backward uses the committed query and keeps the span', () => {
    const core = new EditorCore({ lines: ['foo', 'bar'] });
    core.execute({ type: 'moveCursor', direction: 'down' });
    core.execute({ type: 'searchCommit', query: 'foo' });
    core.execute({ type: 'searchRepeat', direction: 'backward' });

    expect(core.status).toBeNull();
    expect([core.cursor.cx, core.cursor.cy]).toEqual([0, 0]);
    expect(core.highlightSpan).toEqual({ startRow: 0, startCol: 0, endRow: 0, endCol: 3 });

    core.execute({ type: 'moveCursor', direction: 'right' });
    expect(core.highlightSpan).toBeNull();
  });

  test('repeat without a previous query', () => {
    const core = new EditorCore({ lines: ['foo'] });
    core.execute({ type: 'searchRepeat', direction: 'forward' });
    expect(core.status).toEqual({ text: 'empty prev search', style: 'error' });
  });

  test('typing a query highlights without moving the cursor', () => {
    const core = new EditorCore({ lines: ['alpha', 'beta alpha'] });
    core.execute({ type: 'changeMode', mode: 'search' });
    core.execute({ type: 'searchInput', query: 'alp' });

    expect(core.highlightSpan).toEqual({ startRow: 1, startCol: 5, endRow: 1, endCol: 8 });
    expect([core.cursor.cx, core.cursor.cy]).toEqual([0, 0]);

    core.execute({ type: 'searchInput', query: '' });
    expect(core.highlightSpan).toBeNull();
  });
});
