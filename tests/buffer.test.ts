import { describe, expect, test } from 'vitest';
import { Row, renderRaw } from '../core/buffer/row';
import { toLogical, toRendered } from '../core/buffer/coordinates';
import { TextBuffer } from '../core/buffer/text-buffer';
import { extractRegion } from '../core/buffer/region';
import { LanguageRegistry, type SyntaxRuleset } from '../core/tokenizer/languages';

function cRuleset(): SyntaxRuleset {
  const ruleset = new LanguageRegistry().get('c');
  if (!ruleset) throw new Error('c ruleset missing');
  return ruleset;
}

describe('Row', () => {
  test('tabs expand to the next tab stop', () => {
    expect(renderRaw('\tab', 4)).toBe('    ab');
    expect(renderRaw('a\tb', 4)).toBe('a   b');
    expect(renderRaw('abcd\te', 4)).toBe('abcd    e');
    expect(renderRaw('a\tb', 8)).toBe('a       b');
  });

  test('highlight has one tag per rendered byte', () => {
    const row = new Row('\tint x;', 4, cRuleset());
    expect(row.rendered).toBe('    int x;');
    expect(row.highlight.length).toBe(row.rendered.length);
    expect(row.length).toBe(7);
  });

  test('indent width counts a tab as a full stop', () => {
    expect(new Row('\t  x', 4).indentWidth()).toBe(6);
    expect(new Row('x', 4).indentWidth()).toBe(0);
  });

  test('blank rows hold only spaces and tabs', () => {
    expect(new Row('', 4).isBlank()).toBe(true);
    expect(new Row(' \t ', 4).isBlank()).toBe(true);
    expect(new Row(' x', 4).isBlank()).toBe(false);
  });
});

describe('Coordinates', () => {
  const row = new Row('a\tb', 4);

  test('logical to rendered', () => {
    expect(toRendered(row, 0)).toBe(0);
    expect(toRendered(row, 1)).toBe(1);
    expect(toRendered(row, 2)).toBe(4);
    expect(toRendered(row, 3)).toBe(5);
  });

  test('rendered to logical picks the covering character', () => {
    expect(toLogical(row, 0)).toBe(0);
    expect(toLogical(row, 1)).toBe(1);
    expect(toLogical(row, 3)).toBe(1);
    expect(toLogical(row, 4)).toBe(2);
    expect(toLogical(row, 100)).toBe(3);
  });

  test('absent row maps to 0', () => {
    expect(toRendered(null, 5)).toBe(0);
    expect(toLogical(undefined, 5)).toBe(0);
  });

  test('round trip for every logical column', () => {
    const samples = ['', 'plain', '\t\tx', 'a\tbc\td', '\t', 'ab\t\t\tc '];
    for (const tabStop of [1, 2, 4, 8]) {
      for (const raw of samples) {
        const r = new Row(raw, tabStop);
        for (let cx = 0; cx <= r.length; cx++) {
          expect(toLogical(r, toRendered(r, cx))).toBe(cx);
        }
      }
    }
  });
});

describe('TextBuffer', () => {
  test('insert row', () => {
    const buf = new TextBuffer(['one', 'two']);
    const row = buf.insertRow(1, 'mid');
    expect(row?.raw).toBe('mid');
    expect(buf.lines()).toEqual(['one', 'mid', 'two']);
    expect(buf.dirty).toBe(true);
  });

  test('insert row out of range is rejected', () => {
    const buf = new TextBuffer(['one']);
    expect(buf.insertRow(3, 'x')).toBeNull();
    expect(buf.insertRow(-1, 'x')).toBeNull();
    expect(buf.lines()).toEqual(['one']);
    expect(buf.dirty).toBe(false);
  });

  test('delete row returns its text', () => {
    const buf = new TextBuffer(['one', 'two']);
    expect(buf.deleteRow(0)).toBe('one');
    expect(buf.deleteRow(9)).toBe('');
    expect(buf.lines()).toEqual(['two']);
  });

  test('insert text clamps the column to the row length', () => {
    const buf = new TextBuffer(['one']);
    buf.rowInsertChar(0, 1, 'X');
    expect(buf.lines()).toEqual(['oXne']);
    buf.rowInsertText(0, 99, '!?');
    expect(buf.lines()).toEqual(['oXne!?']);
  });

  test('delete range', () => {
    const buf = new TextBuffer(['one']);
    expect(buf.rowDeleteRange(0, 1, 2)).toBe('ne');
    expect(buf.lines()).toEqual(['o']);
  });

  test('invalid or empty delete range changes nothing', () => {
    const buf = new TextBuffer(['one']);
    expect(buf.rowDeleteRange(0, 2, 5)).toBe('');
    expect(buf.rowDeleteRange(0, 0, 0)).toBe('');
    expect(buf.rowDeleteRange(4, 0, 1)).toBe('');
    expect(buf.lines()).toEqual(['one']);
    expect(buf.dirty).toBe(false);
  });

  test('append joins text onto a row', () => {
    const buf = new TextBuffer(['foo', 'bar']);
    buf.rowAppend(0, 'bar');
    expect(buf.lines()).toEqual(['foobar', 'bar']);
  });

  test('load replaces content and clears dirty', () => {
    const buf = new TextBuffer(['a']);
    buf.rowAppend(0, 'b');
    buf.load(['x', 'y']);
    expect(buf.lines()).toEqual(['x', 'y']);
    expect(buf.dirty).toBe(false);
  });

  test('changing the ruleset re-highlights every row', () => {
    const buf = new TextBuffer(['return x;']);
    expect(buf.getRow(0)?.highlight[0]).toBe('normal');
    buf.setSyntax(cRuleset());
    expect(buf.getRow(0)?.highlight.slice(0, 7)).toEqual([
      'keyword', 'keyword', 'keyword', 'keyword', 'keyword', 'keyword', 'normal',
    ]);
  });

  test('changing the tab stop re-renders every row', () => {
    const buf = new TextBuffer(['\tx']);
    expect(buf.getRow(0)?.rendered).toBe('    x');
    buf.setTabStop(8);
    expect(buf.getRow(0)?.rendered).toBe('        x');
  });

  test('placeholder row for empty documents', () => {
    const buf = new TextBuffer();
    expect(buf.numRows).toBe(0);
    expect(buf.lastRowIndex).toBe(-1);
    buf.insertEmptyRowIfDocumentEmpty();
    expect(buf.lines()).toEqual(['']);
    buf.insertEmptyRowIfDocumentEmpty();
    expect(buf.numRows).toBe(1);
    buf.deleteEmptyRowIfDocumentEmpty();
    expect(buf.numRows).toBe(0);
  });

  test('placeholder is kept once it has content', () => {
    const buf = new TextBuffer(['x']);
    buf.deleteEmptyRowIfDocumentEmpty();
    expect(buf.lines()).toEqual(['x']);
  });

  test('rendered and highlight lengths match after every mutation', () => {
    const buf = new TextBuffer(['int a = 1;', '\t"str\\"ing"', '// note'], { syntax: cRuleset() });
    const check = () => {
      for (let i = 0; i < buf.numRows; i++) {
        const row = buf.getRow(i);
        expect(row?.highlight.length).toBe(row?.rendered.length);
      }
    };
    buf.rowInsertChar(0, 3, '\t');
    check();
    buf.rowInsertText(1, 2, '42.5 ');
    check();
    buf.rowDeleteRange(2, 0, 3);
    check();
    buf.rowAppend(0, '\t\t');
    check();
    buf.insertRow(1, '\t\t12');
    check();
    buf.deleteRow(0);
    check();
  });
});

describe('extractRegion', () => {
  test('single row range', () => {
    const buf = new TextBuffer(['int x = 1;']);
    const text = extractRegion(buf, { start: { row: 0, col: 4 }, end: { row: 0, col: 9 } });
    expect(text).toBe('x = 1');
    expect(buf.lines()).toEqual(['int ;']);
  });

  test('multi-row range keeps the start row prefix', () => {
    const buf = new TextBuffer(['abc', 'def', 'ghi']);
    const text = extractRegion(buf, { start: { row: 0, col: 1 }, end: { row: 2, col: 2 } });
    expect(text).toBe('bc\ndef\ngh');
    expect(buf.lines()).toEqual(['ai']);
  });

  test('multi-row range starting at column 0 removes the start row', () => {
    const buf = new TextBuffer(['abc', 'def', 'ghi', 'jkl']);
    const text = extractRegion(buf, { start: { row: 1, col: 0 }, end: { row: 2, col: 2 } });
    expect(text).toBe('def\ngh');
    expect(buf.lines()).toEqual(['abc', 'i', 'jkl']);
  });

  test('range ending at column 0 takes the newline only', () => {
    const buf = new TextBuffer(['ab', 'cd']);
    const text = extractRegion(buf, { start: { row: 0, col: 1 }, end: { row: 1, col: 0 } });
    expect(text).toBe('b\n');
    expect(buf.lines()).toEqual(['acd']);
  });

  test('whole document', () => {
    const buf = new TextBuffer(['ab', '', 'cd']);
    const text = extractRegion(buf, { start: { row: 0, col: 0 }, end: { row: 2, col: 2 } });
    expect(text).toBe('ab\n\ncd');
    expect(buf.numRows).toBe(0);
  });
});
