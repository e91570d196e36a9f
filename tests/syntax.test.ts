import { describe, expect, test } from 'vitest';
import { tags } from '@lezer/highlight';
import { highlightLine, isSeparator, type Highlight } from '../core/tokenizer/highlighter';
import { LanguageRegistry, extensionOf, type SyntaxRuleset } from '../core/tokenizer/languages';
import { highlightToTag, resolveTagColor, resolveTagStyle } from '../core/tokenizer/token-theme';
import { TextBuffer } from '../core/buffer/text-buffer';
import { computeTokens } from '../view-model/line-layout';
import { DARK_THEME } from '../view-model/theme';

const registry = new LanguageRegistry();

function ruleset(name: string): SyntaxRuleset {
  const found = registry.get(name);
  if (!found) throw new Error(`${name} ruleset missing`);
  return found;
}

function repeat(tag: Highlight, n: number): Highlight[] {
  return new Array<Highlight>(n).fill(tag);
}

describe('highlightLine', () => {
  const c = ruleset('c');

  test('keyword followed by a separator', () => {
    expect(highlightLine('return x;', c)).toEqual([...repeat('keyword', 6), ...repeat('normal', 3)]);
  });

  test('type and number in a declaration', () => {
    expect(highlightLine('int x = 1;', c)).toEqual([
      ...repeat('type', 3), ...repeat('normal', 5), 'number', 'normal',
    ]);
  });

  test('words must end at a separator', () => {
    expect(highlightLine('returned', c)).toEqual(repeat('normal', 8));
    expect(highlightLine('x=return;', c)).toEqual([
      'normal', 'normal', ...repeat('keyword', 6), 'normal',
    ]);
  });

  test('longest word wins', () => {
    expect(highlightLine('#ifdef X', c)).toEqual([...repeat('keyword', 6), 'normal', 'normal']);
  });

  test('constants', () => {
    expect(highlightLine('NULL', c)).toEqual(repeat('const', 4));
  });

  test('digits only count after a separator or inside a number', () => {
    expect(highlightLine('x1 2.5', c)).toEqual([
      'normal', 'normal', 'normal', 'number', 'number', 'number',
    ]);
  });

  test('strings run to the matching quote and honor escapes', () => {
    expect(highlightLine('"a\\"b" x', c)).toEqual([...repeat('string', 6), 'normal', 'normal']);
    expect(highlightLine('\'a\'', c)).toEqual(repeat('string', 3));
  });

  test('comment runs to the end of the row', () => {
    expect(highlightLine('x // y "z"', c)).toEqual(['normal', 'normal', ...repeat('comment', 8)]);
  });

  test('comment marker inside a string is part of the string', () => {
    expect(highlightLine('"//"', c)).toEqual(repeat('string', 4));
  });

  test('without a ruleset everything is normal', () => {
    expect(highlightLine('return 1;', null)).toEqual(repeat('normal', 9));
  });

  test('python uses its own comment marker', () => {
    const py = ruleset('python');
    expect(highlightLine('# x', py)).toEqual(repeat('comment', 3));
  });

  test('an unterminated string does not continue onto the next row', () => {
    const buffer = new TextBuffer(['"abc', 'int'], { syntax: c });
    expect(buffer.getRow(0)?.highlight).toEqual(repeat('string', 4));
    expect(buffer.getRow(1)?.highlight).toEqual(repeat('type', 3));
  });

  test('separators', () => {
    expect(isSeparator('')).toBe(true);
    expect(isSeparator('\0')).toBe(true);
    expect(isSeparator(' ')).toBe(true);
    expect(isSeparator(';')).toBe(true);
    expect(isSeparator('_')).toBe(false);
    expect(isSeparator('a')).toBe(false);
  });
});

describe('LanguageRegistry', () => {
  test('extension is the text after the last dot of the file name', () => {
    expect(extensionOf('src/main.c')).toBe('c');
    expect(extensionOf('archive.tar.GZ')).toBe('gz');
    expect(extensionOf('.bashrc')).toBe('');
    expect(extensionOf('notes.')).toBe('');
    expect(extensionOf('dir.d/Makefile')).toBe('');
  });

  test('rulesets are selected by extension', () => {
    expect(registry.findByPath('src/main.c')?.name).toBe('c');
    expect(registry.findByPath('include/util.H')?.name).toBe('c');
    expect(registry.findByPath('app.tsx')?.name).toBe('typescript');
    expect(registry.findByPath('tool.py')?.name).toBe('python');
    expect(registry.findByPath('README')).toBeNull();
    expect(registry.findByPath('')).toBeNull();
  });

  test('registered rulesets join the lookup', () => {
    const local = new LanguageRegistry([]);
    expect(local.getSupportedLanguages()).toEqual([]);
    local.register({
      name: 'ini',
      extensions: ['ini'],
      keywords: [],
      types: [],
      consts: [],
      singleLineComment: ';',
      highlightNumbers: false,
      highlightStrings: false,
    });
    expect(local.findByPath('setup.ini')?.name).toBe('ini');
    expect(local.getSupportedLanguages()).toEqual(['ini']);
  });
});

describe('Token theme', () => {
  test('highlights map to lezer tags', () => {
    expect(highlightToTag('keyword')).toBe(tags.keyword);
    expect(highlightToTag('comment')).toBe(tags.lineComment);
    expect(highlightToTag('const')).toBe(tags.atom);
  });

  test('tag colors come from the theme', () => {
    const tokens = DARK_THEME.tokens;
    expect(resolveTagColor(tags.keyword, tokens)).toBe('#5f5fff');
    expect(resolveTagColor(tags.lineComment, tokens)).toBe('#a8a8a8');
    expect(resolveTagColor(tags.content, tokens)).toBe('#c0c0c0');
  });

  test('comments are italic, keywords and types bold', () => {
    expect(resolveTagStyle(tags.lineComment)).toBe('italic');
    expect(resolveTagStyle(tags.typeName)).toBe('bold');
    expect(resolveTagStyle(tags.string)).toBe('normal');
  });

  test('tokens group runs of equal highlight', () => {
    const tokens = computeTokens(highlightLine('int x;', ruleset('c')), DARK_THEME);
    expect(tokens.map(t => [t.startColumn, t.endColumn, t.highlight, t.color, t.fontStyle])).toEqual([
      [0, 3, 'type', '#5f5fff', 'bold'],
      [3, 6, 'normal', '#c0c0c0', 'normal'],
    ]);
  });
});
