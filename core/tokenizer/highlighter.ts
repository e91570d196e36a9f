/**
 * Per-row syntax highlighter.
 *
 * Scans a row's rendered text left to right and assigns one tag per byte.
 * Rows are independent: a string or comment never continues onto the next
 * row, so multi-line constructs only highlight their first line.
 */

import type { SyntaxRuleset } from './languages';

export type Highlight =
  | 'normal'
  | 'number'
  | 'string'
  | 'comment'
  | 'keyword'
  | 'type'
  | 'const';

const SEPARATOR_PUNCTUATION = ',.()+-/*=~%<>[];';

/**
 * A separator is whitespace, the end of the row (NUL), or fixed punctuation.
 * An empty string stands for the end of the row.
 */
export function isSeparator(ch: string): boolean {
  if (ch.length === 0 || ch === '\0') return true;
  if (ch === ' ' || ch === '\t' || ch === '\n' || ch === '\r' || ch === '\v' || ch === '\f') {
    return true;
  }
  return SEPARATOR_PUNCTUATION.includes(ch);
}

function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

/**
 * Find the longest word of `words` that starts at `pos` and is followed by a
 * separator. Returns its length, or 0 when nothing matches.
 */
function matchWord(text: string, pos: number, words: readonly string[]): number {
  let best = 0;
  for (const word of words) {
    if (word.length <= best) continue;
    if (!text.startsWith(word, pos)) continue;
    if (!isSeparator(text.charAt(pos + word.length))) continue;
    best = word.length;
  }
  return best;
}

/**
 * Compute highlight tags for a rendered row. The result always has the
 * same length as `rendered`.
 */
export function highlightLine(rendered: string, syntax: SyntaxRuleset | null): Highlight[] {
  const len = rendered.length;
  const hl: Highlight[] = new Array<Highlight>(len).fill('normal');
  if (!syntax) return hl;

  const comment = syntax.singleLineComment;
  const wordLists: readonly [readonly string[], Highlight][] = [
    [syntax.keywords, 'keyword'],
    [syntax.types, 'type'],
    [syntax.consts, 'const'],
  ];

  let prevSep = true;
  let inString = '';
  let i = 0;

  while (i < len) {
    const c = rendered[i];
    const prevHl: Highlight = i > 0 ? hl[i - 1] : 'normal';

    if (comment.length > 0 && inString === '' && rendered.startsWith(comment, i)) {
      hl.fill('comment', i);
      break;
    }

    if (syntax.highlightStrings) {
      if (inString !== '') {
        hl[i] = 'string';
        if (c === '\\' && i + 1 < len) {
          hl[i + 1] = 'string';
          i += 2;
          continue;
        }
        if (c === inString) inString = '';
        i++;
        prevSep = true;
        continue;
      }
      if (c === '"' || c === '\'') {
        inString = c;
        hl[i] = 'string';
        i++;
        continue;
      }
    }

    if (syntax.highlightNumbers) {
      if ((isDigit(c) && (prevSep || prevHl === 'number')) || (c === '.' && prevHl === 'number')) {
        hl[i] = 'number';
        i++;
        prevSep = false;
        continue;
      }
    }

    if (prevSep) {
      let matched = false;
      for (const [words, tag] of wordLists) {
        const wordLen = matchWord(rendered, i, words);
        if (wordLen > 0) {
          hl.fill(tag, i, i + wordLen);
          i += wordLen;
          matched = true;
          break;
        }
      }
      if (matched) {
        prevSep = false;
        continue;
      }
    }

    prevSep = isSeparator(c);
    i++;
  }

  return hl;
}
