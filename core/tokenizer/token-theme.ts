/**
 * Highlight-to-theme mapping: each row highlight is expressed as a Lezer
 * highlight tag, and tags resolve to theme colors and font styles.
 */

import { tags, Tag } from '@lezer/highlight';
import type { TokenThemeMapping } from '../../view-model/theme';
import type { Highlight } from './highlighter';

export type FontStyle = 'normal' | 'italic' | 'bold' | 'bold-italic';

export const HIGHLIGHT_TAGS: Readonly<Record<Highlight, Tag>> = {
  normal: tags.content,
  number: tags.number,
  string: tags.string,
  comment: tags.lineComment,
  keyword: tags.keyword,
  type: tags.typeName,
  const: tags.atom,
};

export function highlightToTag(hl: Highlight): Tag {
  return HIGHLIGHT_TAGS[hl];
}

/**
 * Resolve a Lezer highlight tag to a theme color.
 */
export function resolveTagColor(tag: Tag, tokens: TokenThemeMapping): string {
  if (tag === tags.keyword || tag === tags.controlKeyword || tag === tags.definitionKeyword) {
    return tokens.keyword;
  }
  if (tag === tags.string || tag === tags.character) {
    return tokens.string;
  }
  if (tag === tags.comment || tag === tags.lineComment || tag === tags.blockComment) {
    return tokens.comment;
  }
  if (tag === tags.typeName) {
    return tokens.typeName;
  }
  if (tag === tags.number || tag === tags.integer || tag === tags.float) {
    return tokens.number;
  }
  if (tag === tags.atom || tag === tags.bool || tag === tags.null) {
    return tokens.atom;
  }
  return tokens.variableName;
}

/**
 * Resolve a Lezer tag to a font style.
 */
export function resolveTagStyle(tag: Tag): FontStyle {
  if (tag === tags.comment || tag === tags.lineComment || tag === tags.blockComment) {
    return 'italic';
  }
  if (tag === tags.keyword || tag === tags.typeName) {
    return 'bold';
  }
  return 'normal';
}
