/**
 * Language ruleset registry: maps a file extension to the word lists,
 * comment marker and feature flags consumed by the highlighter.
 */

import { basename } from 'node:path';
import cGrammar from './grammars/c.json';
import typescriptGrammar from './grammars/typescript.json';
import pythonGrammar from './grammars/python.json';

export interface SyntaxRuleset {
  /** Language name shown in the status bar. */
  name: string;
  /** File extensions (without the dot) that select this ruleset. */
  extensions: string[];
  keywords: string[];
  types: string[];
  consts: string[];
  /** Single-line comment marker. Empty string disables comment highlighting. */
  singleLineComment: string;
  highlightNumbers: boolean;
  highlightStrings: boolean;
}

const BUILTIN_RULESETS: readonly SyntaxRuleset[] = [cGrammar, typescriptGrammar, pythonGrammar];

/**
 * Extract the extension from a path: the text after the last dot of the
 * file name. Returns '' when there is none.
 */
export function extensionOf(path: string): string {
  const name = basename(path);
  const idx = name.lastIndexOf('.');
  if (idx <= 0 || idx === name.length - 1) return '';
  return name.substring(idx + 1).toLowerCase();
}

export class LanguageRegistry {
  private rulesets: Map<string, SyntaxRuleset> = new Map();
  private byExtension: Map<string, SyntaxRuleset> = new Map();

  constructor(rulesets: readonly SyntaxRuleset[] = BUILTIN_RULESETS) {
    for (const ruleset of rulesets) this.register(ruleset);
  }

  register(ruleset: SyntaxRuleset): void {
    this.rulesets.set(ruleset.name, ruleset);
    for (const ext of ruleset.extensions) {
      this.byExtension.set(ext.toLowerCase(), ruleset);
    }
  }

  /** Find the ruleset for a file path, or null for unknown/absent extensions. */
  findByPath(path: string): SyntaxRuleset | null {
    if (path.length === 0) return null;
    const ext = extensionOf(path);
    if (ext.length === 0) return null;
    return this.byExtension.get(ext) ?? null;
  }

  get(name: string): SyntaxRuleset | null {
    return this.rulesets.get(name) ?? null;
  }

  getSupportedLanguages(): string[] {
    return [...this.rulesets.keys()];
  }
}
